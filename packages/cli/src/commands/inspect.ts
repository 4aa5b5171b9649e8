/**
 * Inspect command - catalogue a package already on disk
 */

import pc from 'picocolors';
import {
  CatalogError,
  ErrorCodes,
  formatArchitectures,
  inspectLocalPath,
  loadResults,
  saveResults,
  upsertResult,
  type ExecFn,
} from '@cudarch/catalog';
import { createContext, parseChannel, parseNotation, type GlobalOptions } from '../lib/context.js';
import { createEventRenderer } from '../lib/events.js';
import { logger } from '../lib/logger.js';

export interface InspectOptions extends GlobalOptions {
  channel?: string;
  label?: string;
  pkgVersion?: string;
  python?: string;
  notation?: string;
  /** commander sets this to false for --no-save */
  save?: boolean;
}

export interface InspectDeps {
  exec?: ExecFn;
  tmpRoot?: string;
}

export async function inspectCommand(path: string, options: InspectOptions, deps: InspectDeps = {}): Promise<void> {
  const { config, client, resultsPath } = await createContext(options);
  const channel = parseChannel(options.channel, 'local');
  const notation = parseNotation(options.notation);

  const result = await inspectLocalPath(
    path,
    {
      channel,
      ...(options.label ? { label: options.label } : {}),
      ...(options.pkgVersion ? { packageVersion: options.pkgVersion } : {}),
      ...(options.python ? { pythonVersion: options.python } : {}),
    },
    {
      config,
      client,
      onEvent: createEventRenderer(),
      ...(deps.exec ? { exec: deps.exec } : {}),
      ...(deps.tmpRoot ? { tmpRoot: deps.tmpRoot } : {}),
    }
  );

  console.log(`${pc.bold(result.filename)}: ${formatArchitectures(result.architectures, notation) || pc.dim('none')}`);
  if (logger.isVerbose()) {
    console.log(pc.dim(`  elf: ${formatArchitectures(result.elf, notation) || '-'}`));
    console.log(pc.dim(`  ptx: ${formatArchitectures(result.ptx, notation) || '-'}`));
    console.log(pc.dim(`  libraries: ${result.libraries.join(', ') || '-'}`));
  }

  if (result.status === 'failed') {
    throw new CatalogError(ErrorCodes.INSPECT_FAILED, `Could not inspect any library in ${path}`, {
      details: { warnings: result.warnings },
    });
  }

  if (options.save !== false) {
    const store = await loadResults(resultsPath);
    upsertResult(store, result);
    await saveResults(resultsPath, store);
    logger.debug(`Stored ${channel} result in ${resultsPath}`);
  }
}
