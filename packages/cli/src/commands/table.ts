/**
 * Table command - render stored results as a markdown table
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ErrorCodes, generateTable, listResults, loadResults, wrapError } from '@cudarch/catalog';
import { createContext, parseChannel, parseNotation, type GlobalOptions } from '../lib/context.js';
import { logger } from '../lib/logger.js';

export interface TableOptions extends GlobalOptions {
  channel?: string;
  out?: string;
  notation?: string;
}

/**
 * Write `content` to `out`, or stdout when `out` is `-`. Returns the
 * resolved path, or null for stdout.
 */
export async function writeTable(root: string, out: string, content: string): Promise<string | null> {
  if (out === '-') {
    process.stdout.write(content);
    return null;
  }

  const outputPath = resolve(root, out);
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_WRITE_ERROR, `Failed to write ${outputPath}`);
  }
  return outputPath;
}

export async function tableCommand(options: TableOptions): Promise<void> {
  const { root, config, resultsPath } = await createContext(options);
  const channel = parseChannel(options.channel, 'pip');
  const notation = parseNotation(options.notation);
  const out = options.out ?? (channel === 'pip' ? config.output.pipTable : config.output.localTable);

  const store = await loadResults(resultsPath);
  const results = listResults(store, channel);
  if (results.length === 0) {
    logger.warn(`No ${channel} results in ${resultsPath}`);
  }

  const outputPath = await writeTable(root, out, generateTable(results, { notation }) + '\n');
  if (outputPath) {
    logger.success(`Table saved to ${outputPath} (${results.length} rows)`);
  }
}
