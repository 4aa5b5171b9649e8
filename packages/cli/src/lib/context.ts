/**
 * Shared command plumbing: options, config and error reporting
 */

import { resolve } from 'node:path';
import {
  loadConfig,
  resolveTargetPath,
  PackageIndexClient,
  CatalogError,
  ErrorCodes,
  isCatalogError,
  wrapError,
  isChannel,
  isArchNotation,
  type ArchNotation,
  type CatalogConfig,
  type Channel,
} from '@cudarch/catalog';
import { logger } from './logger.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

export interface CommandContext {
  /** Directory config was loaded from; relative output paths resolve against it */
  root: string;
  config: CatalogConfig;
  client: PackageIndexClient;
  resultsPath: string;
}

export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const root = resolveTargetPath(options.config);
  const config = await loadConfig(root);
  logger.debug('Loaded configuration', { root, package: config.package, index: config.index.url });

  return {
    root,
    config,
    client: new PackageIndexClient(config.index.url, config.index.timeout),
    resultsPath: resolve(root, config.output.results),
  };
}

export function parseChannel(value: string | undefined, fallback: Channel): Channel {
  if (value === undefined) return fallback;
  if (!isChannel(value)) {
    throw new CatalogError(ErrorCodes.CLI_INVALID_ARGUMENT, `Unknown channel: ${value} (expected pip or local)`);
  }
  return value;
}

export function parseNotation(value: string | undefined): ArchNotation {
  if (value === undefined) return 'sm';
  if (!isArchNotation(value)) {
    throw new CatalogError(ErrorCodes.CLI_INVALID_ARGUMENT, `Unknown notation: ${value} (expected sm or cc)`);
  }
  return value;
}

/**
 * Run a command body, reporting failures with remediation and a
 * non-zero exit code.
 */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const cliError = isCatalogError(error) ? error : wrapError(error, ErrorCodes.CLI_INVALID_ARGUMENT);
    logger.endProgress();
    logger.error(cliError.toUserStringWithRemediation(logger.isVerbose()), { code: cliError.code });
    process.exitCode = 1;
  }
}
