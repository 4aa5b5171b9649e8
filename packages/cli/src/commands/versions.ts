/**
 * Versions command - list the releases that would be catalogued
 */

import pc from 'picocolors';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { logger } from '../lib/logger.js';

export interface VersionsOptions extends GlobalOptions {
  prefix?: string;
}

export async function versionsCommand(options: VersionsOptions): Promise<void> {
  const { config, client } = await createContext(options);
  const prefix = options.prefix ?? config.versionPrefix;

  logger.info(`Fetching all ${config.package} ${prefix}x versions from ${config.index.url}...`);
  const versions = await client.listReleases(config.package, prefix);

  if (versions.length === 0) {
    logger.warn(`No ${config.package} ${prefix}x versions found`);
    return;
  }

  console.log(pc.bold(`Found ${versions.length} ${config.package} ${prefix}x versions:`));
  versions.forEach((version, i) => {
    console.log(`  ${String(i + 1).padStart(2)}. ${version}`);
  });
}
