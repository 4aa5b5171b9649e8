/**
 * Wheels command - show the wheels selected for one release
 */

import pc from 'picocolors';
import { formatFileSize } from '@cudarch/catalog';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { logger } from '../lib/logger.js';

export interface WheelsOptions extends GlobalOptions {
  platform?: string;
}

export async function wheelsCommand(version: string, options: WheelsOptions): Promise<void> {
  const { config, client } = await createContext(options);
  const platformTag = options.platform ?? config.platformTag;

  const wheels = await client.listWheels(config.package, version, platformTag);
  if (wheels.length === 0) {
    logger.warn(`No ${platformTag} wheels for ${config.package} ${version}`);
    return;
  }

  for (const wheel of wheels) {
    console.log(`${pc.bold(wheel.filename)} (${formatFileSize(wheel.size)})`);
    console.log(`  URL: ${wheel.url}`);
    console.log(`  Python: ${wheel.pythonVersion}`);
    console.log(`  Platform: ${wheel.platformTag}`);
    console.log();
  }
}
