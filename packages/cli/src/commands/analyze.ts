/**
 * Analyze command - download every selected wheel, inspect its CUDA
 * libraries and publish the pip table
 */

import pc from 'picocolors';
import {
  analyzeWheel,
  formatFileSize,
  generateTable,
  hasAnalyzedResult,
  listResults,
  loadResults,
  saveResults,
  summarizeByVersion,
  upsertResult,
  type ExecFn,
  type PackageResult,
  type WheelInfo,
} from '@cudarch/catalog';
import { createContext, parseNotation, type GlobalOptions } from '../lib/context.js';
import { createEventRenderer } from '../lib/events.js';
import { logger } from '../lib/logger.js';
import { confirm as askConfirm, type Confirm } from '../lib/prompt.js';
import { writeTable } from './table.js';

export interface AnalyzeOptions extends GlobalOptions {
  /** Only these releases (default: every release matching the prefix) */
  release?: string[];
  prefix?: string;
  yes?: boolean;
  resume?: boolean;
  out?: string;
  notation?: string;
}

export interface AnalyzeDeps {
  confirm?: Confirm;
  exec?: ExecFn;
  tmpRoot?: string;
}

const RULE = '='.repeat(80);

export async function analyzeCommand(options: AnalyzeOptions, deps: AnalyzeDeps = {}): Promise<void> {
  const { root, config, client, resultsPath } = await createContext(options);
  const notation = parseNotation(options.notation);
  const prefix = options.prefix ?? config.versionPrefix;

  let versions: string[];
  if (options.release && options.release.length > 0) {
    versions = options.release;
  } else {
    logger.info(`Fetching all ${config.package} ${prefix}x versions from ${config.index.url}...`);
    versions = await client.listReleases(config.package, prefix);
  }

  if (versions.length === 0) {
    logger.warn(`No ${config.package} ${prefix}x versions found!`);
    return;
  }

  logger.info(`Found ${versions.length} ${config.package} versions: ${versions.join(', ')}`);

  // Count total wheels before processing
  logger.info('Counting total wheels to be processed...');
  const wheelsByVersion = new Map<string, WheelInfo[]>();
  for (const version of versions) {
    const wheels = await client.listWheels(config.package, version, config.platformTag);
    wheelsByVersion.set(version, wheels);
    logger.info(`  ${version}: ${wheels.length} wheels`);
  }

  const store = await loadResults(resultsPath);
  const allWheels = [...wheelsByVersion.values()].flat();
  const pending = allWheels.filter((wheel) => !options.resume || !hasAnalyzedResult(store, 'pip', wheel.filename));

  logger.info(`Total wheels to process: ${pending.length}`);
  if (allWheels.length > pending.length) {
    logger.info(`Skipping ${allWheels.length - pending.length} wheels already in ${resultsPath}`);
  }

  if (pending.length === 0) {
    logger.warn('No wheels found to process!');
    return;
  }

  const estimatedBytes = pending.reduce((sum, wheel) => sum + (wheel.size > 0 ? wheel.size : config.estimatedWheelBytes), 0);
  logger.info(`Estimated download size: ~${formatFileSize(estimatedBytes)}`);
  logger.warn('This will take significant time and bandwidth!');

  if (!options.yes) {
    const proceed = await (deps.confirm ?? askConfirm)('Do you want to proceed? (y/N): ');
    if (!proceed) {
      logger.info('Aborted.');
      return;
    }
  }

  const pendingNames = new Set(pending.map((wheel) => wheel.filename));
  const onEvent = createEventRenderer();
  const processed: PackageResult[] = [];

  // Ctrl-C stops the current download or inspection and unwinds its scratch directory
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    for (const [index, version] of versions.entries()) {
      const wheels = (wheelsByVersion.get(version) ?? []).filter((wheel) => pendingNames.has(wheel.filename));
      if (wheels.length === 0) {
        logger.info(`Skipping ${version} (no ${config.platformTag} wheels to analyze)`);
        continue;
      }

      logger.info(RULE);
      logger.step(index + 1, versions.length, `Processing ${config.package} ${version} (${wheels.length} wheels)`);

      const versionResults: PackageResult[] = [];
      for (const [wheelIndex, wheel] of wheels.entries()) {
        controller.signal.throwIfAborted();
        logger.info(`Analyzing wheel ${wheelIndex + 1}/${wheels.length}: ${wheel.filename}`);
        const result = await analyzeWheel(wheel, version, {
          config,
          client,
          onEvent,
          signal: controller.signal,
          ...(deps.exec ? { exec: deps.exec } : {}),
          ...(deps.tmpRoot ? { tmpRoot: deps.tmpRoot } : {}),
        });

        versionResults.push(result);
        upsertResult(store, result);
        await saveResults(resultsPath, store);
      }
      processed.push(...versionResults);

      logger.info(`Summary for ${version}:`);
      for (const result of versionResults) {
        logger.info(
          `  Python ${result.pythonVersion}: ${result.architectures.length} architectures - ${
            result.architectures.length > 0 ? result.architectures.join(', ') : 'None'
          }`
        );
      }
    }
  } catch (error) {
    if (!controller.signal.aborted) throw error;
    logger.endProgress();
    logger.warn(`Aborted. Stored results are in ${resultsPath}; continue with --resume`);
    process.exitCode = 130;
    return;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  if (processed.length === 0) {
    logger.warn('No results to save!');
    return;
  }

  const pipResults = listResults(store, 'pip');
  const outputPath = await writeTable(root, options.out ?? config.output.pipTable, generateTable(pipResults, { notation }) + '\n');

  logger.info(RULE);
  if (outputPath) logger.success(`Table saved to ${outputPath}`);

  // Keep stdout to the table (--out -) or to JSON lines (--json)
  const plain = outputPath === null || logger.isJson();
  const print = (line: string): void => (plain ? logger.info(line) : console.log(line));

  const summary = summarizeByVersion(processed);
  print(plain ? 'Final Summary:' : pc.bold('\nFinal Summary:'));
  print(`Total ${config.package} versions processed: ${summary.length}`);
  print(`Total wheel files analyzed: ${processed.length}`);
  for (const { version, packages, failed } of summary) {
    const failures = failed > 0 ? ` (${failed} failed)` : '';
    print(`  ${version}: ${packages} wheels${plain ? failures : pc.red(failures)}`);
  }
}
