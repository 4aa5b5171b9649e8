#!/usr/bin/env node

/**
 * cudarch CLI
 *
 * Catalog the GPU compute capabilities compiled into published
 * framework packages.
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { inspectCommand } from './commands/inspect.js';
import { tableCommand } from './commands/table.js';
import { versionsCommand } from './commands/versions.js';
import { wheelsCommand } from './commands/wheels.js';
import { runAction, type GlobalOptions } from './lib/context.js';
import { logger } from './lib/logger.js';

// Version injected at build time via tsup define
const version = process.env['CUDARCH_VERSION'] ?? '0.0.0-dev';

const program = new Command();

program
  .name('cudarch')
  .description('Catalog the CUDA compute capabilities of published framework packages')
  .version(version)
  .option('-c, --config <dir>', 'Directory holding cudarch.config.yaml (default: current directory)')
  .option('-v, --verbose', 'Enable verbose output')
  .option('--quiet', 'Suppress output except errors')
  .option('--json', 'Emit log lines as JSON');

program.hook('preAction', (_program, actionCommand) => {
  const options = actionCommand.optsWithGlobals<GlobalOptions & { out?: string }>();
  logger.configure({
    verbose: options.verbose,
    // Keep stdout clean when the table itself goes there
    silent: options.quiet || options.out === '-',
    json: options.json,
  });
});

program
  .command('versions')
  .description('List the stable releases that would be catalogued')
  .option('--prefix <prefix>', 'Release prefix (default: versionPrefix from config)')
  .action((_options, command: Command) => runAction(() => versionsCommand(command.optsWithGlobals())));

program
  .command('wheels <version>')
  .description('Show the wheels selected for one release')
  .option('--platform <tag>', 'Platform tag (default: platformTag from config)')
  .action((releaseVersion: string, _options, command: Command) =>
    runAction(() => wheelsCommand(releaseVersion, command.optsWithGlobals()))
  );

program
  .command('analyze')
  .description('Download and inspect every selected wheel, then write the pip table')
  .option('-r, --release <versions...>', 'Only analyze these releases')
  .option('--prefix <prefix>', 'Release prefix (default: versionPrefix from config)')
  .option('--resume', 'Skip wheels that already have stored results')
  .option('-o, --out <file>', 'Table output path (use --out=- for stdout)')
  .option('--notation <notation>', 'Architecture notation: sm (sm_86) or cc (8.6)', 'sm')
  .option('-y, --yes', 'Skip confirmation prompt (for CI/automation)')
  .action((_options, command: Command) => runAction(() => analyzeCommand(command.optsWithGlobals())));

program
  .command('inspect <path>')
  .description('Inspect a local wheel, shared library or unpacked package directory')
  .option('--channel <channel>', 'Channel to store the result under: pip or local', 'local')
  .option('--label <name>', 'Package name shown in the table (default: file or directory name)')
  .option('--pkg-version <version>', 'Package version used for table ordering')
  .option('--python <version>', 'Python version used for table ordering')
  .option('--notation <notation>', 'Architecture notation: sm (sm_86) or cc (8.6)', 'sm')
  .option('--no-save', 'Do not store the result')
  .action((path: string, _options, command: Command) => runAction(() => inspectCommand(path, command.optsWithGlobals())));

program
  .command('table')
  .description('Render stored results as a markdown table')
  .option('--channel <channel>', 'Channel to render: pip or local', 'pip')
  .option('-o, --out <file>', 'Output path (default: pipTable/localTable from config, - for stdout)')
  .option('--notation <notation>', 'Architecture notation: sm (sm_86) or cc (8.6)', 'sm')
  .action((_options, command: Command) => runAction(() => tableCommand(command.optsWithGlobals())));

await program.parseAsync();
