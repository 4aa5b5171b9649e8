/**
 * Package analysis: download, unpack, inspect and parse.
 */

import { mkdtemp, mkdir, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join, relative, resolve } from 'path';
import { extractSharedLibraries, findLibraries, FALLBACK_LIBRARY_PATTERNS } from './archive.js';
import { mergeReports, parseInspectorOutput } from './architectures.js';
import { CatalogError, ErrorCodes, errorMessage, isCatalogError } from './errors.js';
import { runInspector, type ExecFn } from './inspector.js';
import type { PackageIndexClient } from './pypi.js';
import type {
  AnalysisEvent,
  AnalysisListener,
  ArchitectureReport,
  CatalogConfig,
  Channel,
  PackageResult,
  WheelInfo,
} from './types.js';
import { parseWheelFilename, pythonVersionFromFilename, UNKNOWN_PYTHON } from './wheels.js';

export interface AnalysisContext {
  config: CatalogConfig;
  client: Pick<PackageIndexClient, 'downloadFile'>;
  exec?: ExecFn;
  onEvent?: AnalysisListener;
  /** Parent directory for scratch space (default: OS temp dir) */
  tmpRoot?: string;
  now?: () => Date;
  /** Aborting stops the download or inspector and unwinds scratch space */
  signal?: AbortSignal;
}

interface PackageIdentity {
  channel: Channel;
  filename: string;
  packageVersion: string;
  pythonVersion: string;
}

interface InspectionOutcome {
  report: ArchitectureReport;
  libraries: string[];
  warnings: string[];
  /** Every inspected library failed */
  failed: boolean;
  /** Inspector failure messages when `failed` */
  error?: string;
}

const EMPTY_REPORT: ArchitectureReport = { elf: [], ptx: [], all: [], matchedLines: [] };

function emit(context: Pick<AnalysisContext, 'onEvent'>, event: AnalysisEvent): void {
  context.onEvent?.(event);
}

function buildResult(
  identity: PackageIdentity,
  outcome: InspectionOutcome,
  context: Pick<AnalysisContext, 'now'>,
  error?: string
): PackageResult {
  const message = error ?? outcome.error;
  return {
    ...identity,
    status: message !== undefined || outcome.failed ? 'failed' : 'analyzed',
    architectures: outcome.report.all,
    elf: outcome.report.elf,
    ptx: outcome.report.ptx,
    libraries: outcome.libraries,
    warnings: outcome.warnings,
    ...(message !== undefined ? { error: message } : {}),
    analyzedAt: (context.now?.() ?? new Date()).toISOString(),
  };
}

/**
 * Run the inspector on each library under `root`. A library the tool
 * rejects becomes a warning; a missing tool aborts.
 */
export async function inspectLibraries(
  root: string,
  libraries: string[],
  context: Pick<AnalysisContext, 'config' | 'exec' | 'onEvent' | 'signal'>
): Promise<InspectionOutcome> {
  const reports: ArchitectureReport[] = [];
  const warnings: string[] = [];
  const failures: string[] = [];

  for (const library of libraries) {
    context.signal?.throwIfAborted();
    const name = relative(root, library) || basename(library);
    emit(context, { type: 'inspecting', library, command: context.config.inspector.command });

    try {
      const output = await runInspector(library, {
        command: context.config.inspector.command,
        maxBuffer: context.config.inspector.maxBuffer,
        ...(context.exec ? { exec: context.exec } : {}),
        ...(context.signal ? { signal: context.signal } : {}),
      });
      const report = parseInspectorOutput(output);
      if (report.all.length === 0) {
        warnings.push(`${name}: no architectures in ${output.length} characters of inspector output`);
      }
      reports.push(report);
    } catch (error) {
      if (context.signal?.aborted) throw error;
      if (isCatalogError(error) && error.code === ErrorCodes.INSPECT_TOOL_NOT_FOUND) throw error;
      const failure = `${name}: ${errorMessage(error)}`;
      failures.push(failure);
      warnings.push(failure);
    }
  }

  const failed = libraries.length > 0 && failures.length === libraries.length;
  return {
    report: reports.length > 0 ? mergeReports(reports) : EMPTY_REPORT,
    libraries: libraries.map((library) => relative(root, library) || basename(library)),
    warnings,
    failed,
    ...(failed ? { error: failures.join('; ') } : {}),
  };
}

async function withScratchDir<T>(context: Pick<AnalysisContext, 'tmpRoot'>, run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(context.tmpRoot ?? tmpdir(), 'cudarch-'));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Unpack a wheel's shared libraries into `workDir` and inspect the ones
 * matching `patterns`.
 */
async function inspectWheelArchive(
  archivePath: string,
  filename: string,
  workDir: string,
  patterns: string[],
  context: AnalysisContext,
  fallback: boolean
): Promise<InspectionOutcome> {
  const extractDir = join(workDir, 'extracted');
  await mkdir(extractDir, { recursive: true });

  const extracted = await extractSharedLibraries(archivePath, extractDir);
  emit(context, { type: 'extracted', filename, libraries: extracted.length });

  let libraries = await findLibraries(extractDir, patterns);
  if (libraries.length === 0 && fallback) {
    libraries = await findLibraries(extractDir, FALLBACK_LIBRARY_PATTERNS);
  }

  if (libraries.length === 0) {
    emit(context, { type: 'library-missing', filename, patterns });
    return {
      report: EMPTY_REPORT,
      libraries: [],
      warnings: [`No library matching ${patterns.join(', ')} in ${filename}`],
      failed: false,
    };
  }

  return inspectLibraries(extractDir, libraries, context);
}

/**
 * Download and analyze one wheel of a release. Failures are recorded
 * on the result; only a missing inspector or an abort is thrown.
 */
export async function analyzeWheel(
  wheel: WheelInfo,
  packageVersion: string,
  context: AnalysisContext
): Promise<PackageResult> {
  const identity: PackageIdentity = {
    channel: 'pip',
    filename: wheel.filename,
    packageVersion,
    pythonVersion: wheel.pythonVersion,
  };

  let result: PackageResult;
  try {
    result = await withScratchDir(context, async (workDir) => {
      const archivePath = join(workDir, wheel.filename);

      emit(context, { type: 'download-start', filename: wheel.filename, url: wheel.url });
      const bytes = await context.client.downloadFile(
        wheel.url,
        archivePath,
        (downloaded, total) => emit(context, { type: 'download-progress', filename: wheel.filename, downloaded, total }),
        context.signal
      );
      emit(context, { type: 'download-done', filename: wheel.filename, path: archivePath, bytes });

      const outcome = await inspectWheelArchive(
        archivePath,
        wheel.filename,
        workDir,
        context.config.libraries,
        context,
        false
      );
      return buildResult(identity, outcome, context);
    });
  } catch (error) {
    if (context.signal?.aborted) throw error;
    if (isCatalogError(error) && error.code === ErrorCodes.INSPECT_TOOL_NOT_FOUND) throw error;
    result = buildResult(
      identity,
      { report: EMPTY_REPORT, libraries: [], warnings: [], failed: true },
      context,
      errorMessage(error)
    );
  }

  emit(context, { type: 'analyzed', result });
  return result;
}

export interface LocalPackageOptions {
  channel?: Channel;
  /** Row label; defaults to the file or directory name */
  label?: string;
  packageVersion?: string;
  pythonVersion?: string;
}

/**
 * Analyze a package already on disk: a wheel, a single shared library,
 * or an unpacked package directory (e.g. a conda package).
 */
export async function inspectLocalPath(
  inputPath: string,
  options: LocalPackageOptions,
  context: AnalysisContext
): Promise<PackageResult> {
  const target = resolve(inputPath);
  const info = await stat(target).catch((error: unknown) => {
    throw new CatalogError(ErrorCodes.IO_PATH_NOT_FOUND, `Path not found: ${inputPath}`, {
      ...(error instanceof Error ? { cause: error } : {}),
    });
  });

  const name = basename(target);
  const wheelName = name.endsWith('.whl') ? parseWheelFilename(name) : null;
  const identity: PackageIdentity = {
    channel: options.channel ?? 'local',
    filename: options.label ?? name,
    packageVersion: options.packageVersion ?? wheelName?.version ?? 'unknown',
    pythonVersion: options.pythonVersion ?? (wheelName ? pythonVersionFromFilename(name) : UNKNOWN_PYTHON),
  };

  let outcome: InspectionOutcome;
  if (info.isDirectory()) {
    let libraries = await findLibraries(target, context.config.libraries);
    if (libraries.length === 0) {
      libraries = await findLibraries(target, FALLBACK_LIBRARY_PATTERNS);
    }
    if (libraries.length === 0) {
      emit(context, { type: 'library-missing', filename: name, patterns: FALLBACK_LIBRARY_PATTERNS });
    }
    outcome = await inspectLibraries(target, libraries, context);
    if (libraries.length === 0) {
      outcome = { ...outcome, warnings: [`No shared libraries under ${inputPath}`] };
    }
  } else if (name.endsWith('.whl')) {
    outcome = await withScratchDir(context, (workDir) =>
      inspectWheelArchive(target, name, workDir, context.config.libraries, context, true)
    );
  } else {
    outcome = await inspectLibraries(resolve(target, '..'), [target], context);
  }

  const result = buildResult(identity, outcome, context);
  emit(context, { type: 'analyzed', result });
  return result;
}
