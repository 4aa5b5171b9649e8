/**
 * Results Storage
 *
 * Persists analysis results between runs (default `.cudarch/results.json`)
 * so tables can be regenerated and interrupted runs resumed.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { CatalogError, ErrorCodes, errorMessage, wrapError } from './errors.js';
import { isChannel, type Channel, type PackageResult } from './types.js';

export const RESULTS_SCHEMA_VERSION = '1.0.0';

// Version injected at build time via tsup define
const TOOL_VERSION: string = process.env['CUDARCH_VERSION'] ?? '0.0.0-dev';

export interface ResultsFile {
  schemaVersion: string;
  toolVersion: string;
  updatedAt: string;
  /** Keyed by `channel:filename` */
  results: Record<string, PackageResult>;
}

export function resultKey(channel: Channel, filename: string): string {
  return `${channel}:${filename}`;
}

export function createEmptyResults(): ResultsFile {
  return {
    schemaVersion: RESULTS_SCHEMA_VERSION,
    toolVersion: TOOL_VERSION,
    updatedAt: new Date().toISOString(),
    results: {},
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function toPackageResult(value: unknown): PackageResult | null {
  if (!isRecord(value)) return null;
  const { channel, filename, packageVersion, pythonVersion, status, architectures, elf, ptx, libraries, warnings, error, analyzedAt } =
    value;

  if (
    typeof channel !== 'string' ||
    !isChannel(channel) ||
    typeof filename !== 'string' ||
    typeof packageVersion !== 'string' ||
    typeof pythonVersion !== 'string' ||
    (status !== 'analyzed' && status !== 'failed') ||
    !isStringArray(architectures) ||
    typeof analyzedAt !== 'string'
  ) {
    return null;
  }

  return {
    channel,
    filename,
    packageVersion,
    pythonVersion,
    status,
    architectures,
    elf: isStringArray(elf) ? elf : [],
    ptx: isStringArray(ptx) ? ptx : [],
    libraries: isStringArray(libraries) ? libraries : [],
    warnings: isStringArray(warnings) ? warnings : [],
    ...(typeof error === 'string' ? { error } : {}),
    analyzedAt,
  };
}

/**
 * Load the results file; a missing file yields an empty store.
 */
export async function loadResults(path: string): Promise<ResultsFile> {
  if (!existsSync(path)) {
    return createEmptyResults();
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new CatalogError(ErrorCodes.RESULTS_INVALID, `Could not parse results file ${path}: ${errorMessage(error)}`, {
      details: { path },
    });
  }

  const rawResults = isRecord(data) ? data['results'] : undefined;
  if (!isRecord(data) || !isRecord(rawResults)) {
    throw new CatalogError(ErrorCodes.RESULTS_INVALID, `Invalid results file ${path}: missing 'results' field`, {
      details: { path },
    });
  }

  const { schemaVersion: rawSchema, toolVersion, updatedAt } = data;
  const schemaVersion = typeof rawSchema === 'string' ? rawSchema : RESULTS_SCHEMA_VERSION;
  if (schemaVersion.split('.')[0] !== RESULTS_SCHEMA_VERSION.split('.')[0]) {
    throw new CatalogError(
      ErrorCodes.RESULTS_INVALID,
      `Unsupported results schema ${schemaVersion} (expected ${RESULTS_SCHEMA_VERSION})`,
      { details: { path } }
    );
  }

  const results: Record<string, PackageResult> = {};
  for (const [key, value] of Object.entries(rawResults)) {
    const result = toPackageResult(value);
    if (!result) {
      throw new CatalogError(ErrorCodes.RESULTS_INVALID, `Invalid results file ${path}: malformed entry '${key}'`, {
        details: { path, key },
      });
    }
    results[resultKey(result.channel, result.filename)] = result;
  }

  return {
    schemaVersion,
    toolVersion: typeof toolVersion === 'string' ? toolVersion : TOOL_VERSION,
    updatedAt: typeof updatedAt === 'string' ? updatedAt : new Date().toISOString(),
    results,
  };
}

/**
 * Save the results file with deterministic key order.
 */
export async function saveResults(path: string, file: ResultsFile): Promise<void> {
  file.updatedAt = new Date().toISOString();
  file.toolVersion = TOOL_VERSION;

  const results: Record<string, PackageResult> = {};
  for (const key of Object.keys(file.results).sort()) {
    const result = file.results[key];
    if (result) results[key] = result;
  }

  const ordered = {
    schemaVersion: file.schemaVersion,
    toolVersion: file.toolVersion,
    updatedAt: file.updatedAt,
    results,
  };

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(ordered, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_WRITE_ERROR, `Failed to write ${path}`);
  }
}

export function upsertResult(file: ResultsFile, result: PackageResult): void {
  file.results[resultKey(result.channel, result.filename)] = result;
}

export function hasResult(file: ResultsFile, channel: Channel, filename: string): boolean {
  return resultKey(channel, filename) in file.results;
}

/**
 * True when the package has a stored result that is not a failure.
 * `analyze --resume` retries failed packages.
 */
export function hasAnalyzedResult(file: ResultsFile, channel: Channel, filename: string): boolean {
  return file.results[resultKey(channel, filename)]?.status === 'analyzed';
}

export function listResults(file: ResultsFile, channel?: Channel): PackageResult[] {
  return Object.values(file.results).filter((result) => !channel || result.channel === channel);
}
