/**
 * Wheel filename parsing and selection
 */

import type { IndexFile, WheelInfo } from './types.js';
import { compareVersions } from './versions.js';

export const UNKNOWN_PYTHON = 'unknown';

export interface WheelFilename {
  name: string;
  version: string;
  build?: string;
  pythonTag: string;
  abiTag: string;
  platformTag: string;
}

/**
 * Parse `{name}-{version}(-{build})?-{python}-{abi}-{platform}.whl`
 */
export function parseWheelFilename(filename: string): WheelFilename | null {
  if (!filename.endsWith('.whl')) return null;

  const parts = filename.slice(0, -'.whl'.length).split('-');
  if (parts.length !== 5 && parts.length !== 6) return null;

  const [name, version] = parts;
  const [pythonTag, abiTag, platformTag] = parts.slice(-3);
  if (!name || !version || !pythonTag || !abiTag || !platformTag) return null;

  return {
    name,
    version,
    ...(parts.length === 6 && parts[2] ? { build: parts[2] } : {}),
    pythonTag,
    abiTag,
    platformTag,
  };
}

/**
 * Python version from the CPython tag in the third filename segment:
 * `cp313` → `3.13`, `cp39` → `3.9`.
 */
export function pythonVersionFromFilename(filename: string): string {
  const pythonTag = filename.split('-')[2];
  if (pythonTag?.startsWith('cp')) {
    const digits = pythonTag.slice(2);
    if (digits.length >= 2) {
      return `${digits[0]}.${digits.slice(1)}`;
    }
  }
  return UNKNOWN_PYTHON;
}

/** Numeric Python version ordering, `unknown` last */
export function comparePythonVersions(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNKNOWN_PYTHON) return 1;
  if (b === UNKNOWN_PYTHON) return -1;
  return compareVersions(a, b);
}

/**
 * Binary wheels of one release built for `platformTag`, sorted by
 * Python version.
 */
export function selectWheels(files: IndexFile[], platformTag: string): WheelInfo[] {
  return files
    .filter((file) => file.packagetype === 'bdist_wheel' && file.filename.includes(platformTag))
    .map((file) => ({
      filename: file.filename,
      url: file.url,
      size: file.size,
      pythonVersion: pythonVersionFromFilename(file.filename),
      platformTag,
    }))
    .sort(
      (a, b) => comparePythonVersions(a.pythonVersion, b.pythonVersion) || a.filename.localeCompare(b.filename)
    );
}

/** Human readable size, base 1024 */
export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes >= 1024 ** 3) return `${(sizeBytes / 1024 ** 3).toFixed(1)} GB`;
  if (sizeBytes >= 1024 ** 2) return `${(sizeBytes / 1024 ** 2).toFixed(1)} MB`;
  if (sizeBytes >= 1024) return `${(sizeBytes / 1024).toFixed(1)} KB`;
  return `${sizeBytes} B`;
}
