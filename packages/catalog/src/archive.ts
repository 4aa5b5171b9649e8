/**
 * Package archive helpers: pull shared libraries out of wheels and
 * locate them on disk.
 */

import { readFile, mkdir } from 'fs/promises';
import { createWriteStream } from 'fs';
import { pipeline } from 'stream/promises';
import { dirname, resolve, sep } from 'path';
import { glob } from 'glob';
import JSZip from 'jszip';
import { CatalogError, ErrorCodes, errorMessage, wrapError } from './errors.js';

/** `libfoo.so`, `libfoo.so.12`, `libfoo.so.12.1` */
export const SHARED_LIBRARY_PATTERN = /\.so(\.\d+)*$/;

/** Used for directories when none of the configured patterns match */
export const FALLBACK_LIBRARY_PATTERNS = ['**/*.so', '**/*.so.*'];

export function isSharedLibrary(path: string): boolean {
  return SHARED_LIBRARY_PATTERN.test(path);
}

function isInside(root: string, target: string): boolean {
  return target.startsWith(root.endsWith(sep) ? root : `${root}${sep}`);
}

/**
 * Write every shared library of a wheel (zip) archive under
 * `destination`, keeping archive paths. Returns the archive paths written.
 */
export async function extractSharedLibraries(archivePath: string, destination: string): Promise<string[]> {
  let data: Buffer;
  try {
    data = await readFile(archivePath);
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read ${archivePath}`);
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new CatalogError(ErrorCodes.ARCHIVE_INVALID, `Not a zip archive: ${archivePath} (${errorMessage(error)})`, {
      details: { path: archivePath },
    });
  }

  const root = resolve(destination);
  const entries: Array<{ path: string; file: JSZip.JSZipObject }> = [];
  zip.forEach((relativePath, file) => {
    if (file.dir || !isSharedLibrary(relativePath)) return;
    // zip-slip
    if (!isInside(root, resolve(root, relativePath))) return;
    entries.push({ path: relativePath, file });
  });

  const written: string[] = [];
  for (const entry of entries) {
    const target = resolve(root, entry.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await pipeline(entry.file.nodeStream('nodebuffer'), createWriteStream(target));
    } catch (error) {
      throw wrapError(error, ErrorCodes.IO_WRITE_ERROR, `Failed to extract ${entry.path}`);
    }
    written.push(entry.path);
  }

  return written.sort();
}

/**
 * Absolute paths of files under `root` matching any of `patterns`
 */
export async function findLibraries(root: string, patterns: string[]): Promise<string[]> {
  const matches = await glob(patterns, { cwd: root, absolute: true, nodir: true, dot: true });
  return [...new Set(matches)].sort();
}
