/**
 * Package Index Client
 *
 * Client for the PyPI JSON API (https://pypi.org/pypi/<name>/json)
 */

import { open } from 'fs/promises';
import { CatalogError, ErrorCodes, errorMessage } from './errors.js';
import type { IndexFile, IndexPackageInfo, WheelInfo } from './types.js';
import { filterReleases } from './versions.js';
import { selectWheels } from './wheels.js';

/** Default timeout for API requests (30 seconds) */
const DEFAULT_TIMEOUT_MS = 30000;

const USER_AGENT = `cudarch/${process.env['CUDARCH_VERSION'] ?? '0.0.0-dev'}`;

export type DownloadProgress = (downloaded: number, total: number) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIndexFile(value: unknown): IndexFile | null {
  if (!isRecord(value)) return null;
  const { filename, url, size, packagetype } = value;
  if (typeof filename !== 'string' || typeof url !== 'string' || typeof packagetype !== 'string') {
    return null;
  }
  return { filename, url, packagetype, size: typeof size === 'number' ? size : 0 };
}

function toIndexFiles(value: unknown): IndexFile[] | null {
  if (!Array.isArray(value)) return null;
  return value.map(toIndexFile).filter((file): file is IndexFile => file !== null);
}

/**
 * Validate the parts of a JSON API document the catalog relies on
 */
export function parsePackageInfo(body: unknown): IndexPackageInfo {
  const info = isRecord(body) ? body['info'] : undefined;
  if (!isRecord(body) || !isRecord(info)) {
    throw new CatalogError(ErrorCodes.INDEX_INVALID_RESPONSE, `Invalid index response: missing 'info' field`);
  }

  const { name, version } = info;
  const urls = toIndexFiles(body['urls'] ?? []);
  if (urls === null) {
    throw new CatalogError(ErrorCodes.INDEX_INVALID_RESPONSE, `Invalid index response: 'urls' is not a list`);
  }

  let releases: Record<string, IndexFile[]> | undefined;
  const rawReleases = body['releases'];
  if (rawReleases !== undefined) {
    if (!isRecord(rawReleases)) {
      throw new CatalogError(ErrorCodes.INDEX_INVALID_RESPONSE, `Invalid index response: 'releases' is not a mapping`);
    }
    releases = {};
    for (const [release, files] of Object.entries(rawReleases)) {
      releases[release] = toIndexFiles(files) ?? [];
    }
  }

  return {
    info: {
      name: typeof name === 'string' ? name : '',
      version: typeof version === 'string' ? version : '',
    },
    ...(releases ? { releases } : {}),
    urls,
  };
}

export class PackageIndexClient {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(baseUrl: string, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = timeoutMs;
  }

  /**
   * Fetch package metadata, for one release when `version` is given
   */
  async getPackageInfo(packageName: string, version?: string): Promise<IndexPackageInfo> {
    const path = version
      ? `/${encodeURIComponent(packageName)}/${encodeURIComponent(version)}/json`
      : `/${encodeURIComponent(packageName)}/json`;
    const url = `${this.baseUrl}${path}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
        signal: controller.signal,
      });

      if (response.status === 404) {
        throw new CatalogError(
          ErrorCodes.INDEX_NOT_FOUND,
          version ? `Not found: ${packageName} ${version}` : `Not found: ${packageName}`,
          { details: { url } }
        );
      }

      if (!response.ok) {
        throw new CatalogError(
          ErrorCodes.INDEX_HTTP_ERROR,
          `Index error (${response.status}): ${response.statusText || 'request failed'}`,
          { details: { url, status: response.status } }
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new CatalogError(ErrorCodes.INDEX_INVALID_RESPONSE, `Index returned invalid JSON for ${url}`);
      }

      return parsePackageInfo(body);
    } catch (error) {
      if (error instanceof CatalogError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new CatalogError(
          ErrorCodes.INDEX_NETWORK_ERROR,
          `Request timeout: index did not respond within ${this.timeoutMs / 1000} seconds`,
          { details: { url } }
        );
      }

      throw new CatalogError(ErrorCodes.INDEX_NETWORK_ERROR, `Unable to reach ${this.baseUrl}: ${errorMessage(error)}`, {
        details: { url },
        ...(error instanceof Error ? { cause: error } : {}),
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Stable releases of a package matching `prefix`, newest first
   */
  async listReleases(packageName: string, prefix: string): Promise<string[]> {
    const info = await this.getPackageInfo(packageName);
    if (!info.releases) {
      throw new CatalogError(ErrorCodes.INDEX_INVALID_RESPONSE, `Invalid index response: missing 'releases' field`);
    }
    return filterReleases(Object.keys(info.releases), prefix);
  }

  async listWheels(packageName: string, version: string, platformTag: string): Promise<WheelInfo[]> {
    const info = await this.getPackageInfo(packageName, version);
    return selectWheels(info.urls, platformTag);
  }

  /**
   * Stream a file to `destination`. Returns the number of bytes written.
   * Aborting `signal` stops the transfer.
   */
  async downloadFile(
    url: string,
    destination: string,
    onProgress?: DownloadProgress,
    signal?: AbortSignal
  ): Promise<number> {
    let response: Response;
    try {
      response = await fetch(url, { headers: { 'User-Agent': USER_AGENT }, signal });
    } catch (error) {
      throw new CatalogError(ErrorCodes.DOWNLOAD_FAILED, `Download failed: ${errorMessage(error)}`, {
        details: { url },
        ...(error instanceof Error ? { cause: error } : {}),
      });
    }

    if (!response.ok || !response.body) {
      throw new CatalogError(ErrorCodes.DOWNLOAD_FAILED, `Download failed (${response.status}): ${url}`, {
        details: { url, status: response.status },
      });
    }

    const total = Number.parseInt(response.headers.get('content-length') ?? '0', 10) || 0;
    let downloaded = 0;

    const handle = await open(destination, 'w');
    try {
      for await (const chunk of response.body) {
        const bytes: Uint8Array = chunk;
        await handle.write(bytes);
        downloaded += bytes.byteLength;
        onProgress?.(downloaded, total);
      }
    } catch (error) {
      throw new CatalogError(ErrorCodes.DOWNLOAD_FAILED, `Download interrupted: ${errorMessage(error)}`, {
        details: { url, downloaded },
        ...(error instanceof Error ? { cause: error } : {}),
      });
    } finally {
      await handle.close();
    }

    return downloaded;
  }
}
