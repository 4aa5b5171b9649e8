import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { PackageIndexClient, parsePackageInfo } from '../src/pypi.js';
import { CatalogError, ErrorCodes } from '../src/errors.js';

const BASE_URL = 'https://index.example.test/pypi';
const PLATFORM = 'manylinux_2_28_x86_64';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function wheel(filename: string, size = 100) {
  return { filename, url: `https://files.example.test/${filename}`, size, packagetype: 'bdist_wheel' };
}

describe('PackageIndexClient', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('lists stable releases for a prefix, newest first', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        info: { name: 'torch', version: '2.8.0' },
        releases: { '1.13.1': [], '2.0.0': [], '2.8.0': [], '2.7.1': [], '2.8.0rc3': [] },
        urls: [],
      })
    );

    const client = new PackageIndexClient(`${BASE_URL}/`);
    const versions = await client.listReleases('torch', '2.');

    expect(versions).toEqual(['2.8.0', '2.7.1', '2.0.0']);
    expect(fetchMock).toHaveBeenCalledWith(
      `${BASE_URL}/torch/json`,
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it('selects platform wheels of one release', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        info: { name: 'torch', version: '2.8.0' },
        urls: [
          wheel(`torch-2.8.0-cp312-cp312-${PLATFORM}.whl`),
          wheel('torch-2.8.0-cp312-cp312-win_amd64.whl'),
          { ...wheel('torch-2.8.0.tar.gz'), packagetype: 'sdist' },
        ],
      })
    );

    const client = new PackageIndexClient(BASE_URL);
    const wheels = await client.listWheels('torch', '2.8.0', PLATFORM);

    expect(wheels.map((w) => w.filename)).toEqual([`torch-2.8.0-cp312-cp312-${PLATFORM}.whl`]);
    expect(fetchMock).toHaveBeenCalledWith(`${BASE_URL}/torch/2.8.0/json`, expect.anything());
  });

  it('maps 404 to INDEX_NOT_FOUND', async () => {
    fetchMock.mockResolvedValue(new Response('Not Found', { status: 404 }));

    const client = new PackageIndexClient(BASE_URL);
    await expect(client.getPackageInfo('torch', '9.9.9')).rejects.toMatchObject({
      code: ErrorCodes.INDEX_NOT_FOUND,
      message: 'Not found: torch 9.9.9',
    });
  });

  it('maps other error statuses to INDEX_HTTP_ERROR', async () => {
    fetchMock.mockResolvedValue(new Response('oops', { status: 503, statusText: 'Service Unavailable' }));

    const client = new PackageIndexClient(BASE_URL);
    await expect(client.getPackageInfo('torch')).rejects.toMatchObject({
      code: ErrorCodes.INDEX_HTTP_ERROR,
      message: 'Index error (503): Service Unavailable',
    });
  });

  it('maps connection failures to INDEX_NETWORK_ERROR', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const client = new PackageIndexClient(BASE_URL);
    const error = await client.getPackageInfo('torch').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CatalogError);
    expect(error).toMatchObject({ code: ErrorCodes.INDEX_NETWORK_ERROR });
  });

  it('reports a timed-out request as INDEX_NETWORK_ERROR', async () => {
    fetchMock.mockRejectedValue(new DOMException('This operation was aborted', 'AbortError'));

    const client = new PackageIndexClient(BASE_URL, 5000);
    await expect(client.getPackageInfo('torch')).rejects.toMatchObject({
      code: ErrorCodes.INDEX_NETWORK_ERROR,
      message: 'Request timeout: index did not respond within 5 seconds',
    });
  });

  it('rejects bodies that are not JSON', async () => {
    fetchMock.mockResolvedValue(new Response('<html></html>', { status: 200 }));

    const client = new PackageIndexClient(BASE_URL);
    await expect(client.getPackageInfo('torch')).rejects.toMatchObject({
      code: ErrorCodes.INDEX_INVALID_RESPONSE,
    });
  });

  it('requires releases when listing versions', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ info: { name: 'torch', version: '2.8.0' }, urls: [] }));

    const client = new PackageIndexClient(BASE_URL);
    await expect(client.listReleases('torch', '2.')).rejects.toMatchObject({
      code: ErrorCodes.INDEX_INVALID_RESPONSE,
      message: "Invalid index response: missing 'releases' field",
    });
  });

  describe('downloadFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'cudarch-download-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('streams the body to disk and reports progress', async () => {
      fetchMock.mockResolvedValue(
        new Response(new Uint8Array([1, 2, 3, 4, 5, 6]), { headers: { 'content-length': '6' } })
      );
      const progress = vi.fn();
      const destination = join(tempDir, 'file.whl');

      const client = new PackageIndexClient(BASE_URL);
      const bytes = await client.downloadFile('https://files.example.test/file.whl', destination, progress);

      expect(bytes).toBe(6);
      expect([...readFileSync(destination)]).toEqual([1, 2, 3, 4, 5, 6]);
      expect(progress).toHaveBeenLastCalledWith(6, 6);
    });

    it('reports a total of 0 without content-length', async () => {
      const response = new Response(new Uint8Array([1, 2, 3]));
      response.headers.delete('content-length');
      fetchMock.mockResolvedValue(response);
      const progress = vi.fn();

      const client = new PackageIndexClient(BASE_URL);
      const bytes = await client.downloadFile('https://files.example.test/file.whl', join(tempDir, 'file.whl'), progress);

      expect(bytes).toBe(3);
      expect(progress).toHaveBeenLastCalledWith(3, 0);
    });

    it('passes the abort signal to fetch', async () => {
      fetchMock.mockResolvedValue(new Response(new Uint8Array([1])));
      const controller = new AbortController();

      const client = new PackageIndexClient(BASE_URL);
      await client.downloadFile('https://files.example.test/file.whl', join(tempDir, 'file.whl'), undefined, controller.signal);

      expect(fetchMock).toHaveBeenCalledWith(
        'https://files.example.test/file.whl',
        expect.objectContaining({ signal: controller.signal })
      );
    });

    it('fails with DOWNLOAD_FAILED on an error status', async () => {
      fetchMock.mockResolvedValue(new Response('gone', { status: 410 }));

      const client = new PackageIndexClient(BASE_URL);
      await expect(
        client.downloadFile('https://files.example.test/file.whl', join(tempDir, 'file.whl'))
      ).rejects.toMatchObject({ code: ErrorCodes.DOWNLOAD_FAILED });
    });
  });
});

describe('parsePackageInfo', () => {
  it('drops malformed file entries and defaults missing sizes', () => {
    const info = parsePackageInfo({
      info: { name: 'torch', version: '2.8.0' },
      urls: [{ filename: 'a.whl', url: 'https://files.example.test/a.whl', packagetype: 'bdist_wheel' }, { nope: true }],
    });

    expect(info.urls).toEqual([
      { filename: 'a.whl', url: 'https://files.example.test/a.whl', packagetype: 'bdist_wheel', size: 0 },
    ]);
  });

  it('rejects documents without info', () => {
    expect(() => parsePackageInfo({ urls: [] })).toThrow("Invalid index response: missing 'info' field");
  });
});
