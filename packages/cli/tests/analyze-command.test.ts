import { describe, it, expect, vi, beforeEach, afterEach, type Mock, type MockInstance } from 'vitest';
import { existsSync, mkdtempSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import JSZip from 'jszip';
import { ExecError, type ExecFn } from '@cudarch/catalog';
import { analyzeCommand } from '../src/commands/analyze.js';
import { logger } from '../src/lib/logger.js';

const INDEX = 'https://index.example.test/pypi';
const LINUX_WHEEL = 'torch-2.8.0-cp312-cp312-manylinux_2_28_x86_64.whl';
const MAC_WHEEL = 'torch-2.8.0-cp312-none-macosx_11_0_arm64.whl';
const WHEEL_URL = `https://files.example.test/${LINUX_WHEEL}`;

const LISTING = ['Fatbin elf code:', 'arch = sm_80', 'Fatbin ptx code:', 'arch = sm_90'].join('\n');

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { headers: { 'content-type': 'application/json' } });
}

describe('analyze command', () => {
  let tempDir: string;
  let wheel: Buffer;
  let fetchMock: Mock<[string, RequestInit?], Promise<Response>>;
  let onWheelFetch: ((init?: RequestInit) => void) | null;
  let exec: Mock<Parameters<ExecFn>, ReturnType<ExecFn>>;
  let logSpy: MockInstance<Parameters<typeof console.log>, ReturnType<typeof console.log>>;

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'cudarch-analyze-'));
    mkdirSync(join(tempDir, 'scratch'));
    writeFileSync(join(tempDir, 'cudarch.config.yaml'), `index:\n  url: ${INDEX}\n`);

    const zip = new JSZip();
    zip.file('torch/lib/libtorch_cuda.so', 'ELF');
    zip.file('torch/__init__.py', '');
    wheel = await zip.generateAsync({ type: 'nodebuffer' });

    onWheelFetch = null;
    fetchMock = vi.fn(async (url: string, init?: RequestInit) => {
      switch (url) {
        case `${INDEX}/torch/json`:
          return jsonResponse({
            info: { name: 'torch', version: '2.8.0' },
            urls: [],
            releases: { '1.13.1': [], '2.8.0': [], '2.9.0rc1': [] },
          });
        case `${INDEX}/torch/2.8.0/json`:
          return jsonResponse({
            info: { name: 'torch', version: '2.8.0' },
            urls: [
              { filename: LINUX_WHEEL, url: WHEEL_URL, size: 1024, packagetype: 'bdist_wheel' },
              { filename: MAC_WHEEL, url: 'https://files.example.test/mac.whl', size: 1024, packagetype: 'bdist_wheel' },
              { filename: 'torch-2.8.0.tar.gz', url: 'https://files.example.test/sdist', size: 1024, packagetype: 'sdist' },
            ],
          });
        case WHEEL_URL:
          onWheelFetch?.(init);
          return new Response(new Uint8Array(wheel), { headers: { 'content-length': String(wheel.length) } });
        default:
          return new Response('Not Found', { status: 404 });
      }
    });
    vi.stubGlobal('fetch', fetchMock);

    exec = vi.fn<Parameters<ExecFn>, ReturnType<ExecFn>>().mockResolvedValue({ stdout: LISTING, stderr: '' });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.configure({ silent: true });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    process.exitCode = undefined;
    logger.configure({});
    logSpy.mockRestore();
    rmSync(tempDir, { recursive: true, force: true });
  });

  function deps(answer = true) {
    return {
      confirm: vi.fn(async () => answer),
      exec,
      tmpRoot: join(tempDir, 'scratch'),
    };
  }

  it('analyzes every stable release and writes the pip table', async () => {
    const injected = deps();

    await analyzeCommand({ config: tempDir }, injected);

    expect(injected.confirm).toHaveBeenCalledWith('Do you want to proceed? (y/N): ');
    expect(exec).toHaveBeenCalledTimes(1);
    expect(exec.mock.calls[0]?.[0]).toBe('cuobjdump');
    expect(readFileSync(join(tempDir, 'table_pip.md'), 'utf-8')).toBe(
      `| package | architectures |\n|---------|---------------|\n| ${LINUX_WHEEL} | sm_80, sm_90 |\n`
    );

    const stored = JSON.parse(readFileSync(join(tempDir, '.cudarch', 'results.json'), 'utf-8'));
    expect(Object.keys(stored.results)).toEqual([`pip:${LINUX_WHEEL}`]);
    expect(stored.results[`pip:${LINUX_WHEEL}`]).toMatchObject({
      status: 'analyzed',
      packageVersion: '2.8.0',
      pythonVersion: '3.12',
      elf: ['sm_80'],
      ptx: ['sm_90'],
      libraries: ['torch/lib/libtorch_cuda.so'],
    });
  });

  it('prints the final summary', async () => {
    await analyzeCommand({ config: tempDir, yes: true }, deps());

    expect(logSpy).toHaveBeenCalledWith('Total torch versions processed: 1');
    expect(logSpy).toHaveBeenCalledWith('Total wheel files analyzed: 1');
  });

  it('stops without downloading when the user declines', async () => {
    await analyzeCommand({ config: tempDir }, deps(false));

    expect(fetchMock).not.toHaveBeenCalledWith(WHEEL_URL, expect.anything());
    expect(exec).not.toHaveBeenCalled();
    expect(existsSync(join(tempDir, 'table_pip.md'))).toBe(false);
  });

  it('only asks the index about the requested releases', async () => {
    await analyzeCommand({ config: tempDir, release: ['2.8.0'], yes: true }, deps());

    const urls = fetchMock.mock.calls.map(([url]) => url);
    expect(urls).toEqual([`${INDEX}/torch/2.8.0/json`, WHEEL_URL]);
  });

  it('skips stored wheels with --resume', async () => {
    await analyzeCommand({ config: tempDir, yes: true }, deps());
    exec.mockClear();

    await analyzeCommand({ config: tempDir, yes: true, resume: true }, deps());

    expect(exec).not.toHaveBeenCalled();
  });

  it('records a failed inspection and keeps the run going', async () => {
    exec.mockRejectedValue(new ExecError('Command failed: cuobjdump', 1, '', 'no fatbin'));

    await analyzeCommand({ config: tempDir, yes: true }, deps());

    const stored = JSON.parse(readFileSync(join(tempDir, '.cudarch', 'results.json'), 'utf-8'));
    expect(stored.results[`pip:${LINUX_WHEEL}`].status).toBe('failed');
    expect(readFileSync(join(tempDir, 'table_pip.md'), 'utf-8')).toBe(
      `| package | architectures |\n|---------|---------------|\n| ${LINUX_WHEEL} |  |\n`
    );
  });

  it('retries failed wheels with --resume', async () => {
    onWheelFetch = () => {
      throw new TypeError('fetch failed');
    };
    await analyzeCommand({ config: tempDir, yes: true }, deps());
    const afterFailure = JSON.parse(readFileSync(join(tempDir, '.cudarch', 'results.json'), 'utf-8'));
    expect(afterFailure.results[`pip:${LINUX_WHEEL}`].status).toBe('failed');

    onWheelFetch = null;
    await analyzeCommand({ config: tempDir, yes: true, resume: true }, deps());

    const wheelFetches = fetchMock.mock.calls.filter(([url]) => url === WHEEL_URL);
    expect(wheelFetches).toHaveLength(2);
    const stored = JSON.parse(readFileSync(join(tempDir, '.cudarch', 'results.json'), 'utf-8'));
    expect(stored.results[`pip:${LINUX_WHEEL}`].status).toBe('analyzed');
    expect(stored.results[`pip:${LINUX_WHEEL}`].architectures).toEqual(['sm_80', 'sm_90']);
  });

  it('cleans up and stops when interrupted during a download', async () => {
    const existing = process.listeners('SIGINT');
    onWheelFetch = (init) => {
      for (const listener of process.listeners('SIGINT')) {
        if (!existing.includes(listener)) listener('SIGINT');
      }
      init?.signal?.throwIfAborted();
    };

    await analyzeCommand({ config: tempDir, yes: true }, deps());

    expect(process.exitCode).toBe(130);
    expect(exec).not.toHaveBeenCalled();
    expect(readdirSync(join(tempDir, 'scratch'))).toEqual([]);
    expect(existsSync(join(tempDir, '.cudarch', 'results.json'))).toBe(false);
    expect(existsSync(join(tempDir, 'table_pip.md'))).toBe(false);
    expect(process.listeners('SIGINT')).toEqual(existing);
  });

  it('keeps the summary off stdout when the table goes there', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await analyzeCommand({ config: tempDir, yes: true, out: '-' }, deps());

    expect(writeSpy).toHaveBeenCalledWith(
      `| package | architectures |\n|---------|---------------|\n| ${LINUX_WHEEL} | sm_80, sm_90 |\n`
    );
    writeSpy.mockRestore();
    expect(logSpy).not.toHaveBeenCalledWith('Total wheel files analyzed: 1');
  });

  it('writes only JSON lines in json mode', async () => {
    logger.configure({ json: true });

    await analyzeCommand({ config: tempDir, yes: true }, deps());

    const lines = logSpy.mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(lines.map(({ message }) => message)).toContain('Total wheel files analyzed: 1');
  });
});
