import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { existsSync, mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { tableCommand } from '../src/commands/table.js';
import { logger } from '../src/lib/logger.js';

function storedResult(channel: 'pip' | 'local', filename: string, packageVersion: string, architectures: string[]) {
  return {
    channel,
    filename,
    packageVersion,
    pythonVersion: '3.12',
    status: 'analyzed',
    architectures,
    elf: architectures,
    ptx: [],
    libraries: [],
    warnings: [],
    analyzedAt: '2025-08-01T12:00:00.000Z',
  };
}

describe('table command', () => {
  let tempDir: string;
  let logSpy: MockInstance<Parameters<typeof console.log>, ReturnType<typeof console.log>>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cudarch-table-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.configure({ silent: true });

    const results = [
      storedResult('pip', 'torch-2.7.1-cp312-cp312-manylinux_2_28_x86_64.whl', '2.7.1', ['sm_50', 'sm_120']),
      storedResult('pip', 'torch-2.8.0-cp312-cp312-manylinux_2_28_x86_64.whl', '2.8.0', ['sm_75', 'sm_90']),
      storedResult('local', 'pytorch-2.5.1-py3.12_cuda12.4', '2.5.1', ['sm_86']),
    ];
    mkdirSync(join(tempDir, '.cudarch'));
    writeFileSync(
      join(tempDir, '.cudarch', 'results.json'),
      JSON.stringify({
        schemaVersion: '1.0.0',
        toolVersion: '0.1.0',
        updatedAt: '2025-08-01T12:00:00.000Z',
        results: Object.fromEntries(results.map((r) => [`${r.channel}:${r.filename}`, r])),
      })
    );
  });

  afterEach(() => {
    logger.configure({});
    logSpy.mockRestore();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes the pip table by default', async () => {
    await tableCommand({ config: tempDir });

    expect(readFileSync(join(tempDir, 'table_pip.md'), 'utf-8')).toBe(
      [
        '| package | architectures |',
        '|---------|---------------|',
        '| torch-2.8.0-cp312-cp312-manylinux_2_28_x86_64.whl | sm_75, sm_90 |',
        '| torch-2.7.1-cp312-cp312-manylinux_2_28_x86_64.whl | sm_50, sm_120 |',
        '',
      ].join('\n')
    );
  });

  it('writes the local table in compute capability notation', async () => {
    await tableCommand({ config: tempDir, channel: 'local', notation: 'cc' });

    expect(readFileSync(join(tempDir, 'table.md'), 'utf-8')).toBe(
      '| package | architectures |\n|---------|---------------|\n| pytorch-2.5.1-py3.12_cuda12.4 | 8.6 |\n'
    );
    expect(existsSync(join(tempDir, 'table_pip.md'))).toBe(false);
  });

  it('honours an explicit output path', async () => {
    await tableCommand({ config: tempDir, out: 'docs/pip.md' });

    expect(existsSync(join(tempDir, 'docs', 'pip.md'))).toBe(true);
  });

  it('prints to stdout with --out -', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await tableCommand({ config: tempDir, channel: 'local', out: '-' });

    expect(writeSpy).toHaveBeenCalledWith(
      '| package | architectures |\n|---------|---------------|\n| pytorch-2.5.1-py3.12_cuda12.4 | sm_86 |\n'
    );
    writeSpy.mockRestore();
  });

  it('rejects an unknown channel', async () => {
    await expect(tableCommand({ config: tempDir, channel: 'conda' })).rejects.toThrow(
      'Unknown channel: conda (expected pip or local)'
    );
  });
});
