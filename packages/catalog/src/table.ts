/**
 * Markdown table rendering for catalogued results
 */

import { toComputeCapability } from './architectures.js';
import type { Channel, PackageResult } from './types.js';
import { compareVersions } from './versions.js';
import { comparePythonVersions } from './wheels.js';

export type ArchNotation = 'sm' | 'cc';

export const ARCH_NOTATIONS: readonly ArchNotation[] = ['sm', 'cc'];

export function isArchNotation(value: string): value is ArchNotation {
  return (ARCH_NOTATIONS as readonly string[]).includes(value);
}

export interface TableOptions {
  /** `sm` prints sm_86, `cc` prints 8.6 */
  notation?: ArchNotation;
  /** Only rows of this channel */
  channel?: Channel;
}

export const TABLE_HEADER = ['| package | architectures |', '|---------|---------------|'];

/**
 * Newest package version first, then Python version ascending
 */
export function compareResults(a: PackageResult, b: PackageResult): number {
  return (
    compareVersions(b.packageVersion, a.packageVersion) ||
    comparePythonVersions(a.pythonVersion, b.pythonVersion) ||
    a.filename.localeCompare(b.filename)
  );
}

export function formatArchitectures(archs: string[], notation: ArchNotation = 'sm'): string {
  if (notation === 'sm') return archs.join(', ');
  return archs.map((arch) => toComputeCapability(arch) ?? arch).join(', ');
}

export function generateTable(results: PackageResult[], options: TableOptions = {}): string {
  const rows = results
    .filter((result) => !options.channel || result.channel === options.channel)
    .sort(compareResults)
    .map((result) => `| ${result.filename} | ${formatArchitectures(result.architectures, options.notation)} |`);

  return [...TABLE_HEADER, ...rows].join('\n');
}

export interface VersionSummary {
  version: string;
  packages: number;
  failed: number;
}

export function summarizeByVersion(results: PackageResult[]): VersionSummary[] {
  const byVersion = new Map<string, VersionSummary>();
  for (const result of results) {
    const summary = byVersion.get(result.packageVersion) ?? { version: result.packageVersion, packages: 0, failed: 0 };
    summary.packages++;
    if (result.status === 'failed') summary.failed++;
    byVersion.set(result.packageVersion, summary);
  }
  return [...byVersion.values()].sort((a, b) => compareVersions(b.version, a.version));
}
