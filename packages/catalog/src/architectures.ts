/**
 * Architecture extraction from cuobjdump listings
 *
 * cuobjdump prints one block per embedded image:
 *
 *   Fatbin elf code:
 *   ================
 *   arch = sm_80
 *   code version = [1,7]
 *   ...
 *
 *   Fatbin ptx code:
 *   ================
 *   arch = sm_90
 */

import type { ArchitectureReport } from './types.js';

const ARCH_TOKEN = /sm_\d+[a-z]*/g;
const ARCH_PARTS = /^sm_(\d+)([a-z]*)$/;

type Section = 'elf' | 'ptx';

function sectionOf(line: string): Section | null {
  if (/fatbin\s+elf\s+code/.test(line)) return 'elf';
  if (/fatbin\s+ptx\s+code/.test(line)) return 'ptx';
  return null;
}

/**
 * Order by numeric capability, then suffix: sm_86 < sm_90 < sm_90a < sm_100
 */
export function compareArchitectures(a: string, b: string): number {
  const left = ARCH_PARTS.exec(a);
  const right = ARCH_PARTS.exec(b);
  if (!left || !right) {
    if (left) return -1;
    if (right) return 1;
    return a.localeCompare(b);
  }

  const diff = Number(left[1]) - Number(right[1]);
  if (diff !== 0) return diff;
  return (left[2] ?? '').localeCompare(right[2] ?? '');
}

export function sortArchitectures(archs: Iterable<string>): string[] {
  return [...new Set(archs)].sort(compareArchitectures);
}

function archTokens(line: string): string[] {
  return line.match(ARCH_TOKEN) ?? [];
}

/**
 * Read the architectures out of an inspector listing.
 *
 * Lines mentioning `arch` are used first; when there are none, any line
 * containing `sm_` is used instead.
 */
export function parseInspectorOutput(output: string): ArchitectureReport {
  const elf = new Set<string>();
  const ptx = new Set<string>();
  const all = new Set<string>();
  const matchedLines: string[] = [];
  let section: Section | null = null;

  const lines = output.split(/\r?\n/).map((line) => line.trim());

  for (const line of lines) {
    const lower = line.toLowerCase();
    section = sectionOf(lower) ?? section;
    if (!lower.includes('arch')) continue;

    matchedLines.push(line);
    for (const arch of archTokens(line)) {
      all.add(arch);
      if (section === 'elf') elf.add(arch);
      if (section === 'ptx') ptx.add(arch);
    }
  }

  if (matchedLines.length === 0) {
    for (const line of lines) {
      if (!line.toLowerCase().includes('sm_')) continue;
      matchedLines.push(line);
      for (const arch of archTokens(line)) all.add(arch);
    }
  }

  return {
    elf: sortArchitectures(elf),
    ptx: sortArchitectures(ptx),
    all: sortArchitectures(all),
    matchedLines,
  };
}

export function mergeReports(reports: ArchitectureReport[]): ArchitectureReport {
  return {
    elf: sortArchitectures(reports.flatMap((report) => report.elf)),
    ptx: sortArchitectures(reports.flatMap((report) => report.ptx)),
    all: sortArchitectures(reports.flatMap((report) => report.all)),
    matchedLines: reports.flatMap((report) => report.matchedLines),
  };
}

/**
 * `sm_86` → `8.6`, `sm_90a` → `9.0a`, `sm_100` → `10.0`
 */
export function toComputeCapability(arch: string): string | null {
  const match = ARCH_PARTS.exec(arch);
  if (!match) return null;
  const digits = match[1];
  if (!digits || digits.length < 2) return null;
  return `${Number(digits.slice(0, -1))}.${digits.slice(-1)}${match[2] ?? ''}`;
}
