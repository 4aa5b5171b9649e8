/**
 * Release version filtering and ordering
 */

const STABLE_VERSION = /^\d+(\.\d+)*$/;

/**
 * A stable release is plain dot-separated integers: no rc, dev, a, b
 * or post segments.
 */
export function isStableRelease(version: string): boolean {
  return STABLE_VERSION.test(version);
}

function toParts(version: string): number[] {
  return version.split('.').map((part) => Number.parseInt(part, 10) || 0);
}

/** Numeric component-wise comparison; missing components count as 0 */
export function compareVersions(a: string, b: string): number {
  const left = toParts(a);
  const right = toParts(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Stable releases starting with `prefix`, newest first
 */
export function filterReleases(versions: Iterable<string>, prefix: string): string[] {
  return [...new Set(versions)]
    .filter((version) => version.startsWith(prefix) && isStableRelease(version))
    .sort((a, b) => compareVersions(b, a));
}
