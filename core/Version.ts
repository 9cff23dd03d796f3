/**
 * Dotted numeric versions used to decide whether a config file is outdated.
 *
 * Components compare as integers from left to right; missing trailing
 * components and non-numeric components count as 0.
 */

export const DEFAULT_VERSION = "1.0.0";

export function parseVersion(version: string): number[] {
  return version.split(".").map((part) => {
    const trimmed = part.trim();
    return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
  });
}

export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l !== r) return l < r ? -1 : 1;
  }
  return 0;
}

/**
 * @example isOlderVersion("1.2", "1.2.0.1") // true
 */
export function isOlderVersion(current: string, latest: string): boolean {
  return compareVersions(current, latest) < 0;
}
