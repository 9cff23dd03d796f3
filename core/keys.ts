/**
 * Key policy shared by the merge and by field lookup.
 *
 * Two keys are the same key when they match after lower-casing and dropping
 * `_`, `-` and whitespace, so `API_KEY`, `api-key` and `apiKey` collide.
 */

export const VERSION_KEY = "version";

export function normalizeKey(key: string): string {
  return key.replace(/[\s_-]/g, "").toLowerCase();
}

export function sameKey(a: string, b: string): boolean {
  return a === b || normalizeKey(a) === normalizeKey(b);
}

export function isVersionKey(key: string): boolean {
  return normalizeKey(key) === VERSION_KEY;
}

/**
 * Find the key in `keys` that matches `wanted`: exact spelling first, then the
 * first normalized match in order.
 */
export function findKey(
  keys: Iterable<string>,
  wanted: string,
): string | undefined {
  const normalized = normalizeKey(wanted);
  let fallback: string | undefined;

  for (const key of keys) {
    if (key === wanted) return key;
    if (fallback === undefined && normalizeKey(key) === normalized) {
      fallback = key;
    }
  }

  return fallback;
}
