/**
 * Version Comparator
 *
 * Token-wise comparison used for every "is local older than upstream"
 * decision. It is a token-wise simplification, not semantic versioning:
 *
 * - a trailing `-RELEASE`, `_FINAL`, `-GA` (any case) is ignored
 * - the rest is split on `.`, `_` and `-`
 * - integer tokens compare numerically at any length, anything else by code point
 * - an equal prefix makes the longer sequence greater (`1.0 < 1.0.0`)
 *
 * Malformed input never throws; every token is either a number or a string.
 */

export type VersionToken = bigint | string;

const RELEASE_SUFFIX = /[-_](RELEASE|FINAL|GA)$/i;
const DELIMITERS = /[._-]/;
const INTEGER_TOKEN = /^\s*\+?\d+\s*$/;
const DIGITS_ONLY = /^\d+$/;

// Timestamp-style tokens exceed Number.MAX_SAFE_INTEGER
function toInteger(part: string): bigint {
  return BigInt(part.trim().replace(/^\+/, ''));
}

/**
 * Split a version into comparable tokens after stripping a release qualifier
 */
export function normalizeVersion(version: string): VersionToken[] {
  return version
    .replace(RELEASE_SUFFIX, '')
    .split(DELIMITERS)
    .map((part) => (INTEGER_TOKEN.test(part) ? toInteger(part) : part));
}

/**
 * Compare two token sequences
 *
 * Both numbers: numeric order. Otherwise: string forms by code point.
 */
export function compareTokens(a: readonly VersionToken[], b: readonly VersionToken[]): -1 | 0 | 1 {
  const shared = Math.min(a.length, b.length);

  for (let i = 0; i < shared; i++) {
    const left = a[i];
    const right = b[i];

    if (typeof left === 'bigint' && typeof right === 'bigint') {
      if (left !== right) {
        return left < right ? -1 : 1;
      }
      continue;
    }

    const leftStr = String(left);
    const rightStr = String(right);
    if (leftStr !== rightStr) {
      return leftStr < rightStr ? -1 : 1;
    }
  }

  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  return 0;
}

/**
 * Compare two version strings
 *
 * @returns -1 if `a` is older, 0 if equal, 1 if `a` is newer
 *
 * @example
 * ```typescript
 * compareVersions('1.2.0', '1.10.0');      // -1
 * compareVersions('2.0.0-RELEASE', '2.0.0'); // 0
 * compareVersions('1.0', '1.0.0');         // -1
 * ```
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  return compareTokens(normalizeVersion(a), normalizeVersion(b));
}

/**
 * Tokenize the way the bundle hub's version picker does: no qualifier
 * stripping, and only all-digit tokens count as numbers
 */
export function tokenizeBundleHubVersion(version: string): VersionToken[] {
  return version
    .split(DELIMITERS)
    .map((part) => (DIGITS_ONLY.test(part) ? toInteger(part) : part));
}

/**
 * Order used to pick the newest file from a bundle hub listing
 *
 * Mixed numeric/alpha tokens at the same position compare by their string
 * forms, so `1.10` vs `1.x` is decided lexicographically.
 */
export function compareBundleHubVersions(a: string, b: string): -1 | 0 | 1 {
  return compareTokens(tokenizeBundleHubVersion(a), tokenizeBundleHubVersion(b));
}

/**
 * Pick the maximum version; the first of several equal maxima wins
 */
export function maxVersion(
  versions: readonly string[],
  compare: (a: string, b: string) => number = compareVersions
): string | undefined {
  let best: string | undefined;
  for (const version of versions) {
    if (best === undefined || compare(version, best) > 0) {
      best = version;
    }
  }
  return best;
}
