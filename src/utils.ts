/** Minimum similarity a payload key needs to stand in for a declared name. */
export const DEFAULT_MIN_SIMILARITY = 0.8;

/**
 * Levenshtein edit distance between two strings (single-row dynamic programming).
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Case-insensitive similarity in [0, 1]: `1 - distance / longer length`.
 * Identical names (ignoring case) score 1.
 */
export function similarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - editDistance(left, right) / longest;
}

/**
 * Picks the payload key that carries a declared property.
 *
 * 1. `expected` itself, when the payload has it verbatim.
 * 2. Otherwise, among keys not in `exclude`: the first case-insensitive match,
 *    or else the most similar key (earliest wins a tie).
 * 3. `expected` unchanged when no candidate reaches `minSimilarity`; the
 *    caller then treats the property as absent.
 *
 * @param expected    - Property name declared by the schema.
 * @param payloadKeys - Keys of the payload object.
 * @param exclude     - Keys that belong to other declared properties.
 */
export function matchKey(
  expected: string,
  payloadKeys: Iterable<string>,
  exclude: Iterable<string> = [],
  minSimilarity = DEFAULT_MIN_SIMILARITY,
): string {
  const keys = [...payloadKeys];
  // Fast path: exact match
  if (keys.includes(expected)) return expected;

  const excluded = new Set(exclude);
  const lower = expected.toLowerCase();
  let best: string | undefined;
  let bestScore = -1;

  for (const key of keys) {
    if (excluded.has(key)) continue;
    if (key.toLowerCase() === lower) return key;
    const score = similarity(expected, key);
    if (score > bestScore) {
      best = key;
      bestScore = score;
    }
  }

  return best !== undefined && bestScore >= minSimilarity ? best : expected;
}

/**
 * Splits `Namespace.Version.TypeName` at its last dot.
 * Returns an empty namespace for a bare name.
 */
export function splitQualifiedName(qualifiedName: string): { namespace: string; name: string } {
  const dot = qualifiedName.lastIndexOf('.');
  if (dot < 0) return { namespace: '', name: qualifiedName };
  return { namespace: qualifiedName.slice(0, dot), name: qualifiedName.slice(dot + 1) };
}

/**
 * Last path segment of a reference URI (`http://host/schemas/v1/Resource_v1.xml`
 * becomes `Resource_v1.xml`), ignoring any query or fragment.
 */
export function fileNameFromUri(uri: string): string {
  const path = uri.split(/[?#]/)[0];
  const segments = path.split('/').filter((s) => s.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : uri;
}
