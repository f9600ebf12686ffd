/**
 * Levenshtein distance and fuzzy matching for field and symbol names.
 */

/**
 * Compute the Levenshtein edit distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  let prev = Array.from({ length: lb + 1 }, (_, i) => i);
  let curr = new Array<number>(lb + 1);

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}

/**
 * Candidates within `maxDistance` of `target` (case-insensitive), closest
 * first. Exact matches are excluded; ties keep candidate order.
 */
export function findClosestMatches(
  target: string,
  candidates: readonly string[],
  maxDistance: number
): string[] {
  const needle = target.toLowerCase();
  return candidates
    .filter((c) => c.toLowerCase() !== needle)
    .map((c) => ({ name: c, distance: levenshteinDistance(needle, c.toLowerCase()) }))
    .filter((s) => s.distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .map((s) => s.name);
}

/** The single closest candidate, or undefined */
export function closestMatch(
  target: string,
  candidates: readonly string[],
  maxDistance: number
): string | undefined {
  return findClosestMatches(target, candidates, maxDistance)[0];
}
