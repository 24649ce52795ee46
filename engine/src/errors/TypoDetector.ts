/**
 * Typo Detection
 *
 * String similarity used to suggest the intended field name when a graph
 * file contains an unknown one.
 *
 * @module errors
 */

/**
 * Levenshtein edit distance, computed with two rolling rows
 */
function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Case-insensitive similarity in [0, 1]
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a.toLowerCase(), b.toLowerCase()) / longest;
}

/**
 * Candidates at or above the threshold, best first
 */
export function findMatches(
  input: string,
  candidates: readonly string[],
  maxResults: number = 3,
  threshold: number = 0.5
): string[] {
  return candidates
    .map(candidate => ({ candidate, score: similarity(input, candidate) }))
    .filter(match => match.score >= threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, maxResults)
    .map(match => match.candidate);
}

export function isLikelyTypo(input: string, target: string): boolean {
  return similarity(input, target) >= 0.7;
}
