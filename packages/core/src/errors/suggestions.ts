/**
 * Suggestion helpers for unknown-field errors.
 * Pure functions, no state.
 */

/**
 * Simple edit-distance-like function (MVP). Not full Levenshtein: we
 * approximate distance by counting positional char differences plus the
 * absolute length delta. Good enough for small typos.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (longer.length === 0) return shorter.length;
  if (shorter.length === 0) return longer.length;

  let distance = Math.abs(a.length - b.length);
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Return up to 3 close matches for a misspelt field name.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(input, option),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}
