// Edit distance

/**
 * Levenshtein distance between two strings (unit-cost insert, delete and
 * substitute). Callers lower-case their input; the comparison is exact.
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Keep the shorter string on the row
  if (a.length < b.length) {
    [a, b] = [b, a];
  }

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // substitution
        current[j - 1] + 1, // insertion
        previous[j] + 1 // deletion
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Largest distance accepted for a key of the given length:
 * 1 below five characters, otherwise a third of the length.
 */
export function distanceThreshold(length: number): number {
  return length < 5 ? 1 : Math.floor(length / 3);
}
