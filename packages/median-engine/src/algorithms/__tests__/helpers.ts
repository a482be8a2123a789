/**
 * Deterministic pseudo-random values (LCG), so failures reproduce
 */
export function pseudoRandomValues(count: number, seed: number, range: number = 1000): number[] {
  const values: number[] = [];
  let state = seed >>> 0;
  for (let i = 0; i < count; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    values.push(Math.floor((state / 0x100000000) * range) - range / 4);
  }
  return values;
}

/**
 * Median by full sort
 */
export function sortedMedian(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1]! + sorted[mid]!) / 2 : sorted[mid]!;
}

/**
 * 1..n visited in a fixed scrambled order (step coprime with n)
 */
export function scrambledRange(n: number, step: number): number[] {
  return Array.from({ length: n }, (_, i) => ((i * step) % n) + 1);
}
