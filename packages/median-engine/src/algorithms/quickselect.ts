// =============================================================================
// Selection
// =============================================================================

/**
 * Reorder `values` in place so that `values[k]` holds the k-th smallest
 * element, everything before it is `<=` and everything after it is `>=`.
 *
 * Iterative quickselect with a median-of-three pivot and a three-way
 * partition, so runs of equal values do not degrade it. Expected O(n).
 */
export function selectInPlace(values: number[], k: number): void {
  if (!Number.isInteger(k) || k < 0 || k >= values.length) {
    throw new RangeError(`Selection index ${k} out of range for ${values.length} values`);
  }

  let lo = 0;
  let hi = values.length - 1;

  while (lo < hi) {
    const pivot = medianOfThree(values[lo]!, values[(lo + hi) >> 1]!, values[hi]!);

    // [lo, lt) < pivot, [lt, gt] === pivot, (gt, hi] > pivot
    let lt = lo;
    let gt = hi;
    let i = lo;
    while (i <= gt) {
      const value = values[i]!;
      if (value < pivot) {
        swap(values, lt++, i++);
      } else if (value > pivot) {
        swap(values, i, gt--);
      } else {
        i++;
      }
    }

    if (k < lt) {
      hi = lt - 1;
    } else if (k > gt) {
      lo = gt + 1;
    } else {
      return;
    }
  }
}

/**
 * Exact median of an unordered buffer, or null when it is empty.
 *
 * The buffer is copied, not reordered. For an even count the selected middle
 * element is averaged with the largest element of the partition below it;
 * this is only the true lower median because selection leaves every element
 * `<=` the middle one on its left. Any replacement selection routine must
 * keep that partition guarantee.
 */
export function bufferMedian(buffer: readonly number[]): number | null {
  if (buffer.length === 0) {
    return null;
  }

  const values = [...buffer];
  const mid = values.length >> 1;
  selectInPlace(values, mid);

  const upperMiddle = values[mid]!;
  if (values.length % 2 === 1) {
    return upperMiddle;
  }

  let lowerMiddle = values[0]!;
  for (let i = 1; i < mid; i++) {
    lowerMiddle = Math.max(lowerMiddle, values[i]!);
  }

  return (lowerMiddle + upperMiddle) / 2;
}

function medianOfThree(a: number, b: number, c: number): number {
  if (a < b) {
    if (b < c) return b;
    return a < c ? c : a;
  }
  if (a < c) return a;
  return b < c ? c : b;
}

function swap(values: number[], i: number, j: number): void {
  const tmp = values[i]!;
  values[i] = values[j]!;
  values[j] = tmp;
}
