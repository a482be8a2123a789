import type { MedianEstimator } from '../types.js';
import { BinaryHeap, maxFirst, minFirst } from './binary-heap.js';

// =============================================================================
// Exact Two-Heap Median
// =============================================================================

/**
 * Exact running median.
 *
 * The lower half of the values lives in a max-heap and the upper half in a
 * min-heap; after every add the two sizes differ by at most one, so the
 * median is read from the heap tops.
 *
 * - `add`: O(log n)
 * - `median`: O(1)
 * - memory: O(n)
 *
 * @example
 * ```ts
 * const estimator = new TwoHeapMedian();
 * estimator.add(1);
 * estimator.add(2);
 * estimator.median(); // 1.5
 * ```
 */
export class TwoHeapMedian implements MedianEstimator {
  private readonly lower = new BinaryHeap<number>(maxFirst);
  private readonly upper = new BinaryHeap<number>(minFirst);

  add(value: number): void {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Median input must be finite, got ${value}`);
    }

    const lowerMax = this.lower.peek();
    if (lowerMax === undefined || value <= lowerMax) {
      this.lower.push(value);
    } else {
      this.upper.push(value);
    }

    this.rebalance();
  }

  median(): number | null {
    const lowerMax = this.lower.peek();
    const upperMin = this.upper.peek();

    if (this.lower.size === this.upper.size) {
      if (lowerMax === undefined || upperMin === undefined) {
        return null;
      }
      return (lowerMax + upperMin) / 2;
    }

    return (this.lower.size > this.upper.size ? lowerMax : upperMin) ?? null;
  }

  count(): number {
    return this.lower.size + this.upper.size;
  }

  /**
   * Heap sizes, for checking the balance invariant
   */
  sizes(): { lower: number; upper: number } {
    return { lower: this.lower.size, upper: this.upper.size };
  }

  reset(): void {
    this.lower.clear();
    this.upper.clear();
  }

  private rebalance(): void {
    if (this.lower.size > this.upper.size + 1) {
      this.move(this.lower, this.upper);
    } else if (this.upper.size > this.lower.size + 1) {
      this.move(this.upper, this.lower);
    }
  }

  private move(from: BinaryHeap<number>, to: BinaryHeap<number>): void {
    const top = from.pop();
    if (top !== undefined) {
      to.push(top);
    }
  }
}
