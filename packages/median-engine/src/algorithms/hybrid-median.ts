import {
  MEDIAN_DEFAULTS,
  type QuantileTrackerKind,
} from '@price-median/shared';
import type { MedianEstimator, QuantileTracker } from '../types.js';
import { bufferMedian } from './quickselect.js';
import { P2Quantile } from './p2-quantile.js';
import { TDigestTracker } from './t-digest-tracker.js';

// =============================================================================
// Hybrid Buffer / Streaming Median
// =============================================================================

export interface HybridMedianOptions {
  /** Samples kept exactly before switching to the streaming tracker */
  seedThreshold?: number;
  /** Streaming tracker used after the switch */
  tracker?: QuantileTrackerKind;
}

export type HybridMode = 'buffering' | 'streaming';

type HybridState =
  | { mode: 'buffering'; buffer: number[] }
  | { mode: 'streaming'; tracker: QuantileTracker };

/**
 * Running median that is exact for small samples and bounded in memory for
 * large ones.
 *
 * While at most `seedThreshold` values have been added, they are kept in a
 * buffer and `median()` is the exact median (linear-time selection). The add
 * that would grow the buffer past `seedThreshold` seeds a streaming quantile
 * tracker with every buffered value in arrival order, drops the buffer, and
 * from then on every add is O(1).
 *
 * **After the switch the median is an approximation.** Its error depends on
 * the tracker and on the data distribution. The switch is one-way; only
 * `reset()` returns to buffering.
 *
 * @example
 * ```ts
 * const estimator = new HybridMedian({ seedThreshold: 4 });
 * for (const v of [9, 1, 8, 2]) estimator.add(v);
 * estimator.median(); // 5 (exact)
 * estimator.add(7);
 * estimator.mode();   // 'streaming'
 * ```
 */
export class HybridMedian implements MedianEstimator {
  readonly seedThreshold: number;
  private readonly trackerKind: QuantileTrackerKind;
  private state: HybridState = { mode: 'buffering', buffer: [] };
  private added = 0;

  constructor(options: HybridMedianOptions = {}) {
    const seedThreshold = options.seedThreshold ?? MEDIAN_DEFAULTS.SEED_THRESHOLD;
    if (!Number.isInteger(seedThreshold) || seedThreshold < 1) {
      throw new RangeError(`seedThreshold must be a positive integer, got ${seedThreshold}`);
    }
    this.seedThreshold = seedThreshold;
    this.trackerKind = options.tracker ?? MEDIAN_DEFAULTS.TRACKER;
  }

  add(value: number): void {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Median input must be finite, got ${value}`);
    }

    if (this.state.mode === 'buffering' && this.state.buffer.length >= this.seedThreshold) {
      this.state = { mode: 'streaming', tracker: this.seed(this.state.buffer) };
    }

    if (this.state.mode === 'buffering') {
      this.state.buffer.push(value);
    } else {
      this.state.tracker.push(value);
    }
    this.added++;
  }

  median(): number | null {
    return this.state.mode === 'buffering'
      ? bufferMedian(this.state.buffer)
      : this.state.tracker.estimate();
  }

  count(): number {
    return this.added;
  }

  mode(): HybridMode {
    return this.state.mode;
  }

  /**
   * Streaming tracker, once the estimator has switched
   */
  tracker(): QuantileTracker | null {
    return this.state.mode === 'streaming' ? this.state.tracker : null;
  }

  reset(): void {
    this.state = { mode: 'buffering', buffer: [] };
    this.added = 0;
  }

  private seed(buffer: readonly number[]): QuantileTracker {
    const tracker = this.createTracker();
    for (const value of buffer) {
      tracker.push(value);
    }
    return tracker;
  }

  private createTracker(): QuantileTracker {
    switch (this.trackerKind) {
      case 'p2':
        return new P2Quantile(MEDIAN_DEFAULTS.TARGET_QUANTILE);
      case 'tdigest':
        return new TDigestTracker(MEDIAN_DEFAULTS.TARGET_QUANTILE);
    }
  }
}
