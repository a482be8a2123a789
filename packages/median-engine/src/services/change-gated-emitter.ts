import {
  formatMedian,
  hasMedianChanged,
  type EmissionRecord,
} from '@price-median/shared';

// =============================================================================
// Change-Gated Emitter
// =============================================================================

/**
 * Forwards a (timestamp, median) pair only when its formatted median differs
 * from the last one forwarded.
 *
 * The only state is the last emitted string, held per instance, so
 * independent pipelines never share it.
 */
export class ChangeGatedEmitter {
  private last: string | null = null;

  constructor(private readonly decimals?: number) {}

  /**
   * Offer the median observed at `timestamp`.
   *
   * @returns The record to write, or null when the median is undefined or
   *   formats the same as the previous emission
   */
  offer(timestamp: bigint, median: number | null): EmissionRecord | null {
    if (median === null) {
      return null;
    }

    const formattedMedian = formatMedian(median, this.decimals);
    if (!hasMedianChanged(this.last, formattedMedian)) {
      return null;
    }

    this.last = formattedMedian;
    return { timestamp, formattedMedian };
  }

  lastEmitted(): string | null {
    return this.last;
  }

  reset(): void {
    this.last = null;
  }
}
