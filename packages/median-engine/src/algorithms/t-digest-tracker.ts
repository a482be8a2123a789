import tdigest from 'tdigest';
import { MEDIAN_DEFAULTS } from '@price-median/shared';
import type { QuantileTracker } from '../types.js';

// =============================================================================
// T-Digest Quantile Tracker
// =============================================================================

type Digest = InstanceType<typeof tdigest.TDigest>;

/**
 * Quantile tracker backed by a t-digest.
 *
 * Memory grows with the number of centroids (roughly 1/delta), not with the
 * number of samples. The digest shuffles its centroids when it recompresses,
 * so estimates past the compression point can vary between runs on the same
 * input; use {@link P2Quantile} where the output must be reproducible.
 */
export class TDigestTracker implements QuantileTracker {
  readonly quantile: number;
  private readonly digest: Digest;
  // digest.size() counts centroids, and equal values share one
  private pushed = 0;

  constructor(quantile: number = 0.5, delta: number = MEDIAN_DEFAULTS.TDIGEST_DELTA) {
    if (!(quantile > 0 && quantile < 1)) {
      throw new RangeError(`Quantile must be in (0, 1), got ${quantile}`);
    }
    this.quantile = quantile;
    this.digest = new tdigest.TDigest(delta);
  }

  push(value: number): void {
    this.digest.push(value);
    this.pushed += 1;
  }

  estimate(): number | null {
    if (this.pushed === 0) {
      return null;
    }

    const estimate = this.digest.percentile(this.quantile);
    return typeof estimate === 'number' && Number.isFinite(estimate) ? estimate : null;
  }

  count(): number {
    return this.pushed;
  }
}
