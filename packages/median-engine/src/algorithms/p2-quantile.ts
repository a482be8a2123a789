import type { QuantileTracker } from '../types.js';

// =============================================================================
// P² Streaming Quantile Estimator
// =============================================================================
//
// Jain & Chlamtac, "The P² algorithm for dynamic calculation of quantiles and
// histograms without storing observations" (1985).
//
// Five markers track the minimum, the p/2, p and (1+p)/2 quantiles, and the
// maximum. Each push moves marker positions by at most one and adjusts marker
// heights with a piecewise-parabolic formula. Memory and update cost are
// constant; the estimate is approximate but deterministic for a given input.

const MARKER_COUNT = 5;

/**
 * P² state for persistence and inspection
 */
export interface P2State {
  quantile: number;
  count: number;
  heights: number[];
  positions: number[];
  desired: number[];
}

export class P2Quantile implements QuantileTracker {
  readonly quantile: number;
  private readonly increments: readonly number[];
  private heights: number[] = [];
  private positions: number[] = [];
  private desired: number[] = [];
  private n = 0;

  constructor(quantile: number = 0.5) {
    if (!(quantile > 0 && quantile < 1)) {
      throw new RangeError(`Quantile must be in (0, 1), got ${quantile}`);
    }
    this.quantile = quantile;
    this.increments = [0, quantile / 2, quantile, (1 + quantile) / 2, 1];
  }

  push(value: number): void {
    this.n++;

    // Warm-up: keep the first five samples sorted
    if (this.n <= MARKER_COUNT) {
      const at = this.heights.findIndex((h) => h > value);
      this.heights.splice(at === -1 ? this.heights.length : at, 0, value);

      if (this.n === MARKER_COUNT) {
        const p = this.quantile;
        this.positions = [0, 1, 2, 3, 4];
        this.desired = [0, 2 * p, 4 * p, 2 + 2 * p, 4];
      }
      return;
    }

    const h = this.heights;
    let cell: number;
    if (value < h[0]!) {
      h[0] = value;
      cell = 0;
    } else if (value >= h[4]!) {
      h[4] = value;
      cell = 3;
    } else {
      cell = 0;
      while (cell < 3 && value >= h[cell + 1]!) {
        cell++;
      }
    }

    for (let i = cell + 1; i < MARKER_COUNT; i++) {
      this.positions[i] = this.positions[i]! + 1;
    }
    for (let i = 0; i < MARKER_COUNT; i++) {
      this.desired[i] = this.desired[i]! + this.increments[i]!;
    }

    for (let i = 1; i <= 3; i++) {
      this.adjustMarker(i);
    }
  }

  estimate(): number | null {
    if (this.n === 0) {
      return null;
    }
    if (this.n < MARKER_COUNT) {
      return interpolatedQuantile(this.heights, this.quantile);
    }
    return this.heights[2]!;
  }

  count(): number {
    return this.n;
  }

  getState(): P2State {
    return {
      quantile: this.quantile,
      count: this.n,
      heights: [...this.heights],
      positions: [...this.positions],
      desired: [...this.desired],
    };
  }

  private adjustMarker(i: number): void {
    const n = this.positions;
    const q = this.heights;
    const offset = this.desired[i]! - n[i]!;

    const canMoveUp = offset >= 1 && n[i + 1]! - n[i]! > 1;
    const canMoveDown = offset <= -1 && n[i - 1]! - n[i]! < -1;
    if (!canMoveUp && !canMoveDown) {
      return;
    }

    const d = canMoveUp ? 1 : -1;
    const candidate = this.parabolic(i, d);

    if (q[i - 1]! < candidate && candidate < q[i + 1]!) {
      q[i] = candidate;
    } else {
      q[i] = this.linear(i, d);
    }
    n[i] = n[i]! + d;
  }

  private parabolic(i: number, d: number): number {
    const n = this.positions;
    const q = this.heights;
    const [nPrev, nCur, nNext] = [n[i - 1]!, n[i]!, n[i + 1]!];
    const [qPrev, qCur, qNext] = [q[i - 1]!, q[i]!, q[i + 1]!];

    return (
      qCur +
      (d / (nNext - nPrev)) *
        ((nCur - nPrev + d) * (qNext - qCur) / (nNext - nCur) +
          (nNext - nCur - d) * (qCur - qPrev) / (nCur - nPrev))
    );
  }

  private linear(i: number, d: number): number {
    const q = this.heights;
    const n = this.positions;
    return q[i]! + (d * (q[i + d]! - q[i]!)) / (n[i + d]! - n[i]!);
  }
}

/**
 * Linearly interpolated quantile of an already sorted, non-empty array
 */
function interpolatedQuantile(sorted: readonly number[], p: number): number {
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const fraction = position - lower;

  if (lower === upper) {
    return sorted[lower]!;
  }

  return sorted[lower]! * (1 - fraction) + sorted[upper]! * fraction;
}
