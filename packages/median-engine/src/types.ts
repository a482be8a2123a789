// =============================================================================
// Estimator Contracts
// =============================================================================

/**
 * Online median estimator.
 *
 * Implementations are synchronous and owned by a single caller; feeding the
 * same values in a different order changes the intermediate medians.
 */
export interface MedianEstimator {
  /** Add one observation */
  add(value: number): void;

  /** Current median, or null when nothing has been added yet */
  median(): number | null;

  /** Number of observations added since construction or the last reset */
  count(): number;

  /** Drop all state */
  reset(): void;
}

/**
 * Constant-memory tracker of a single quantile over a stream
 */
export interface QuantileTracker {
  /** Target quantile in (0, 1) */
  readonly quantile: number;

  push(value: number): void;

  /** Current estimate, or null when the tracker is empty */
  estimate(): number | null;

  /** Number of values pushed so far */
  count(): number;
}
