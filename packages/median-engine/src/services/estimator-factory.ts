import type { MedianConfig } from '@price-median/shared';
import type { MedianEstimator } from '../types.js';
import { TwoHeapMedian } from '../algorithms/two-heap-median.js';
import { HybridMedian } from '../algorithms/hybrid-median.js';

/**
 * Build the estimator named by the `[median]` config table
 */
export function createEstimator(config: MedianConfig): MedianEstimator {
  switch (config.strategy) {
    case 'exact':
      return new TwoHeapMedian();
    case 'hybrid':
      return new HybridMedian({
        seedThreshold: config.seed_threshold,
        tracker: config.tracker,
      });
  }
}
