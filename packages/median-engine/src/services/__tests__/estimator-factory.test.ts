import { describe, it, expect } from 'vitest';
import { createEstimator } from '../estimator-factory.js';
import { TwoHeapMedian } from '../../algorithms/two-heap-median.js';
import { HybridMedian } from '../../algorithms/hybrid-median.js';

describe('createEstimator()', () => {
  it('should build the exact estimator', () => {
    const estimator = createEstimator({ strategy: 'exact', seed_threshold: 64, tracker: 'p2' });
    expect(estimator).toBeInstanceOf(TwoHeapMedian);
  });

  it('should build the hybrid estimator with its options', () => {
    const estimator = createEstimator({ strategy: 'hybrid', seed_threshold: 10, tracker: 'tdigest' });

    expect(estimator).toBeInstanceOf(HybridMedian);
    if (estimator instanceof HybridMedian) {
      expect(estimator.seedThreshold).toBe(10);
    }
  });

  it('should return a fresh instance every call', () => {
    const config = { strategy: 'exact', seed_threshold: 64, tracker: 'p2' } as const;
    const a = createEstimator(config);
    const b = createEstimator(config);

    a.add(1);
    expect(b.median()).toBeNull();
  });
});
