// =============================================================================
// Algorithm Exports
// =============================================================================

export {
  BinaryHeap,
  minFirst,
  maxFirst,
  type HeapComparator,
} from './binary-heap.js';

export { TwoHeapMedian } from './two-heap-median.js';

export {
  selectInPlace,
  bufferMedian,
} from './quickselect.js';

export {
  P2Quantile,
  type P2State,
} from './p2-quantile.js';

export { TDigestTracker } from './t-digest-tracker.js';

export {
  HybridMedian,
  type HybridMedianOptions,
  type HybridMode,
} from './hybrid-median.js';
