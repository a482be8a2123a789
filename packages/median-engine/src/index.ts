// =============================================================================
// @price-median/median-engine - Main Entry Point
// =============================================================================

export * from './algorithms/index.js';
export type { MedianEstimator, QuantileTracker } from './types.js';
export { ChangeGatedEmitter } from './services/change-gated-emitter.js';
export {
  replayMedians,
  collectMedians,
  type EmissionSink,
  type ReplaySummary,
} from './services/median-replay.service.js';
export { createEstimator } from './services/estimator-factory.js';
