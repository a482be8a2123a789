import {
  createLogger,
  type EmissionRecord,
  type Observation,
} from '@price-median/shared';
import type { MedianEstimator } from '../types.js';
import { ChangeGatedEmitter } from './change-gated-emitter.js';

// =============================================================================
// Median Replay Service
// =============================================================================
//
// Feeds observations, already in replay order, through an estimator and
// forwards each change of the formatted median to a sink. Synchronous: the
// sink must not need to be awaited between rows.

const logger = createLogger('median-replay');

export type EmissionSink = (record: EmissionRecord) => void;

export interface ReplaySummary {
  observations: number;
  emitted: number;
  finalMedian: number | null;
}

export function replayMedians(
  observations: Iterable<Observation>,
  estimator: MedianEstimator,
  sink: EmissionSink
): ReplaySummary {
  const emitter = new ChangeGatedEmitter();
  let seen = 0;
  let emitted = 0;

  for (const observation of observations) {
    estimator.add(observation.value);
    seen++;

    const record = emitter.offer(observation.timestamp, estimator.median());
    if (record) {
      sink(record);
      emitted++;
    }
  }

  const summary: ReplaySummary = {
    observations: seen,
    emitted,
    finalMedian: estimator.median(),
  };

  logger.debug(summary, 'Replay complete');
  return summary;
}

/**
 * Replay into an array
 */
export function collectMedians(
  observations: Iterable<Observation>,
  estimator: MedianEstimator
): EmissionRecord[] {
  const records: EmissionRecord[] = [];
  replayMedians(observations, estimator, (record) => records.push(record));
  return records;
}
