import type { Observation } from '@price-median/shared';

// =============================================================================
// Observation Sequencer
// =============================================================================

/**
 * Replay order: timestamp, then origin, then sequence within the origin
 */
export function compareObservations(a: Observation, b: Observation): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? -1 : 1;
  }
  if (a.origin !== b.origin) {
    return a.origin < b.origin ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

/**
 * Return the observations in replay order without touching the input array
 */
export function sequenceObservations(observations: readonly Observation[]): Observation[] {
  return [...observations].sort(compareObservations);
}
