// =============================================================================
// Utility Exports
// =============================================================================

export {
  formatMedian,
  hasMedianChanged,
  formatEmissionRow,
} from './format.js';

export {
  createLogger,
  type Logger,
  type LoggerOptions,
} from './logger.js';
