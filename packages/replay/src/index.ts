import { EXIT_CODES, createLogger } from '@price-median/shared';
import { runReplay } from './run.js';

// =============================================================================
// Exports
// =============================================================================

export { runReplay, replayFromConfig, type RunOptions, type ReplayResult } from './run.js';
export { parseCliArgs, HELP_TEXT, type CliArgs } from './cli/args.js';
export { loadConfig, parseConfigText } from './config/config-loader.js';
export {
  readObservations,
  readCsvFile,
  listSourceFiles,
  matchesMasks,
  parseHeader,
  parseTimestamp,
  parsePrice,
  type ColumnIndexes,
} from './sources/csv-reader.js';
export { sequenceObservations, compareObservations } from './sources/observation-sequencer.js';
export { MedianFileWriter, ensureOutputDir } from './sinks/median-file-writer.js';
export {
  ReplayError,
  ConfigError,
  InputReadError,
  OutputDirError,
  OutputFileError,
  exitCodeFor,
} from './errors.js';

// =============================================================================
// CLI Entry Point
// =============================================================================

const logger = createLogger('price-median');

// Run if this is the main module
const isMainModule = import.meta.url.endsWith(process.argv[1]?.replace(/^file:\/\//, '') ?? '');
if (isMainModule || process.env.RUN_PRICE_MEDIAN === 'true') {
  runReplay(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      logger.fatal({ error }, 'Failed to run price median replay');
      process.exitCode = EXIT_CODES.UNHANDLED_ERROR;
    });
}
