import path from 'node:path';
import {
  EXIT_CODES,
  REPLAY_DEFAULTS,
  createLogger,
  type ExitCode,
} from '@price-median/shared';
import {
  createEstimator,
  replayMedians,
  type ReplaySummary,
} from '@price-median/median-engine';
import { HELP_TEXT, parseCliArgs } from './cli/args.js';
import { loadConfig } from './config/config-loader.js';
import { readObservations } from './sources/csv-reader.js';
import { sequenceObservations } from './sources/observation-sequencer.js';
import { MedianFileWriter, ensureOutputDir } from './sinks/median-file-writer.js';
import { ReplayError, exitCodeFor } from './errors.js';

// =============================================================================
// Replay Pipeline
// =============================================================================

const logger = createLogger('price-median');

export interface RunOptions {
  /** Directory relative paths resolve against */
  cwd?: string;
  /** Receives help text */
  stdout?: (text: string) => void;
}

export interface ReplayResult {
  outputFile: string;
  observations: number;
  emitted: number;
}

/**
 * Run the replay tool end to end and return the process exit code.
 *
 * Never throws: every failure is logged and mapped to its exit code.
 */
export async function runReplay(argv: readonly string[], options: RunOptions = {}): Promise<ExitCode> {
  const cwd = options.cwd ?? process.cwd();
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      stdout(HELP_TEXT);
      return EXIT_CODES.SUCCESS;
    }

    logger.info({ config: args.configPath }, 'Starting price median replay');
    const result = await replayFromConfig(args.configPath, cwd);

    logger.info(result, 'Price median replay finished');
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    if (error instanceof ReplayError) {
      logger.error({ error, exitCode }, error.message);
    } else {
      logger.fatal({ error, exitCode }, 'Unhandled error');
    }
    return exitCode;
  }
}

/**
 * Load the config, read and order the input, and write the median file
 */
export async function replayFromConfig(configPath: string, cwd: string): Promise<ReplayResult> {
  const config = await loadConfig(configPath, cwd);

  const observations = sequenceObservations(
    await readObservations(config.inputDir, config.filenameMasks)
  );

  await ensureOutputDir(config.outputDir);
  const outputFile = path.join(config.outputDir, REPLAY_DEFAULTS.OUTPUT_FILE_NAME);
  const writer = await MedianFileWriter.open(outputFile);

  const estimator = createEstimator(config.median);
  let summary: ReplaySummary;
  try {
    summary = replayMedians(observations, estimator, (record) => writer.write(record));
  } finally {
    await writer.close();
  }

  return {
    outputFile,
    observations: summary.observations,
    emitted: summary.emitted,
  };
}
