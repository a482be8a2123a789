import { parseArgs } from 'node:util';
import { REPLAY_DEFAULTS } from '@price-median/shared';
import { ConfigError, errorMessage } from '../errors.js';

// =============================================================================
// Command Line
// =============================================================================

export interface CliArgs {
  help: boolean;
  configPath: string;
}

export const HELP_TEXT = [
  'Usage: price-median [options]',
  '',
  'Replays price observations from CSV files and writes every change of the running median.',
  '',
  'Allowed options:',
  '  -h, --help             show help',
  `  -c, --config <path>    path to config TOML (default: ${REPLAY_DEFAULTS.CONFIG_PATH})`,
].join('\n');

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws ConfigError on unknown options, missing option values or positionals
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        config: { type: 'string', short: 'c', default: REPLAY_DEFAULTS.CONFIG_PATH },
      },
      strict: true,
      allowPositionals: false,
    });

    return {
      help: values.help ?? false,
      configPath: values.config ?? REPLAY_DEFAULTS.CONFIG_PATH,
    };
  } catch (error) {
    throw new ConfigError(
      `Error parsing command line: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
