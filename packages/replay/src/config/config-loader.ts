import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseToml, TomlError } from 'smol-toml';
import {
  ConfigFileSchema,
  REPLAY_DEFAULTS,
  createLogger,
  type AppConfig,
  type ConfigFile,
} from '@price-median/shared';
import { ConfigError, errorMessage } from '../errors.js';

// =============================================================================
// Config Loader
// =============================================================================

const logger = createLogger('config-loader');

/**
 * Load and validate the TOML config file.
 *
 * Relative `input`/`output` paths resolve against `cwd`; a missing `output`
 * becomes `<cwd>/output`.
 *
 * @throws ConfigError when the file is missing, is not valid TOML, or does
 *   not match the config schema
 */
export async function loadConfig(configPath: string, cwd: string = process.cwd()): Promise<AppConfig> {
  const resolved = path.resolve(cwd, configPath);

  let text: string;
  try {
    text = await readFile(resolved, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${resolved}`, { cause: error });
    }
    throw new ConfigError(`Config file could not be read: ${resolved}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const config = parseConfigText(text);

  const appConfig: AppConfig = {
    inputDir: path.resolve(cwd, config.main.input),
    outputDir: path.resolve(cwd, config.main.output ?? REPLAY_DEFAULTS.OUTPUT_DIR),
    filenameMasks: config.main.filename_mask,
    median: config.median,
  };

  logger.info(
    {
      configPath: resolved,
      inputDir: appConfig.inputDir,
      outputDir: appConfig.outputDir,
      masks: appConfig.filenameMasks,
      strategy: appConfig.median.strategy,
    },
    'Config loaded'
  );

  return appConfig;
}

/**
 * Parse and validate config file contents
 */
export function parseConfigText(text: string): ConfigFile {
  let table: Record<string, unknown>;
  try {
    table = parseToml(text);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ConfigError(`TOML parse error: ${error.message}`, { cause: error });
    }
    throw new ConfigError(`Config parse exception: ${errorMessage(error)}`, { cause: error });
  }

  const main = table['main'];
  if (typeof main !== 'object' || main === null || Array.isArray(main)) {
    throw new ConfigError('Missing [main] section in config');
  }

  const result = ConfigFileSchema.safeParse(table);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config error: ${issues}`, { cause: result.error });
  }

  return result.data;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
