import { EXIT_CODES, type ExitCode } from '@price-median/shared';

// =============================================================================
// Replay Errors
// =============================================================================

/**
 * Fatal replay failure carrying the process exit code it maps to
 */
export class ReplayError extends Error {
  constructor(
    public readonly exitCode: ExitCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ReplayError';
  }
}

/**
 * Bad command line, missing or invalid config file
 */
export class ConfigError extends ReplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(EXIT_CODES.CONFIG_ERROR, message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Input directory or CSV file could not be read or parsed
 */
export class InputReadError extends ReplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(EXIT_CODES.INPUT_READ_ERROR, message, options);
    this.name = 'InputReadError';
  }
}

export class OutputDirError extends ReplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(EXIT_CODES.OUTPUT_DIR_ERROR, message, options);
    this.name = 'OutputDirError';
  }
}

export class OutputFileError extends ReplayError {
  constructor(message: string, options?: ErrorOptions) {
    super(EXIT_CODES.OUTPUT_FILE_ERROR, message, options);
    this.name = 'OutputFileError';
  }
}

/**
 * Exit code for any error thrown out of the pipeline
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ReplayError ? error.exitCode : EXIT_CODES.UNHANDLED_ERROR;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
