import { mkdir, open } from 'node:fs/promises';
import type { WriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';
import {
  CSV_FORMAT,
  formatEmissionRow,
  type EmissionRecord,
} from '@price-median/shared';
import { OutputDirError, OutputFileError, errorMessage } from '../errors.js';

// =============================================================================
// Median File Writer
// =============================================================================

/**
 * Create the output directory (and parents) if needed
 *
 * @throws OutputDirError
 */
export async function ensureOutputDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new OutputDirError(`Failed to create output directory ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Writes the output CSV: one header line, then one line per emission.
 *
 * `write` is synchronous (rows are buffered by the stream) so it can be used
 * directly as a replay sink; `close` flushes and reports any write failure.
 */
export class MedianFileWriter {
  private rows = 0;

  private constructor(
    readonly filePath: string,
    private readonly stream: WriteStream
  ) {}

  /**
   * Open (truncate) the output file and write the header
   *
   * @throws OutputFileError when the file cannot be opened
   */
  static async open(filePath: string): Promise<MedianFileWriter> {
    let stream: WriteStream;
    try {
      const handle = await open(filePath, 'w');
      stream = handle.createWriteStream({ encoding: 'utf8' });
    } catch (error) {
      throw new OutputFileError(`Failed to open output file ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    stream.write(`${CSV_FORMAT.OUTPUT_HEADER}\n`);
    return new MedianFileWriter(filePath, stream);
  }

  write(record: EmissionRecord): void {
    this.stream.write(`${formatEmissionRow(record)}\n`);
    this.rows++;
  }

  get rowCount(): number {
    return this.rows;
  }

  /**
   * @throws OutputFileError when buffered rows could not be written
   */
  async close(): Promise<void> {
    this.stream.end();
    try {
      await finished(this.stream);
    } catch (error) {
      throw new OutputFileError(`Failed to write output file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
