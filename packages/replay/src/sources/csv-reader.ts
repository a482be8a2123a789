import type { Dirent, ReadStream } from 'node:fs';
import { open, readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';
import {
  CSV_FORMAT,
  PriceSchema,
  TimestampSchema,
  createLogger,
  type Observation,
} from '@price-median/shared';
import { InputReadError, errorMessage } from '../errors.js';

// =============================================================================
// CSV Source Reader
// =============================================================================
//
// Reads every `.csv` file of the input directory (non-recursive) whose name
// contains one of the filename masks. Each file needs a header row with
// `receive_ts` and `price` columns, in any position; other columns are
// ignored. Quoting is not supported.

const logger = createLogger('csv-reader');

const U64_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface ColumnIndexes {
  timestamp: number;
  price: number;
}

/**
 * Whether a file name passes the mask filter (empty mask list passes all)
 */
export function matchesMasks(fileName: string, masks: readonly string[]): boolean {
  return masks.length === 0 || masks.some((mask) => fileName.includes(mask));
}

/**
 * List the CSV files to read, sorted by name
 *
 * @throws InputReadError when the directory is missing or unreadable
 */
export async function listSourceFiles(dir: string, masks: readonly string[]): Promise<string[]> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new InputReadError(`Input path is not a directory: ${dir}`);
    }
  } catch (error) {
    if (error instanceof InputReadError) throw error;
    throw new InputReadError(`Input directory does not exist: ${dir}`, { cause: error });
  }

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new InputReadError(`Failed to list input directory ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const files: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (path.extname(entry.name).toLowerCase() !== CSV_FORMAT.FILE_EXTENSION) continue;

    if (!matchesMasks(entry.name, masks)) {
      logger.debug({ file: entry.name }, 'Skipping file not matching masks');
      continue;
    }
    files.push(path.join(dir, entry.name));
  }

  return files.sort();
}

/**
 * Locate the required columns in a header line
 */
export function parseHeader(header: string): ColumnIndexes | null {
  const columns = header.split(CSV_FORMAT.SEPARATOR).map((c) => c.trim());
  const timestamp = columns.indexOf(CSV_FORMAT.TIMESTAMP_COLUMN);
  const price = columns.indexOf(CSV_FORMAT.PRICE_COLUMN);

  if (timestamp < 0 || price < 0) {
    return null;
  }
  return { timestamp, price };
}

/**
 * Parse an unsigned 64-bit decimal integer, or null when invalid.
 * The pattern checks the text; {@link TimestampSchema} checks the range.
 */
export function parseTimestamp(text: string): bigint | null {
  if (!U64_PATTERN.test(text)) {
    return null;
  }
  const result = TimestampSchema.safeParse(BigInt(text));
  return result.success ? result.data : null;
}

/**
 * Parse a finite decimal price, or null when invalid
 */
export function parsePrice(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const result = PriceSchema.safeParse(Number(text));
  return result.success ? result.data : null;
}

/**
 * Read the observations of one CSV file, in file order
 *
 * @throws InputReadError on unreadable files, missing columns or bad lines
 */
export async function readCsvFile(file: string): Promise<Observation[]> {
  const observations: Observation[] = [];
  let columns: ColumnIndexes | null = null;
  let lineNo = 0;

  let input: ReadStream;
  try {
    const handle = await open(file, 'r');
    input = handle.createReadStream({ encoding: 'utf8' });
  } catch (error) {
    throw new InputReadError(`Failed to open CSV file: ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const rawLine of lines) {
      lineNo++;
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

      if (lineNo === 1) {
        columns = parseHeader(line);
        if (!columns) {
          throw new InputReadError(
            `CSV missing required columns (${CSV_FORMAT.TIMESTAMP_COLUMN}, ${CSV_FORMAT.PRICE_COLUMN}) in file: ${file}`
          );
        }
        continue;
      }

      if (line.length === 0 || !columns) continue;

      observations.push(parseLine(line, columns, file, lineNo));
    }
  } catch (error) {
    if (error instanceof InputReadError) throw error;
    throw new InputReadError(`Failed to read CSV file: ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  } finally {
    lines.close();
    input.destroy();
  }

  if (lineNo === 0) {
    logger.warn({ file }, 'Empty CSV file skipped');
  }

  return observations;
}

function parseLine(line: string, columns: ColumnIndexes, file: string, lineNo: number): Observation {
  const values = line.split(CSV_FORMAT.SEPARATOR);
  const timestampText = values[columns.timestamp];
  const priceText = values[columns.price];

  if (timestampText === undefined || priceText === undefined) {
    throw new InputReadError(`Malformed CSV (not enough columns) in file ${file} at line ${lineNo}`);
  }

  const timestamp = parseTimestamp(timestampText);
  if (timestamp === null) {
    throw new InputReadError(`Invalid ${CSV_FORMAT.TIMESTAMP_COLUMN} in file ${file} at line ${lineNo}`);
  }

  const value = parsePrice(priceText);
  if (value === null) {
    throw new InputReadError(`Invalid ${CSV_FORMAT.PRICE_COLUMN} in file ${file} at line ${lineNo}`);
  }

  return { timestamp, value, origin: file, sequence: lineNo };
}

/**
 * Read every selected CSV file of the input directory
 */
export async function readObservations(dir: string, masks: readonly string[]): Promise<Observation[]> {
  const files = await listSourceFiles(dir, masks);
  const observations: Observation[] = [];

  for (const file of files) {
    const fileObservations = await readCsvFile(file);
    logger.info({ file, rows: fileObservations.length }, 'CSV file read');
    observations.push(...fileObservations);
  }

  logger.info({ files: files.length, rows: observations.length }, 'Input read');
  return observations;
}
