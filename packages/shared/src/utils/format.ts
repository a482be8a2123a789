import { CSV_FORMAT, MEDIAN_DEFAULTS } from '../constants/index.js';
import type { EmissionRecord } from '../schemas/observation.schema.js';

// =============================================================================
// Median Formatting
// =============================================================================
//
// The formatted string, not the numeric value, decides whether the median
// "changed". Two medians that differ only beyond the 8th decimal are the same
// output row.

const TO_FIXED_LIMIT = 1e21;

/**
 * Format a median as a fixed-point decimal string.
 *
 * Rounds to nearest on the exact binary value of the double, so a value such
 * as 1.005 formats to two decimals as "1.00". Negative values that round to
 * zero (and -0 itself) render without a sign.
 *
 * @example
 * ```typescript
 * formatMedian(2.5);        // '2.50000000'
 * formatMedian(1 / 3);      // '0.33333333'
 * formatMedian(-1e-12);     // '0.00000000'
 * ```
 */
export function formatMedian(
  value: number,
  decimals: number = MEDIAN_DEFAULTS.MEDIAN_DECIMALS
): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  // toFixed switches to exponent notation here; doubles this large are integers
  if (Math.abs(value) >= TO_FIXED_LIMIT) {
    return `${BigInt(value).toString()}.${'0'.repeat(decimals)}`;
  }

  const fixed = value.toFixed(decimals);
  return isNegativeZero(fixed) ? fixed.slice(1) : fixed;
}

function isNegativeZero(fixed: string): boolean {
  return fixed.startsWith('-') && /^-0\.?0*$/.test(fixed);
}

/**
 * Whether a freshly formatted median differs from the last emitted one
 */
export function hasMedianChanged(previous: string | null, next: string): boolean {
  return previous === null || previous !== next;
}

/**
 * Render one output data line (without the line terminator)
 */
export function formatEmissionRow(record: EmissionRecord): string {
  return `${record.timestamp.toString()}${CSV_FORMAT.SEPARATOR}${record.formattedMedian}`;
}
