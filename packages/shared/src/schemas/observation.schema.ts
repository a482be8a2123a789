import { z } from 'zod';
import { MAX_U64 } from '../constants/index.js';

// =============================================================================
// Observation Schemas
// =============================================================================

/**
 * Unsigned 64-bit receive timestamp
 */
export const TimestampSchema = z.bigint().min(0n).max(MAX_U64);
export type Timestamp = z.infer<typeof TimestampSchema>;

/**
 * Finite price
 */
export const PriceSchema = z.number().finite();

/**
 * Single price observation, as produced by the sequencer.
 *
 * `origin` and `sequence` only make the replay order total when two
 * observations share a timestamp.
 */
export const ObservationSchema = z.object({
  timestamp: TimestampSchema,
  value: PriceSchema,
  origin: z.string().min(1),
  sequence: z.number().int().positive(),
});

export type Observation = Readonly<z.infer<typeof ObservationSchema>>;

/**
 * One output row: produced each time the formatted median changes
 */
export const EmissionRecordSchema = z.object({
  timestamp: TimestampSchema,
  formattedMedian: z.string().regex(/^-?\d+\.\d{8}$/, 'Median must carry exactly 8 decimals'),
});

export type EmissionRecord = Readonly<z.infer<typeof EmissionRecordSchema>>;
