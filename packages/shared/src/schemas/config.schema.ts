import { z } from 'zod';
import { MEDIAN_DEFAULTS } from '../constants/index.js';

// =============================================================================
// Configuration Schemas
// =============================================================================

export const MedianStrategySchema = z.enum(['exact', 'hybrid']);
export type MedianStrategy = z.infer<typeof MedianStrategySchema>;

export const QuantileTrackerKindSchema = z.enum(['p2', 'tdigest']);
export type QuantileTrackerKind = z.infer<typeof QuantileTrackerKindSchema>;

/**
 * `[main]` table of the config file
 */
export const MainConfigSchema = z.object({
  input: z.string({
    required_error: 'is required and must be a string',
    invalid_type_error: 'must be a string',
  }).min(1, 'must not be empty'),
  output: z.string().min(1).optional(),
  // Non-string entries are dropped rather than rejected
  filename_mask: z
    .array(z.unknown())
    .optional()
    .catch(undefined)
    .transform((masks) => (masks ?? []).filter((m): m is string => typeof m === 'string')),
});

export type MainConfig = z.infer<typeof MainConfigSchema>;

/**
 * Optional `[median]` table of the config file
 */
export const MedianConfigSchema = z.object({
  strategy: MedianStrategySchema.default(MEDIAN_DEFAULTS.STRATEGY),
  seed_threshold: z.number().int().min(1).default(MEDIAN_DEFAULTS.SEED_THRESHOLD),
  tracker: QuantileTrackerKindSchema.default(MEDIAN_DEFAULTS.TRACKER),
});

export type MedianConfig = z.infer<typeof MedianConfigSchema>;

/**
 * Whole config file
 */
export const ConfigFileSchema = z.object({
  main: MainConfigSchema,
  median: MedianConfigSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Resolved configuration handed to the replay pipeline
 */
export interface AppConfig {
  inputDir: string;
  outputDir: string;
  filenameMasks: string[];
  median: MedianConfig;
}
