// =============================================================================
// Schema Exports
// =============================================================================

// Observation schemas
export {
  TimestampSchema,
  PriceSchema,
  ObservationSchema,
  EmissionRecordSchema,
  type Timestamp,
  type Observation,
  type EmissionRecord,
} from './observation.schema.js';

// Config schemas
export {
  MedianStrategySchema,
  QuantileTrackerKindSchema,
  MainConfigSchema,
  MedianConfigSchema,
  ConfigFileSchema,
  type MedianStrategy,
  type QuantileTrackerKind,
  type MainConfig,
  type MedianConfig,
  type ConfigFile,
  type AppConfig,
} from './config.schema.js';
