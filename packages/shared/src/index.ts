// =============================================================================
// @price-median/shared - Main Entry Point
// =============================================================================

// Re-export all schemas
export * from './schemas/index.js';

// Re-export all utilities
export * from './utils/index.js';

// Re-export constants
export * from './constants/index.js';
