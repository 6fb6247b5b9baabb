/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type LogLevel } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  enableDefaultMetrics,
  segmentsProcessedCounter,
  rowsExtractedCounter,
  diagnosticsCounter,
  extractionDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateProfileDefinition,
  validateExtractionResult,
  type ValidationResult,
} from './schemas';

// Report extraction
export * from './extractors';

// Downstream views and serialization
export * from './analysis';
