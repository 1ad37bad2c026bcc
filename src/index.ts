/**
 * Iceberg Insights Core - operational insights from Iceberg table metadata
 *
 * Public API: the snapshot/manifest aggregations and their reductions, the
 * DuckDB-backed metadata provider, and the table analyzer that combines them.
 *
 * @module iceberg-insights-core
 * @license MIT
 */

// Export insight aggregations and reductions
export {
  extractOperationMetrics,
  calculateSnapshotIntervals,
  countWriteOperations,
  countDeleteOperations,
  meanManifestCount,
  intervalHoursStatistics,
  summarizeInsights,
  recentSnapshots,
  snapshotTimeline,
  intervalHistogram,
  formatMeasurement,
  UNAVAILABLE,
} from './insights/index.js';

// Export metadata providers
export {
  IcebergMetadataProvider,
  DuckDBSession,
  createMetadataProvider,
  closeSharedSession,
} from './provider/index.js';
export type { MetadataProvider, SqlSession, QueryResult } from './provider/index.js';

// Export analyzer
export { TableAnalyzer } from './analyzer/index.js';
export type { TableAnalyzerOptions } from './analyzer/index.js';

// Export configuration and validation
export { loadInsightsConfig, DEFAULT_CONFIG } from './config/index.js';
export { validateTableLocation, isValidTableLocation } from './validation/index.js';

// Export logging
export { StructuredLogger, createComponentLogger, LogLevel } from './observability/logger.js';

// Export error classes for proper error handling
export {
  InsightsError,
  SecurityError,
  ProviderError,
  TimeoutError,
  ConfigurationError,
  ErrorHandler,
  createError
} from './errors/index.js';

// Re-export types for convenience
export { emptySnapshotTable, emptyManifestTable, emptySchemaTable } from './types.js';
export type {
  Snapshot,
  SnapshotId,
  ManifestEntry,
  ManifestStatus,
  SnapshotTable,
  ManifestTable,
  SchemaTable,
  SchemaColumn,
  OperationMetric,
  SnapshotInterval,
  Measurement,
  IntervalStatistics,
  InsightsSummary,
  HistogramBin,
  FetchKind,
  FetchFailure,
  TableInsightsReport,
  InsightsConfig,
} from './types.js';
