/**
 * Metadata insights exports
 * @module iceberg-insights-core/insights
 */

export { extractOperationMetrics } from './operation-metrics.js';
export { calculateSnapshotIntervals, SECONDS_PER_HOUR, SECONDS_PER_DAY } from './snapshot-intervals.js';
export {
  countWriteOperations,
  countDeleteOperations,
  meanManifestCount,
  intervalHoursStatistics,
  summarizeInsights,
  UNAVAILABLE,
} from './summary.js';
export {
  recentSnapshots,
  snapshotTimeline,
  intervalHistogram,
  formatMeasurement,
  DEFAULT_RECENT_LIMIT,
  DEFAULT_HISTOGRAM_BINS,
} from './report.js';
export type { FormatOptions } from './report.js';
