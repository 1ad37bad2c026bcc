/**
 * Scalar reductions over operation metrics and snapshot intervals
 *
 * A reduction over an empty sequence is unavailable, never zero.
 *
 * @module iceberg-insights-core/insights/summary
 * @license MIT
 */

import type {
  InsightsSummary,
  IntervalStatistics,
  Measurement,
  OperationMetric,
  SnapshotInterval,
} from '../types.js';

export const UNAVAILABLE: Measurement = Object.freeze({ available: false });

export function measured(value: number): Measurement {
  return { available: true, value };
}

/**
 * Snapshots that added at least one record
 */
export function countWriteOperations(metrics: readonly OperationMetric[]): Measurement {
  if (metrics.length === 0) return UNAVAILABLE;
  return measured(metrics.filter(m => m.addedRecords > 0).length);
}

/**
 * Snapshots that deleted at least one record
 */
export function countDeleteOperations(metrics: readonly OperationMetric[]): Measurement {
  if (metrics.length === 0) return UNAVAILABLE;
  return measured(metrics.filter(m => m.deletedRecords > 0).length);
}

export function meanManifestCount(metrics: readonly OperationMetric[]): Measurement {
  return mean(metrics.map(m => m.manifestCount));
}

/**
 * Mean, minimum and maximum of intervalHours
 */
export function intervalHoursStatistics(intervals: readonly SnapshotInterval[]): IntervalStatistics {
  const hours = intervals.map(i => i.intervalHours);

  if (hours.length === 0) {
    return { mean: UNAVAILABLE, min: UNAVAILABLE, max: UNAVAILABLE };
  }

  return {
    mean: mean(hours),
    min: measured(hours.reduce((a, b) => Math.min(a, b))),
    max: measured(hours.reduce((a, b) => Math.max(a, b))),
  };
}

export function summarizeInsights(
  metrics: readonly OperationMetric[],
  intervals: readonly SnapshotInterval[],
  totalSnapshots: number
): InsightsSummary {
  return {
    totalSnapshots,
    writeOperations: countWriteOperations(metrics),
    deleteOperations: countDeleteOperations(metrics),
    averageManifestsPerSnapshot: meanManifestCount(metrics),
    intervalHours: intervalHoursStatistics(intervals),
  };
}

function mean(values: readonly number[]): Measurement {
  if (values.length === 0) return UNAVAILABLE;
  const sum = values.reduce((a, b) => a + b, 0);
  return measured(sum / values.length);
}
