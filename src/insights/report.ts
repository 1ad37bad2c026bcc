/**
 * Report helpers for the monitoring view: recent snapshots, the snapshot
 * timeline, the interval histogram and measurement formatting.
 *
 * @module iceberg-insights-core/insights/report
 * @license MIT
 */

import type { HistogramBin, Measurement, Snapshot, SnapshotInterval, SnapshotTable } from '../types.js';

export const DEFAULT_RECENT_LIMIT = 5;
export const DEFAULT_HISTOGRAM_BINS = 10;

/**
 * Most recent snapshots first. Without a timestamp column the first
 * `limit` rows are returned in input order.
 */
export function recentSnapshots(table: SnapshotTable, limit = DEFAULT_RECENT_LIMIT): Snapshot[] {
  if (!table.hasTimestamp) {
    return table.snapshots.slice(0, limit).map(s => ({ ...s, timestamp: null }));
  }

  return [...table.snapshots]
    .sort((a, b) => compareTimestampsDescending(a.timestamp, b.timestamp))
    .slice(0, limit);
}

/**
 * Timestamped snapshots in ascending commit order. Empty unless the table
 * has timestamps and more than one snapshot.
 */
export function snapshotTimeline(table: SnapshotTable): Snapshot[] {
  if (!table.hasTimestamp || table.snapshots.length <= 1) {
    return [];
  }

  return table.snapshots
    .filter(s => s.timestamp !== null)
    .sort((a, b) => timeOf(a.timestamp) - timeOf(b.timestamp));
}

/**
 * Equal-width histogram of intervalHours with min(maxBins, intervals) bins
 */
export function intervalHistogram(
  intervals: readonly SnapshotInterval[],
  maxBins = DEFAULT_HISTOGRAM_BINS
): HistogramBin[] {
  if (intervals.length === 0 || maxBins < 1) {
    return [];
  }

  const hours = intervals.map(i => i.intervalHours);
  const lower = hours.reduce((a, b) => Math.min(a, b));
  const upper = hours.reduce((a, b) => Math.max(a, b));

  if (lower === upper) {
    return [{ lower, upper, count: hours.length }];
  }

  const binCount = Math.min(maxBins, hours.length);
  const width = (upper - lower) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    lower: lower + i * width,
    upper: i === binCount - 1 ? upper : lower + (i + 1) * width,
    count: 0,
  }));

  for (const value of hours) {
    // The maximum lands in the last bin
    const index = Math.min(Math.floor((value - lower) / width), binCount - 1);
    bins[index].count++;
  }

  return bins;
}

export interface FormatOptions {
  decimals?: number;
  unit?: string;
}

/**
 * Render a measurement for display, "N/A" when unavailable
 */
export function formatMeasurement(measurement: Measurement, options: FormatOptions = {}): string {
  if (!measurement.available) {
    return 'N/A';
  }

  const text = options.decimals === undefined
    ? String(measurement.value)
    : measurement.value.toFixed(options.decimals);

  return options.unit ? `${text} ${options.unit}` : text;
}

function timeOf(timestamp: Date | null): number {
  return timestamp ? timestamp.getTime() : Number.NaN;
}

function compareTimestampsDescending(a: Date | null, b: Date | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b.getTime() - a.getTime();
}
