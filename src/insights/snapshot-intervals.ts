/**
 * Time between consecutive snapshots
 *
 * @module iceberg-insights-core/insights/snapshot-intervals
 * @license MIT
 */

import type { Snapshot, SnapshotInterval, SnapshotTable } from '../types.js';

export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86400;

type TimedSnapshot = Snapshot & { timestamp: Date };

/**
 * Calculate the interval between each adjacent pair of snapshots in commit order
 *
 * Snapshots are sorted ascending by timestamp first (stable, ties keep their
 * input order), so N timestamped snapshots give exactly N - 1 intervals and
 * none of them is negative. Snapshots without a timestamp are left out.
 */
export function calculateSnapshotIntervals(snapshots: SnapshotTable): SnapshotInterval[] {
  if (!snapshots.hasTimestamp) {
    return [];
  }

  const timed = snapshots.snapshots.filter(isTimed);
  if (timed.length < 2) {
    return [];
  }

  // Array.prototype.sort is stable
  const sorted = [...timed].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const intervals: SnapshotInterval[] = [];

  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    const intervalSeconds = (current.timestamp.getTime() - previous.timestamp.getTime()) / 1000;

    intervals.push({
      previousSnapshot: previous.snapshotId,
      currentSnapshot: current.snapshotId,
      previousTime: previous.timestamp,
      currentTime: current.timestamp,
      intervalSeconds,
      intervalHours: intervalSeconds / SECONDS_PER_HOUR,
      intervalDays: intervalSeconds / SECONDS_PER_DAY,
    });
  }

  return intervals;
}

function isTimed(snapshot: Snapshot): snapshot is TimedSnapshot {
  return snapshot.timestamp !== null && !Number.isNaN(snapshot.timestamp.getTime());
}
