/**
 * Per-snapshot write/delete activity
 *
 * Joins manifest entries to the snapshot that produced them on sequence
 * number and sums the record counts of added and deleted files.
 *
 * @module iceberg-insights-core/insights/operation-metrics
 * @license MIT
 */

import type { ManifestEntry, ManifestTable, OperationMetric, SnapshotTable } from '../types.js';

/**
 * Extract operation metrics, one row per snapshot in input order
 *
 * Returns an empty result when either table is empty or the manifest table
 * has no status column.
 */
export function extractOperationMetrics(
  snapshots: SnapshotTable,
  manifests: ManifestTable
): OperationMetric[] {
  if (snapshots.snapshots.length === 0 || manifests.entries.length === 0) {
    return [];
  }

  // Without a status column there is nothing to classify; every snapshot is skipped
  if (!manifests.hasStatus) {
    return [];
  }

  const entriesBySequence = indexBySequenceNumber(manifests.entries);
  const operations: OperationMetric[] = [];

  for (const snapshot of snapshots.snapshots) {
    const joined = entriesBySequence.get(snapshot.sequenceNumber) ?? [];

    let addedRecords = 0;
    let deletedRecords = 0;
    for (const entry of joined) {
      if (entry.status === 'ADDED') {
        addedRecords += entry.recordCount;
      } else if (entry.status === 'DELETED') {
        deletedRecords += entry.recordCount;
      }
    }

    operations.push({
      snapshotId: snapshot.snapshotId,
      timestamp: 'timestamp' in snapshot ? snapshot.timestamp : null,
      sequenceNumber: snapshot.sequenceNumber,
      addedRecords,
      deletedRecords,
      netChange: addedRecords - deletedRecords,
      manifestCount: joined.length,
    });
  }

  return operations;
}

function indexBySequenceNumber(entries: readonly ManifestEntry[]): Map<number, ManifestEntry[]> {
  const index = new Map<number, ManifestEntry[]>();

  for (const entry of entries) {
    const group = index.get(entry.manifestSequenceNumber);
    if (group) {
      group.push(entry);
    } else {
      index.set(entry.manifestSequenceNumber, [entry]);
    }
  }

  return index;
}
