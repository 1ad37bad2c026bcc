/**
 * Shared TypeScript types for Iceberg Insights Core
 *
 * Snapshot and manifest records as read from an Iceberg table's metadata,
 * and the insight rows derived from them.
 *
 * @license MIT
 */

// ==============================================
// Source Records
// ==============================================

/**
 * Snapshot identifier. Providers return strings so 64-bit ids keep their precision.
 */
export type SnapshotId = string | number;

/**
 * Manifest entry status. Iceberg defines ADDED, EXISTING and DELETED;
 * any other value is carried through and ignored by the record sums.
 */
export type ManifestStatus = 'ADDED' | 'EXISTING' | 'DELETED' | (string & {});

/**
 * One versioned state of the table
 */
export interface Snapshot {
  snapshotId: SnapshotId;
  /** Join key against ManifestEntry.manifestSequenceNumber */
  sequenceNumber: number;
  /** Commit time, null when the metadata row carries none */
  timestamp: Date | null;
}

/**
 * One file-level add/delete record contributed by a snapshot's commit
 */
export interface ManifestEntry {
  manifestSequenceNumber: number;
  status: ManifestStatus;
  recordCount: number;
}

// ==============================================
// Tables with Column Presence
// ==============================================

/**
 * Snapshot listing. `hasTimestamp` is false when the source had no timestamp column.
 */
export type SnapshotTable =
  | { readonly hasTimestamp: true; readonly snapshots: readonly Snapshot[] }
  | { readonly hasTimestamp: false; readonly snapshots: readonly Omit<Snapshot, 'timestamp'>[] };

/**
 * Manifest listing. `hasStatus` is false when the source had no status column.
 */
export type ManifestTable =
  | { readonly hasStatus: true; readonly entries: readonly ManifestEntry[] }
  | { readonly hasStatus: false; readonly entries: readonly Omit<ManifestEntry, 'status'>[] };

/**
 * Table schema as reported by the provider, for display only
 */
export interface SchemaColumn {
  name: string;
  type: string;
  fieldId?: number;
  required?: boolean;
}

export interface SchemaTable {
  readonly columns: readonly SchemaColumn[];
}

/**
 * Substitute for a snapshot fetch that failed or returned nothing
 */
export function emptySnapshotTable(): SnapshotTable {
  return { hasTimestamp: false, snapshots: [] };
}

/**
 * Substitute for a manifest fetch that failed or returned nothing
 */
export function emptyManifestTable(): ManifestTable {
  return { hasStatus: false, entries: [] };
}

export function emptySchemaTable(): SchemaTable {
  return { columns: [] };
}

// ==============================================
// Derived Records
// ==============================================

/**
 * Write/delete activity of a single snapshot
 */
export interface OperationMetric {
  snapshotId: SnapshotId;
  timestamp: Date | null;
  sequenceNumber: number;
  addedRecords: number;
  deletedRecords: number;
  /** addedRecords - deletedRecords */
  netChange: number;
  /** Number of manifest entries joined to this snapshot, whatever their status */
  manifestCount: number;
}

/**
 * Elapsed time between two consecutive snapshots in commit order
 */
export interface SnapshotInterval {
  previousSnapshot: SnapshotId;
  currentSnapshot: SnapshotId;
  previousTime: Date;
  currentTime: Date;
  intervalSeconds: number;
  intervalHours: number;
  intervalDays: number;
}

/**
 * A reduction over a possibly empty sequence. Empty input is reported as
 * unavailable so "no data" is never confused with a zero measurement.
 */
export type Measurement =
  | { readonly available: true; readonly value: number }
  | { readonly available: false };

export interface IntervalStatistics {
  mean: Measurement;
  min: Measurement;
  max: Measurement;
}

export interface InsightsSummary {
  totalSnapshots: number;
  writeOperations: Measurement;
  deleteOperations: Measurement;
  averageManifestsPerSnapshot: Measurement;
  intervalHours: IntervalStatistics;
}

export interface HistogramBin {
  /** Inclusive lower edge */
  lower: number;
  /** Upper edge, inclusive for the last bin */
  upper: number;
  count: number;
}

// ==============================================
// Reports
// ==============================================

export type FetchKind = 'snapshots' | 'manifests' | 'schema';

export interface FetchFailure {
  kind: FetchKind;
  code: string;
  message: string;
}

/**
 * Everything the monitoring view shows for one table
 */
export interface TableInsightsReport {
  location: string;
  generatedAt: Date;
  summary: InsightsSummary;
  operations: OperationMetric[];
  intervals: SnapshotInterval[];
  intervalHistogram: HistogramBin[];
  recentSnapshots: Snapshot[];
  timeline: Snapshot[];
  schema: SchemaTable;
  fetchErrors: FetchFailure[];
}

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Resolved runtime configuration
 */
export interface InsightsConfig {
  logLevel: LogLevelName;
  duckdbPath: string;
  loadAwsCredentials: boolean;
  queryTimeoutMs: number;
  maxRows: number;
  recentSnapshotLimit: number;
}
