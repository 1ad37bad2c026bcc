/**
 * Map raw metadata query results onto typed tables
 *
 * Column presence is decided from the result's column names: a missing
 * optional column yields a `hasTimestamp: false` or `hasStatus: false` table.
 *
 * @module iceberg-insights-core/provider/row-mapping
 * @license MIT
 */

import type {
  ManifestEntry,
  ManifestStatus,
  ManifestTable,
  SchemaColumn,
  SchemaTable,
  Snapshot,
  SnapshotId,
  SnapshotTable,
} from '../types.js';
import type { QueryResult } from './interface.js';
import { ProviderError } from '../errors/index.js';

/**
 * Iceberg manifest entry status codes as stored in manifest files
 */
const STATUS_CODES: Record<number, ManifestStatus> = {
  0: 'EXISTING',
  1: 'ADDED',
  2: 'DELETED',
};

/** Candidate timestamp columns, in order of preference */
const TIMESTAMP_COLUMNS = ['timestamp', 'timestamp_ms'] as const;

export function toSnapshotTable(result: QueryResult): SnapshotTable {
  requireColumns(result, ['snapshot_id', 'sequence_number'], 'snapshots');

  const timestampColumn = TIMESTAMP_COLUMNS.find(column => result.columnNames.includes(column));

  if (timestampColumn === undefined) {
    return {
      hasTimestamp: false,
      snapshots: result.rows.map(row => ({
        snapshotId: toSnapshotId(row.snapshot_id),
        sequenceNumber: toInteger(row.sequence_number, 'sequence_number'),
      })),
    };
  }

  const snapshots: Snapshot[] = result.rows.map(row => ({
    snapshotId: toSnapshotId(row.snapshot_id),
    sequenceNumber: toInteger(row.sequence_number, 'sequence_number'),
    timestamp: toTimestamp(row[timestampColumn]),
  }));

  return { hasTimestamp: true, snapshots };
}

export function toManifestTable(result: QueryResult): ManifestTable {
  requireColumns(result, ['manifest_sequence_number', 'record_count'], 'manifests');

  if (!result.columnNames.includes('status')) {
    return {
      hasStatus: false,
      entries: result.rows.map(row => ({
        manifestSequenceNumber: toInteger(row.manifest_sequence_number, 'manifest_sequence_number'),
        recordCount: toCount(row.record_count),
      })),
    };
  }

  const entries: ManifestEntry[] = result.rows.map(row => ({
    manifestSequenceNumber: toInteger(row.manifest_sequence_number, 'manifest_sequence_number'),
    status: toStatus(row.status),
    recordCount: toCount(row.record_count),
  }));

  return { hasStatus: true, entries };
}

export function toSchemaTable(result: QueryResult): SchemaTable {
  const columns: SchemaColumn[] = result.rows.map(row => {
    const column: SchemaColumn = {
      name: String(firstPresent(row, ['name', 'column_name']) ?? ''),
      type: String(firstPresent(row, ['type', 'data_type', 'column_type']) ?? 'unknown'),
    };

    const fieldId = firstPresent(row, ['column_id', 'field_id', 'id']);
    if (fieldId !== undefined) {
      column.fieldId = toInteger(fieldId, 'column_id');
    }

    const required = firstPresent(row, ['required']);
    const nullable = firstPresent(row, ['null_ok', 'nullable']);
    if (typeof required === 'boolean') {
      column.required = required;
    } else if (typeof nullable === 'boolean') {
      column.required = !nullable;
    }

    return column;
  });

  return { columns };
}

// ==============================================
// Value Normalization
// ==============================================

/**
 * 64-bit ids arrive as bigint and are kept as decimal strings
 */
export function toSnapshotId(value: unknown): SnapshotId {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number' || typeof value === 'string') return value;

  throw new ProviderError('Invalid snapshot metadata: snapshot_id missing', 'snapshots');
}

export function toInteger(value: unknown, column: string): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());

  throw new ProviderError(`Invalid metadata value in column ${column}`);
}

/**
 * Record counts are taken as given; a missing count contributes nothing
 */
function toCount(value: unknown): number {
  if (value === null || value === undefined) return 0;
  return toInteger(value, 'record_count');
}

function toStatus(value: unknown): ManifestStatus {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') {
    return STATUS_CODES[Number(value)] ?? String(value);
  }
  return 'UNKNOWN';
}

/**
 * Convert the timestamp representations a provider may return into a Date
 *
 * Accepts Date, epoch milliseconds (number or bigint), ISO strings, and the
 * engine's timestamp value objects carrying micros or millis.
 */
export function toTimestamp(value: unknown): Date | null {
  if (value === null || value === undefined) return null;

  let date: Date | null = null;

  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number') {
    date = new Date(value);
  } else if (typeof value === 'bigint') {
    date = new Date(Number(value));
  } else if (typeof value === 'string') {
    date = new Date(value);
  } else if (typeof value === 'object') {
    if ('micros' in value && typeof value.micros === 'bigint') {
      date = new Date(Number(value.micros / 1000n));
    } else if ('millis' in value && typeof value.millis === 'bigint') {
      date = new Date(Number(value.millis));
    } else if ('milliseconds' in value && typeof value.milliseconds === 'bigint') {
      date = new Date(Number(value.milliseconds));
    }
  }

  return date && !Number.isNaN(date.getTime()) ? date : null;
}

function requireColumns(result: QueryResult, columns: string[], kind: 'snapshots' | 'manifests'): void {
  // An empty result carries no schema worth checking
  if (result.rows.length === 0) return;

  const missing = columns.filter(column => !result.columnNames.includes(column));
  if (missing.length > 0) {
    throw new ProviderError(`Invalid ${kind} metadata: missing column ${missing.join(', ')}`, kind);
  }
}

function firstPresent(row: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (row[key] !== undefined && row[key] !== null) {
      return row[key];
    }
  }
  return undefined;
}
