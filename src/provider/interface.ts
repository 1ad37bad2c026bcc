/**
 * Metadata provider abstraction
 *
 * The insights engine never reads Iceberg metadata files itself; a provider
 * lists snapshots, manifest entries and the schema for a table location.
 */

import type { ManifestTable, SchemaTable, SnapshotTable } from '../types.js';

export interface MetadataProvider {
  /**
   * List the table's snapshots
   * @param location Table directory, metadata JSON file or object-store URL
   */
  fetchSnapshots(location: string): Promise<SnapshotTable>;

  /**
   * List the manifest entries of every snapshot
   */
  fetchManifests(location: string): Promise<ManifestTable>;

  /**
   * Current table schema, for display only
   */
  fetchSchema(location: string): Promise<SchemaTable>;

  /**
   * Release provider resources
   */
  close(): Promise<void>;
}

/**
 * Raw tabular query result
 */
export interface QueryResult {
  columnNames: string[];
  rows: Record<string, unknown>[];
}

/**
 * Minimal SQL session the Iceberg provider runs its table functions on
 */
export interface SqlSession {
  runAndReadAll(sql: string): Promise<QueryResult>;
  /** Cancel the statement currently running, if any */
  interrupt(): void;
  close(): Promise<void>;
}
