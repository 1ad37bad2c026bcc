/**
 * Metadata provider exports
 */

export { IcebergMetadataProvider } from './iceberg-provider.js';
export type { IcebergProviderOptions } from './iceberg-provider.js';
export { DuckDBSession, ICEBERG_EXTENSIONS } from './duckdb-session.js';
export type { DuckDBSessionOptions } from './duckdb-session.js';
export { createMetadataProvider, getSharedSession, closeSharedSession } from './factory.js';
export { toSnapshotTable, toManifestTable, toSchemaTable, toTimestamp } from './row-mapping.js';
export type { MetadataProvider, SqlSession, QueryResult } from './interface.js';
