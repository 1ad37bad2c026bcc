/**
 * Iceberg metadata provider over a SQL session
 *
 * Reads snapshots, manifest entries and the schema through the engine's
 * `iceberg_snapshots`, `iceberg_metadata` and `iceberg_schema` table functions.
 *
 * @module iceberg-insights-core/provider/iceberg-provider
 * @license MIT
 */

import type { FetchKind, ManifestTable, SchemaTable, SnapshotTable } from '../types.js';
import type { MetadataProvider, QueryResult, SqlSession } from './interface.js';
import { toManifestTable, toSchemaTable, toSnapshotTable } from './row-mapping.js';
import { InsightsError, ProviderError, TimeoutError } from '../errors/index.js';
import { validateTableLocation } from '../validation/runtime-validator.js';
import type { StructuredLogger } from '../observability/logger.js';
import { createComponentLogger, logTimedOperation } from '../observability/logger.js';

export interface IcebergProviderOptions {
  /** Per-query timeout (default: 30000) */
  queryTimeoutMs?: number;
  /** Maximum rows accepted from a single metadata query (default: 1000000) */
  maxRows?: number;
  /** Close the session when the provider is closed (default: true) */
  ownsSession?: boolean;
  logger?: StructuredLogger;
}

const TABLE_FUNCTIONS: Record<FetchKind, string> = {
  snapshots: 'iceberg_snapshots',
  manifests: 'iceberg_metadata',
  schema: 'iceberg_schema',
};

export class IcebergMetadataProvider implements MetadataProvider {
  private readonly queryTimeoutMs: number;
  private readonly maxRows: number;
  private readonly ownsSession: boolean;
  private readonly logger: StructuredLogger;
  private closed = false;

  constructor(
    private readonly session: SqlSession,
    options: IcebergProviderOptions = {}
  ) {
    this.queryTimeoutMs = options.queryTimeoutMs ?? 30000;
    this.maxRows = options.maxRows ?? 1_000_000;
    this.ownsSession = options.ownsSession ?? true;
    this.logger = options.logger ?? createComponentLogger('iceberg-provider');
  }

  async fetchSnapshots(location: string): Promise<SnapshotTable> {
    const result = await this.query('snapshots', location);
    return this.map('snapshots', location, () => toSnapshotTable(result));
  }

  async fetchManifests(location: string): Promise<ManifestTable> {
    const result = await this.query('manifests', location);
    return this.map('manifests', location, () => toManifestTable(result));
  }

  async fetchSchema(location: string): Promise<SchemaTable> {
    const result = await this.query('schema', location);
    return this.map('schema', location, () => toSchemaTable(result));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.ownsSession) {
      await this.session.close();
    }
  }

  /**
   * Build the table-function query for a location
   */
  buildQuery(kind: FetchKind, location: string): string {
    const validLocation = validateTableLocation(location);
    // Validation rejects quotes, so the location is safe inside the literal
    return `SELECT * FROM ${TABLE_FUNCTIONS[kind]}('${validLocation}')`;
  }

  private async query(kind: FetchKind, location: string): Promise<QueryResult> {
    if (this.closed) {
      throw new ProviderError('Metadata provider is closed', kind, location);
    }

    const sql = this.buildQuery(kind, location);

    return logTimedOperation(
      this.logger,
      `fetch ${kind}`,
      async () => {
        try {
          const result = await this.executeWithTimeout(
            () => this.session.runAndReadAll(sql),
            this.queryTimeoutMs,
            () => this.session.interrupt()
          );

          if (result.rows.length > this.maxRows) {
            throw new ProviderError(
              `Metadata result too large (max ${this.maxRows} rows)`,
              kind,
              location
            );
          }

          this.logger.debug('Metadata fetched', { fetchKind: kind, rowCount: result.rows.length });
          return result;
        } catch (error) {
          if (error instanceof InsightsError) {
            throw error;
          }
          throw ProviderError.fetchFailed(kind, location, error instanceof Error ? error : undefined);
        }
      },
      { operation: 'fetch', fetchKind: kind, location }
    );
  }

  private map<T>(kind: FetchKind, location: string, mapper: () => T): T {
    try {
      return mapper();
    } catch (error) {
      if (error instanceof ProviderError) {
        throw new ProviderError(error.message, kind, location);
      }
      throw ProviderError.fetchFailed(kind, location, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Execute operation with timeout protection; `onTimeout` cancels the
   * statement still running on the session
   */
  private async executeWithTimeout<T>(
    operation: () => Promise<T>,
    timeoutMs: number,
    onTimeout: () => void
  ): Promise<T> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        try {
          onTimeout();
        } catch (error) {
          this.logger.warn('Failed to interrupt timed out query', { error });
        }
        reject(TimeoutError.queryTimeout(timeoutMs));
      }, timeoutMs);

      operation()
        .then(resolve)
        .catch(reject)
        .finally(() => clearTimeout(timer));
    });
  }
}
