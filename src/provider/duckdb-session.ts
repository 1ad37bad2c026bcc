/**
 * DuckDB session with the Iceberg extensions loaded
 *
 * @module iceberg-insights-core/provider/duckdb-session
 * @license MIT
 */

import { DuckDBInstance, DuckDBConnection } from '@duckdb/node-api';
import type { QueryResult, SqlSession } from './interface.js';
import { ConfigurationError, ProviderError } from '../errors/index.js';
import type { StructuredLogger } from '../observability/logger.js';
import { createComponentLogger } from '../observability/logger.js';
import { resolve } from 'path';

export interface DuckDBSessionOptions {
  /** Database file, or ':memory:' (default) */
  path?: string;
  /** Register the AWS credential chain for s3:// locations (default: true) */
  loadAwsCredentials?: boolean;
  logger?: StructuredLogger;
}

/**
 * Extensions needed to read Iceberg metadata from local and object-store paths
 */
export const ICEBERG_EXTENSIONS = ['aws', 'httpfs', 'iceberg', 'parquet'] as const;

export class DuckDBSession implements SqlSession {
  private connection: DuckDBConnection | null;

  private constructor(
    private instance: DuckDBInstance | null,
    connection: DuckDBConnection,
    private readonly logger: StructuredLogger
  ) {
    this.connection = connection;
  }

  /**
   * Create the instance, connect, and install/load the Iceberg extensions
   */
  static async open(options: DuckDBSessionOptions = {}): Promise<DuckDBSession> {
    const logger = options.logger ?? createComponentLogger('duckdb-session');
    const path = DuckDBSession.resolvePath(options.path ?? ':memory:');

    let instance: DuckDBInstance;
    let connection: DuckDBConnection;
    try {
      instance = path === ':memory:' ? await DuckDBInstance.create() : await DuckDBInstance.create(path);
      connection = await instance.connect();
    } catch (error) {
      throw ProviderError.sessionFailed(error instanceof Error ? error : undefined);
    }

    const session = new DuckDBSession(instance, connection, logger);

    try {
      for (const extension of ICEBERG_EXTENSIONS) {
        await connection.run(`INSTALL ${extension};`);
        await connection.run(`LOAD ${extension};`);
      }
    } catch (error) {
      await session.close();
      throw new ProviderError(
        'Failed to load metadata engine extension',
        'session',
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    if (options.loadAwsCredentials !== false) {
      await session.registerAwsCredentials();
    }

    logger.info('Metadata session initialized', { database: path, extensions: [...ICEBERG_EXTENSIONS] });
    return session;
  }

  private static resolvePath(path: string): string {
    if (path === ':memory:') {
      return path;
    }

    if (path.includes('..')) {
      throw new ConfigurationError('Database path cannot contain directory traversal patterns', 'duckdbPath');
    }

    return resolve(path);
  }

  async runAndReadAll(sql: string): Promise<QueryResult> {
    if (!this.connection) {
      throw new ProviderError('Metadata session is closed');
    }

    const reader = await this.connection.runAndReadAll(sql);
    return {
      columnNames: reader.columnNames(),
      rows: reader.getRowObjects(),
    };
  }

  interrupt(): void {
    this.connection?.interrupt();
  }

  async close(): Promise<void> {
    try {
      this.connection?.closeSync();
    } catch (error) {
      this.logger.warn('Error closing DuckDB connection', { error });
    } finally {
      this.connection = null;
      this.instance = null;
    }
  }

  /**
   * Public s3:// locations still work without credentials, so a missing
   * credential chain is logged rather than raised.
   */
  private async registerAwsCredentials(): Promise<void> {
    if (!this.connection) return;

    try {
      await this.connection.run(
        'CREATE OR REPLACE SECRET iceberg_insights_aws (TYPE s3, PROVIDER credential_chain);'
      );
      this.logger.debug('AWS credential chain registered');
    } catch (error) {
      this.logger.warn('AWS credentials not loaded, continuing without them', { error });
    }
  }
}
