/**
 * Tests for the Iceberg metadata provider
 *
 * Runs against an in-process SQL session; no metadata engine is started.
 */

import { describe, it, expect, vi } from 'vitest';
import { IcebergMetadataProvider } from '../../src/provider/iceberg-provider.js';
import { TableAnalyzer } from '../../src/analyzer/table-analyzer.js';
import type { QueryResult, SqlSession } from '../../src/provider/interface.js';
import { ProviderError, SecurityError, TimeoutError } from '../../src/errors/index.js';
import { LogLevel, StructuredLogger } from '../../src/observability/logger.js';

const LOCATION = 's3://test-bucket/warehouse/sales';
const quietLogger = new StructuredLogger({ level: LogLevel.FATAL, prettyPrint: false });

type Answer = QueryResult | Error | 'hang';

/**
 * Session answering each table function with a canned result
 */
function createSession(answers: Partial<Record<'iceberg_snapshots' | 'iceberg_metadata' | 'iceberg_schema', Answer>>) {
  const queries: string[] = [];
  const close = vi.fn(async () => undefined);
  const interrupt = vi.fn(() => undefined);

  const session: SqlSession = {
    async runAndReadAll(sql: string): Promise<QueryResult> {
      queries.push(sql);
      const fn = /FROM (\w+)\(/.exec(sql)?.[1];
      const answer = fn === 'iceberg_snapshots' || fn === 'iceberg_metadata' || fn === 'iceberg_schema'
        ? answers[fn]
        : undefined;

      if (answer === undefined) {
        return { columnNames: [], rows: [] };
      }
      if (answer === 'hang') {
        return new Promise<QueryResult>(() => undefined);
      }
      if (answer instanceof Error) {
        throw answer;
      }
      return answer;
    },
    interrupt,
    close,
  };

  return { session, queries, close, interrupt };
}

describe('IcebergMetadataProvider', () => {
  describe('fetchSnapshots', () => {
    it('should query iceberg_snapshots and map the rows', async () => {
      const { session, queries } = createSession({
        iceberg_snapshots: {
          columnNames: ['sequence_number', 'snapshot_id', 'timestamp_ms', 'manifest_list'],
          rows: [
            { sequence_number: 1n, snapshot_id: 11n, timestamp_ms: { micros: 1709251200000000n }, manifest_list: 'a' },
            { sequence_number: 2n, snapshot_id: 12n, timestamp_ms: { micros: 1709254800000000n }, manifest_list: 'b' },
          ],
        },
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      const table = await provider.fetchSnapshots(LOCATION);

      expect(queries).toEqual([`SELECT * FROM iceberg_snapshots('${LOCATION}')`]);
      expect(table).toEqual({
        hasTimestamp: true,
        snapshots: [
          { snapshotId: '11', sequenceNumber: 1, timestamp: new Date('2024-03-01T00:00:00.000Z') },
          { snapshotId: '12', sequenceNumber: 2, timestamp: new Date('2024-03-01T01:00:00.000Z') },
        ],
      });
    });

    it('should trim the location before querying', async () => {
      const { session, queries } = createSession({});
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      await provider.fetchSnapshots('  data/iceberg/lineitem_iceberg  ');

      expect(queries).toEqual([`SELECT * FROM iceberg_snapshots('data/iceberg/lineitem_iceberg')`]);
    });
  });

  describe('fetchManifests', () => {
    it('should query iceberg_metadata and map the entries', async () => {
      const { session, queries } = createSession({
        iceberg_metadata: {
          columnNames: ['manifest_path', 'manifest_sequence_number', 'status', 'record_count'],
          rows: [{ manifest_path: 'm.avro', manifest_sequence_number: 1n, status: 'ADDED', record_count: 100n }],
        },
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      const table = await provider.fetchManifests(LOCATION);

      expect(queries).toEqual([`SELECT * FROM iceberg_metadata('${LOCATION}')`]);
      expect(table).toEqual({
        hasStatus: true,
        entries: [{ manifestSequenceNumber: 1, status: 'ADDED', recordCount: 100 }],
      });
    });
  });

  describe('fetchSchema', () => {
    it('should query iceberg_schema', async () => {
      const { session, queries } = createSession({
        iceberg_schema: {
          columnNames: ['column_id', 'name', 'type'],
          rows: [{ column_id: 1, name: 'order_id', type: 'BIGINT' }],
        },
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      const schema = await provider.fetchSchema(LOCATION);

      expect(queries).toEqual([`SELECT * FROM iceberg_schema('${LOCATION}')`]);
      expect(schema).toEqual({ columns: [{ name: 'order_id', type: 'BIGINT', fieldId: 1 }] });
    });
  });

  describe('error handling', () => {
    it('should wrap session failures in a sanitized ProviderError', async () => {
      const { session } = createSession({
        iceberg_snapshots: new Error('HTTP Error: 403 (Forbidden) for s3://test-bucket/warehouse/sales'),
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      const failure = provider.fetchSnapshots(LOCATION);

      await expect(failure).rejects.toBeInstanceOf(ProviderError);
      await expect(failure).rejects.toMatchObject({
        message: 'Access denied - check credentials and bucket permissions',
        code: 'PROVIDER_FETCH_FAILED',
        fetchKind: 'snapshots',
        location: LOCATION,
      });
    });

    it('should report missing metadata as not found', async () => {
      const { session } = createSession({
        iceberg_metadata: new Error('IO Error: File does not exist'),
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      await expect(provider.fetchManifests(LOCATION)).rejects.toMatchObject({
        message: 'Table metadata not found - check the table location',
        fetchKind: 'manifests',
      });
    });

    it('should report malformed rows as a fetch failure of that kind', async () => {
      const { session } = createSession({
        iceberg_snapshots: { columnNames: ['snapshot_id'], rows: [{ snapshot_id: 1 }] },
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      await expect(provider.fetchSnapshots(LOCATION)).rejects.toMatchObject({
        message: 'Malformed table metadata',
        fetchKind: 'snapshots',
        location: LOCATION,
      });
    });

    it('should time out a query that does not finish', async () => {
      const { session } = createSession({ iceberg_snapshots: 'hang' });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger, queryTimeoutMs: 20 });

      await expect(provider.fetchSnapshots(LOCATION)).rejects.toBeInstanceOf(TimeoutError);
    });

    it('should interrupt the running statement on timeout', async () => {
      const { session, interrupt } = createSession({ iceberg_metadata: 'hang' });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger, queryTimeoutMs: 20 });

      await expect(provider.fetchManifests(LOCATION)).rejects.toMatchObject({
        code: 'OPERATION_TIMEOUT',
        message: 'Metadata query timeout after 20ms',
      });
      expect(interrupt).toHaveBeenCalledTimes(1);
    });

    it('should not interrupt queries that finish in time', async () => {
      const { session, interrupt } = createSession({});
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger, queryTimeoutMs: 1000 });

      await provider.fetchSnapshots(LOCATION);

      expect(interrupt).not.toHaveBeenCalled();
    });

    it('should reject results above the row cap', async () => {
      const { session } = createSession({
        iceberg_metadata: {
          columnNames: ['manifest_sequence_number', 'status', 'record_count'],
          rows: [
            { manifest_sequence_number: 1, status: 'ADDED', record_count: 1 },
            { manifest_sequence_number: 2, status: 'ADDED', record_count: 1 },
          ],
        },
      });
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger, maxRows: 1 });

      await expect(provider.fetchManifests(LOCATION)).rejects.toMatchObject({
        message: 'Metadata result too large (max 1 rows)',
      });
    });

    it('should refuse unsafe locations without querying', async () => {
      const { session, queries } = createSession({});
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      await expect(provider.fetchSnapshots("x'); DROP TABLE t; --")).rejects.toBeInstanceOf(SecurityError);
      expect(queries).toEqual([]);
    });
  });

  describe('close', () => {
    it('should close an owned session once', async () => {
      const { session, close } = createSession({});
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      await provider.close();
      await provider.close();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should leave a shared session open', async () => {
      const { session, close } = createSession({});
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger, ownsSession: false });

      await provider.close();

      expect(close).not.toHaveBeenCalled();
    });

    it('should reject fetches after close', async () => {
      const { session } = createSession({});
      const provider = new IcebergMetadataProvider(session, { logger: quietLogger });

      await provider.close();

      await expect(provider.fetchSchema(LOCATION)).rejects.toMatchObject({
        message: 'Metadata provider is closed',
      });
    });
  });

  describe('logging', () => {
    it('should keep stdout free for report output', async () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      try {
        const { session } = createSession({
          iceberg_snapshots: {
            columnNames: ['snapshot_id', 'sequence_number', 'timestamp_ms'],
            rows: [{ snapshot_id: 1, sequence_number: 1, timestamp_ms: 1709251200000 }],
          },
        });
        // Default component loggers at info level
        const analyzer = new TableAnalyzer(new IcebergMetadataProvider(session));

        const report = await analyzer.analyze(LOCATION);

        expect(report.summary.totalSnapshots).toBe(1);
        expect(write).not.toHaveBeenCalled();
      } finally {
        write.mockRestore();
      }
    });
  });
});
