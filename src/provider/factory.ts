/**
 * Factory for metadata providers sharing one process-wide session
 */

import type { InsightsConfig } from '../types.js';
import type { MetadataProvider } from './interface.js';
import { IcebergMetadataProvider } from './iceberg-provider.js';
import { DuckDBSession } from './duckdb-session.js';
import { loadInsightsConfig } from '../config/index.js';
import { createComponentLogger } from '../observability/logger.js';

let sharedSession: Promise<DuckDBSession> | null = null;

/**
 * Open the shared session on first use; later calls reuse it
 */
export function getSharedSession(config: InsightsConfig): Promise<DuckDBSession> {
  if (!sharedSession) {
    const opening = DuckDBSession.open({
      path: config.duckdbPath,
      loadAwsCredentials: config.loadAwsCredentials,
      logger: createComponentLogger('duckdb-session', { level: config.logLevel }),
    });

    // A failed open must not poison later attempts
    sharedSession = opening.catch((error: unknown) => {
      sharedSession = null;
      throw error;
    });
  }

  return sharedSession;
}

/**
 * Close the shared session, if one was opened
 */
export async function closeSharedSession(): Promise<void> {
  const pending = sharedSession;
  sharedSession = null;

  if (pending) {
    const session = await pending;
    await session.close();
  }
}

/**
 * Create a metadata provider on the shared DuckDB session
 */
export async function createMetadataProvider(
  config: InsightsConfig = loadInsightsConfig()
): Promise<MetadataProvider> {
  const session = await getSharedSession(config);

  return new IcebergMetadataProvider(session, {
    queryTimeoutMs: config.queryTimeoutMs,
    maxRows: config.maxRows,
    ownsSession: false,
    logger: createComponentLogger('iceberg-provider', { level: config.logLevel }),
  });
}
