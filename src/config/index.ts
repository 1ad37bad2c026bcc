/**
 * Runtime configuration from environment variables
 *
 * @module iceberg-insights-core/config
 * @license MIT
 */

import type { InsightsConfig } from '../types.js';
import { InsightsEnvSchema } from '../validation/schemas.js';
import { ConfigurationError } from '../errors/index.js';

export const DEFAULT_CONFIG: InsightsConfig = {
  logLevel: 'info',
  duckdbPath: ':memory:',
  loadAwsCredentials: true,
  queryTimeoutMs: 30000,
  maxRows: 1_000_000,
  recentSnapshotLimit: 5,
};

/**
 * Resolve configuration from an environment map, applying defaults
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadInsightsConfig(env: NodeJS.ProcessEnv = process.env): InsightsConfig {
  // Unset and blank variables both fall back to the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ICEBERG_INSIGHTS_') && value !== undefined && value.trim() !== '')
  );

  const result = InsightsEnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(`Invalid value for ${field}: ${issue.message}`, field);
  }

  const parsed = result.data;
  return {
    logLevel: parsed.ICEBERG_INSIGHTS_LOG_LEVEL,
    duckdbPath: parsed.ICEBERG_INSIGHTS_DUCKDB_PATH,
    loadAwsCredentials: parsed.ICEBERG_INSIGHTS_LOAD_AWS_CREDENTIALS,
    queryTimeoutMs: parsed.ICEBERG_INSIGHTS_QUERY_TIMEOUT_MS,
    maxRows: parsed.ICEBERG_INSIGHTS_MAX_ROWS,
    recentSnapshotLimit: parsed.ICEBERG_INSIGHTS_RECENT_LIMIT,
  };
}
