/**
 * Zod validation schemas for Iceberg Insights Core
 *
 * @license MIT
 */

import { z } from 'zod';

// ==============================================
// Constants
// ==============================================

/**
 * Remote schemes the metadata engine can read through its httpfs/aws extensions
 */
export const REMOTE_LOCATION_SCHEMES = ['s3', 's3a', 'gs', 'gcs', 'r2', 'http', 'https'] as const;

const REMOTE_SCHEMES: ReadonlySet<string> = new Set(REMOTE_LOCATION_SCHEMES);

/**
 * Characters that would terminate or escape the quoted location literal
 */
const UNSAFE_LOCATION_PATTERN = /['"`;\\\u0000-\u001f]/;

// ==============================================
// Table Location Schemas
// ==============================================

/**
 * Schema for an Iceberg table location: a table directory, a
 * `*.metadata.json` file, or a remote object-store URL
 */
export const TableLocationSchema = z.string()
  .trim()
  .min(1, 'Table location cannot be empty')
  .max(2048, 'Table location too long (max 2048 characters)')
  .refine((location) => !UNSAFE_LOCATION_PATTERN.test(location), {
    message: 'Table location contains unsafe characters',
    params: { unsafe: true },
  })
  .refine((location) => {
    const scheme = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//.exec(location);
    if (!scheme) {
      return true;
    }
    return REMOTE_SCHEMES.has(scheme[1].toLowerCase());
  }, (location) => ({
    message: `Unsupported location scheme in "${location.split('://')[0]}"`,
  }))
  .refine((location) => {
    const remote = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/(.*)$/.exec(location);
    return !remote || remote[1].length > 0;
  }, {
    message: 'Remote table location must name a bucket or host',
  });

// ==============================================
// Configuration Schemas
// ==============================================

const booleanFromEnv = z.enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Environment variables read by loadInsightsConfig
 */
export const InsightsEnvSchema = z.object({
  ICEBERG_INSIGHTS_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  ICEBERG_INSIGHTS_DUCKDB_PATH: z.string().min(1, 'DuckDB path cannot be empty').default(':memory:'),
  ICEBERG_INSIGHTS_LOAD_AWS_CREDENTIALS: booleanFromEnv.default('true'),
  ICEBERG_INSIGHTS_QUERY_TIMEOUT_MS: z.coerce.number()
    .int('Query timeout must be an integer')
    .min(1000, 'Query timeout must be at least 1000ms')
    .max(600000, 'Query timeout cannot exceed 600000ms')
    .default(30000),
  ICEBERG_INSIGHTS_MAX_ROWS: z.coerce.number()
    .int('Max rows must be an integer')
    .min(1, 'Max rows must be at least 1')
    .max(10_000_000, 'Max rows cannot exceed 10000000')
    .default(1_000_000),
  ICEBERG_INSIGHTS_RECENT_LIMIT: z.coerce.number()
    .int('Recent snapshot limit must be an integer')
    .min(1, 'Recent snapshot limit must be at least 1')
    .max(100, 'Recent snapshot limit cannot exceed 100')
    .default(5),
});

export type InsightsEnv = z.infer<typeof InsightsEnvSchema>;

export const schemas = {
  tableLocation: TableLocationSchema,
  insightsEnv: InsightsEnvSchema,
} as const;
