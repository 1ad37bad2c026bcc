#!/usr/bin/env node

/**
 * Iceberg Insights CLI
 * Prints snapshot and manifest insights for one Iceberg table
 *
 * @module iceberg-insights-core/cli
 */

import { config as loadEnv } from 'dotenv';
import { loadInsightsConfig } from '../config/index.js';
import { createMetadataProvider, closeSharedSession } from '../provider/factory.js';
import { TableAnalyzer } from '../analyzer/table-analyzer.js';
import { createComponentLogger } from '../observability/logger.js';
import { ConfigurationError, ErrorHandler } from '../errors/index.js';
import { renderReport } from './render.js';

const VERSION = '0.1.0';

const args = process.argv.slice(2);
const command = args[0];

async function main(): Promise<void> {
  try {
    if (!command) {
      printHelp();
      return;
    }

    if (!isValidCommand(command)) {
      console.error(`❌ Unknown command: ${command}`);
      console.error('');
      printHelp();
      process.exitCode = 1;
      return;
    }

    switch (command) {
      case 'analyze':
        await handleAnalyze();
        break;

      case 'version':
      case '-v':
      case '--version':
        console.log(`Iceberg Insights v${VERSION}`);
        break;

      default:
        printHelp();
    }
  } catch (error) {
    const userMessage = ErrorHandler.getUserMessage(error);
    console.error(`❌ Error: ${userMessage}`);

    // Only show stack trace in development mode
    if (process.env.NODE_ENV === 'development' && error instanceof Error) {
      console.error('Stack trace:', error.stack);
    }

    process.exitCode = 1;
  } finally {
    await closeSharedSession();
  }
}

function isValidCommand(cmd: string): boolean {
  const validCommands = ['analyze', 'version', '-v', '--version', 'help', '-h', '--help'];
  return validCommands.includes(cmd);
}

/**
 * Analyze the table location given as the first positional argument
 */
async function handleAnalyze(): Promise<void> {
  const location = args.slice(1).find(arg => !arg.startsWith('--'));
  if (!location) {
    throw new ConfigurationError('A table location is required: iceberg-insights analyze <location>', 'location');
  }

  loadEnv();
  const config = loadInsightsConfig();
  const provider = await createMetadataProvider(config);

  try {
    const analyzer = new TableAnalyzer(provider, {
      recentSnapshotLimit: config.recentSnapshotLimit,
      logger: createComponentLogger('table-analyzer', { level: config.logLevel }),
    });

    const report = await analyzer.analyze(location);

    if (args.includes('--json')) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(renderReport(report).join('\n'));
    }
  } finally {
    await provider.close();
  }
}

function printHelp(): void {
  console.log('Iceberg Insights CLI - Snapshot and manifest activity for Iceberg tables');
  console.log('');
  console.log('Usage:');
  console.log('  iceberg-insights <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  analyze <location>   Analyze a table directory, metadata JSON file or s3:// URL');
  console.log('  version              Show version information');
  console.log('  help                 Show this help message');
  console.log('');
  console.log('Options:');
  console.log('  --json               Print the full report as JSON');
  console.log('');
  console.log('Examples:');
  console.log('  iceberg-insights analyze data/iceberg/lineitem_iceberg');
  console.log('  iceberg-insights analyze s3://bucket/warehouse/sales/metadata/00001-abc.metadata.json --json');
  console.log('');
  console.log('Environment Variables:');
  console.log('  ICEBERG_INSIGHTS_LOG_LEVEL             trace, debug, info, warn, error, fatal (default: info)');
  console.log('  ICEBERG_INSIGHTS_DUCKDB_PATH           DuckDB database file (default: :memory:)');
  console.log('  ICEBERG_INSIGHTS_LOAD_AWS_CREDENTIALS  Register the AWS credential chain (default: true)');
  console.log('  ICEBERG_INSIGHTS_QUERY_TIMEOUT_MS      Metadata query timeout (default: 30000)');
  console.log('  ICEBERG_INSIGHTS_MAX_ROWS              Row cap per metadata query (default: 1000000)');
  console.log('  ICEBERG_INSIGHTS_RECENT_LIMIT          Recent snapshots to list (default: 5)');
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
