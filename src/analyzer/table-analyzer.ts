/**
 * Table analyzer
 *
 * Fetches a table's snapshots, manifest entries and schema and turns them
 * into an insights report. Each fetch fails on its own: a failure is logged,
 * recorded in the report and replaced by an empty table, and the remaining
 * fetches still run.
 *
 * @module iceberg-insights-core/analyzer/table-analyzer
 * @license MIT
 */

import type {
  FetchFailure,
  FetchKind,
  ManifestTable,
  OperationMetric,
  SchemaTable,
  SnapshotInterval,
  SnapshotTable,
  TableInsightsReport,
} from '../types.js';
import { emptyManifestTable, emptySchemaTable, emptySnapshotTable } from '../types.js';
import type { MetadataProvider } from '../provider/interface.js';
import { extractOperationMetrics } from '../insights/operation-metrics.js';
import { calculateSnapshotIntervals } from '../insights/snapshot-intervals.js';
import { summarizeInsights } from '../insights/summary.js';
import {
  DEFAULT_HISTOGRAM_BINS,
  DEFAULT_RECENT_LIMIT,
  intervalHistogram,
  recentSnapshots,
  snapshotTimeline,
} from '../insights/report.js';
import { ErrorHandler } from '../errors/index.js';
import { validateTableLocation } from '../validation/runtime-validator.js';
import type { StructuredLogger } from '../observability/logger.js';
import { createComponentLogger } from '../observability/logger.js';

export interface TableAnalyzerOptions {
  /** Snapshots listed under "recent" (default: 5) */
  recentSnapshotLimit?: number;
  /** Upper bound on interval histogram bins (default: 10) */
  histogramBins?: number;
  logger?: StructuredLogger;
}

export class TableAnalyzer {
  private readonly recentSnapshotLimit: number;
  private readonly histogramBins: number;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly provider: MetadataProvider,
    options: TableAnalyzerOptions = {}
  ) {
    this.recentSnapshotLimit = options.recentSnapshotLimit ?? DEFAULT_RECENT_LIMIT;
    this.histogramBins = options.histogramBins ?? DEFAULT_HISTOGRAM_BINS;
    this.logger = options.logger ?? createComponentLogger('table-analyzer');
  }

  /**
   * Analyze one table location
   *
   * @throws SecurityError or ConfigurationError for an invalid location;
   * provider failures never throw
   */
  async analyze(location: string): Promise<TableInsightsReport> {
    const validLocation = validateTableLocation(location);
    const timer = this.logger.createTimer();
    const fetchErrors: FetchFailure[] = [];

    const snapshots = await this.fetchIsolated<SnapshotTable>(
      'snapshots',
      () => this.provider.fetchSnapshots(validLocation),
      emptySnapshotTable,
      fetchErrors
    );
    const manifests = await this.fetchIsolated<ManifestTable>(
      'manifests',
      () => this.provider.fetchManifests(validLocation),
      emptyManifestTable,
      fetchErrors
    );
    const schema = await this.fetchIsolated<SchemaTable>(
      'schema',
      () => this.provider.fetchSchema(validLocation),
      emptySchemaTable,
      fetchErrors
    );

    let operations: OperationMetric[] = [];
    let intervals: SnapshotInterval[] = [];

    if (snapshots.snapshots.length > 0 && manifests.entries.length > 0) {
      operations = extractOperationMetrics(snapshots, manifests);
      intervals = calculateSnapshotIntervals(snapshots);
    }

    const report: TableInsightsReport = {
      location: validLocation,
      generatedAt: new Date(),
      summary: summarizeInsights(operations, intervals, snapshots.snapshots.length),
      operations,
      intervals,
      intervalHistogram: intervalHistogram(intervals, this.histogramBins),
      recentSnapshots: recentSnapshots(snapshots, this.recentSnapshotLimit),
      timeline: snapshotTimeline(snapshots),
      schema,
      fetchErrors,
    };

    timer.end('Table analyzed', {
      location: validLocation,
      snapshots: snapshots.snapshots.length,
      manifestEntries: manifests.entries.length,
      operations: operations.length,
      intervals: intervals.length,
      fetchErrors: fetchErrors.length,
    });

    return report;
  }

  private async fetchIsolated<T>(
    kind: FetchKind,
    fetch: () => Promise<T>,
    substitute: () => T,
    failures: FetchFailure[]
  ): Promise<T> {
    try {
      return await fetch();
    } catch (error) {
      const sanitized = ErrorHandler.sanitize(error);
      failures.push({ kind, code: sanitized.code, message: sanitized.message });

      // The schema is display-only; its absence does not affect the insights
      if (kind === 'schema') {
        this.logger.warn('Schema fetch failed', { fetchKind: kind, code: sanitized.code });
      } else {
        this.logger.error(`Error fetching ${kind}`, sanitized, { fetchKind: kind });
      }

      return substitute();
    }
  }
}
