/**
 * Plain-text rendering of an insights report
 *
 * @module iceberg-insights-core/cli/render
 */

import type { Snapshot, TableInsightsReport } from '../types.js';
import { formatMeasurement } from '../insights/report.js';

/**
 * Render the report as the lines the CLI prints
 */
export function renderReport(report: TableInsightsReport): string[] {
  const { summary } = report;
  const lines: string[] = [];

  lines.push(`❄️  Iceberg Metadata Insights: ${report.location}`);
  lines.push('');
  lines.push('Key Metrics');
  lines.push(`  Total Snapshots:         ${summary.totalSnapshots}`);
  lines.push(`  Write Operations:        ${formatMeasurement(summary.writeOperations)}`);
  lines.push(`  Delete Operations:       ${formatMeasurement(summary.deleteOperations)}`);
  lines.push(`  Avg Manifests/Snapshot:  ${formatMeasurement(summary.averageManifestsPerSnapshot, { decimals: 1 })}`);
  lines.push('');

  lines.push('Snapshot Intervals');
  if (report.timeline.length > 0 && report.intervals.length > 0) {
    const hours = { decimals: 1, unit: 'hours' };
    lines.push(`  Avg Interval:  ${formatMeasurement(summary.intervalHours.mean, hours)}`);
    lines.push(`  Min Interval:  ${formatMeasurement(summary.intervalHours.min, hours)}`);
    lines.push(`  Max Interval:  ${formatMeasurement(summary.intervalHours.max, hours)}`);

    for (const bin of report.intervalHistogram) {
      lines.push(`  ${bin.lower.toFixed(1)}-${bin.upper.toFixed(1)}h: ${bin.count}`);
    }
  } else {
    lines.push('  Insufficient data to show snapshots timeline. Need multiple snapshots with timestamps.');
  }
  lines.push('');

  lines.push('Recent Snapshots');
  if (report.recentSnapshots.length === 0) {
    lines.push('  No snapshot data available.');
  } else {
    for (const snapshot of report.recentSnapshots) {
      lines.push(`  ${describeSnapshot(snapshot)}`);
    }
  }

  if (report.fetchErrors.length > 0) {
    lines.push('');
    lines.push('Fetch Errors');
    for (const failure of report.fetchErrors) {
      lines.push(`  ⚠️  ${failure.kind}: ${failure.message} (${failure.code})`);
    }
  }

  return lines;
}

function describeSnapshot(snapshot: Snapshot): string {
  const time = snapshot.timestamp ? snapshot.timestamp.toISOString() : 'no timestamp';
  return `#${snapshot.sequenceNumber} ${snapshot.snapshotId} @ ${time}`;
}
