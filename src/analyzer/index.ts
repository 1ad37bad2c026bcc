/**
 * Table analyzer exports
 * @module iceberg-insights-core/analyzer
 */

export { TableAnalyzer } from './table-analyzer.js';
export type { TableAnalyzerOptions } from './table-analyzer.js';
