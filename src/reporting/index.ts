/**
 * Period revenue report.
 *
 * Turns per-period aggregates into a comparison table of the five revenue
 * metrics, one table per provider.
 */

// Table builder
export {
  buildComparisonTable,
  buildMetricRows,
  renderTable,
  percentageChange,
  reconcileUnits,
  NOT_APPLICABLE,
} from './comparison-table.js'
export { asMoney } from './money.js'
export { collectPerfData } from './perf-data.js'
export { runRevenueReport, type RunReportOptions } from './report-runner.js'
export { METRIC_CATEGORIES } from './types.js'

// Types
export type {
  MetricCategory,
  RawMetricValues,
  MetricRow,
  RenderedMetricRow,
  MetricAmounts,
  UnitReconciliation,
  Provider,
  PeriodAmount,
  PeriodAggregate,
  SalesChangeAggregate,
  AggregatedAccount,
  AggregationService,
  PerfData,
  PeriodSalesReport,
  ReportNotifier,
} from './types.js'
