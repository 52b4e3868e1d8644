/**
 * Types for the period revenue report.
 *
 * All monetary values are integers in the unit's minor denomination
 * (cents for 'usd').
 */
import type { Granularity, PeriodSequence, PeriodWindows } from '../periods/index.js'

/**
 * Metrics shown in every report, in display order.
 */
export const METRIC_CATEGORIES = [
  'Total Sales',
  'New Sales',
  'Churned Sales',
  'Payments',
  'Refunds',
] as const

export type MetricCategory = (typeof METRIC_CATEGORIES)[number]

/**
 * Raw amounts for one metric.
 *
 * @example
 * const payments: RawMetricValues = {
 *   last: 150000,    // $1,500.00 in the most recent completed period
 *   prev: 100000,    // $1,000.00 in the period before
 *   prevYear: 80000, // $800.00 in the same period last year
 * }
 */
export interface RawMetricValues {
  last: number
  prev: number
  prevYear: number
}

export interface MetricRow {
  slug: MetricCategory
  title: MetricCategory
  values: RawMetricValues
}

/**
 * Metric row after formatting. `last` is a money string, `prev` and
 * `prevYear` are percentage changes relative to `last`.
 *
 * @example
 * const row: RenderedMetricRow = {
 *   slug: 'Payments',
 *   title: 'Payments',
 *   values: { last: '$1,500.00', prev: '+50.0%', prevYear: '+87.5%' },
 * }
 */
export interface RenderedMetricRow {
  slug: MetricCategory
  title: MetricCategory
  values: {
    last: string
    prev: string
    prevYear: string
  }
}

export type MetricAmounts = Record<MetricCategory, RawMetricValues>

/**
 * Result of reconciling the units reported by separate aggregations.
 */
export interface UnitReconciliation {
  /** Unit the table is rendered in */
  unit: string
  /** Distinct units seen, in first-seen order */
  distinct: string[]
  /** False when aggregations disagreed */
  consistent: boolean
}

/**
 * Organization a report is produced for.
 */
export interface Provider {
  slug: string
  fullName: string
  /** IANA timezone periods are aligned to (UTC when absent) */
  defaultTimezone?: string
  email?: string
}

export interface PeriodAmount {
  start: Date
  end: Date
  amount: number
}

export interface PeriodAggregate {
  amounts: PeriodAmount[]
  /** Unit of the aggregated transactions (null when none matched) */
  unit: string | null
}

export interface SalesChangeAggregate {
  total: PeriodAmount[]
  new: PeriodAmount[]
  churned: PeriodAmount[]
  unit: string | null
}

export type AggregatedAccount = 'payment' | 'refund'

/**
 * Sums transaction amounts per period for a provider.
 */
export interface AggregationService {
  salesChangeByPeriod: (provider: Provider, periods: PeriodSequence) => SalesChangeAggregate
  amountsByPeriod: (
    provider: Provider,
    account: AggregatedAccount,
    periods: PeriodSequence
  ) => PeriodAggregate
}

/**
 * Raw amounts gathered for one provider, before unit reconciliation.
 */
export interface PerfData {
  amounts: MetricAmounts
  /** Units from the sales, payments and refunds aggregations, in that order */
  units: (string | null)[]
}

/**
 * Report handed to the notifier for one provider.
 */
export interface PeriodSalesReport {
  provider: Provider
  granularity: Granularity
  windows: PeriodWindows
  unit: string
  table: RenderedMetricRow[]
}

/**
 * Receives each finished report. Rendering and delivery belong to the
 * implementation.
 */
export interface ReportNotifier {
  periodSalesReportCreated: (report: PeriodSalesReport) => void
}
