import { constructDatePeriods, describePeriodWindows, isGranularity } from '../periods/index.js'
import type { DiagnosticLogger } from '../shared/logger.js'
import { buildComparisonTable, reconcileUnits } from './comparison-table.js'
import { collectPerfData } from './perf-data.js'
import type {
  AggregationService,
  PeriodSalesReport,
  Provider,
  ReportNotifier,
} from './types.js'

export interface RunReportOptions {
  /** Instant the periods are computed back from */
  atTime: Date
  granularity: string
  providers: readonly Provider[]
  aggregator: AggregationService
  notifier: ReportNotifier
  /** Unit used when no aggregation reports one */
  defaultUnit: string
  /** Receives human-readable progress lines */
  progress: (message: string) => void
  logger: DiagnosticLogger
}

/**
 * Produces one report per provider, strictly in sequence. Each provider gets
 * its own windows and table; nothing carries over between iterations.
 *
 * Returns the reports handed to the notifier.
 */
export const runRevenueReport = (options: RunReportOptions): PeriodSalesReport[] => {
  const { atTime, granularity, providers, aggregator, notifier, defaultUnit, progress, logger } =
    options

  progress(
    `running revenue report for ${granularity === 'hourly' ? 'an' : 'a'} ${granularity} period at ${atTime.toISOString()}`
  )

  if (!isGranularity(granularity)) {
    logger.warn({ granularity }, `unsupported period "${granularity}", nothing to report`)
    return []
  }

  const reports: PeriodSalesReport[] = []

  for (const provider of providers) {
    const periods = constructDatePeriods(atTime, granularity, provider.defaultTimezone)
    if (periods.status === 'unsupported') {
      throw new Error(`Unhandled granularity: ${periods.granularity}`)
    }

    const windows = { recent: periods.recent, yearAgo: periods.yearAgo }
    progress(`Provider ${provider.slug}`)
    for (const line of describePeriodWindows(windows, periods.granularity)) {
      progress(line)
    }

    const { amounts, units } = collectPerfData(aggregator, provider, windows)
    const reconciled = reconcileUnits(units, defaultUnit)
    if (!reconciled.consistent) {
      logger.error(
        { provider: provider.slug, units: reconciled.distinct },
        `different units in report (period=${periods.granularity}): ${reconciled.distinct.join(', ')}`
      )
    }

    const report: PeriodSalesReport = {
      provider,
      granularity: periods.granularity,
      windows,
      unit: reconciled.unit,
      table: buildComparisonTable(amounts, reconciled.unit),
    }
    notifier.periodSalesReportCreated(report)
    reports.push(report)
  }

  return reports
}
