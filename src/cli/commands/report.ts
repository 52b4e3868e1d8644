import { formatISO } from 'date-fns'
import type { ReportOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createLedgerAggregator, listProviders, loadLedger } from '../../ledger/index.js'
import type { Granularity, PeriodSequence } from '../../periods/index.js'
import {
  runRevenueReport,
  type PeriodSalesReport,
  type RenderedMetricRow,
  type ReportNotifier,
} from '../../reporting/index.js'
import { createLogger } from '../../shared/logger.js'
import { createFormatter, formatTable } from '../output.js'

/**
 * Serializable form of one provider's report.
 */
export interface ProviderReportOutput {
  provider: string
  providerName: string
  period: Granularity
  unit: string
  periods: {
    recent: string[]
    yearAgo: string[]
  }
  table: RenderedMetricRow[]
}

export interface RevenueReportResult {
  success: boolean
  atTime: string
  period: Granularity
  reports: ProviderReportOutput[]
  /** Pre-formatted text output (only for text format) */
  formatted?: string
}

const toIsoStrings = (sequence: PeriodSequence): string[] => sequence.map((date) => formatISO(date))

export const toReportOutput = (report: PeriodSalesReport): ProviderReportOutput => ({
  provider: report.provider.slug,
  providerName: report.provider.fullName || report.provider.slug,
  period: report.granularity,
  unit: report.unit,
  periods: {
    recent: toIsoStrings(report.windows.recent),
    yearAgo: toIsoStrings(report.windows.yearAgo),
  },
  table: report.table,
})

/**
 * Notifier that keeps every report for printing once all providers are done.
 */
export const createReportCollector = (): ReportNotifier & { reports: ProviderReportOutput[] } => {
  const reports: ProviderReportOutput[] = []
  return {
    reports,
    periodSalesReportCreated: (report) => {
      reports.push(toReportOutput(report))
    },
  }
}

const range = (boundaries: string[], index: number): string =>
  `${boundaries[index] ?? '?'} to ${boundaries[index + 1] ?? '?'}`

/**
 * Generates a formatted text report for terminal display.
 */
export const formatTextReport = (reports: ProviderReportOutput[]): string => {
  if (reports.length === 0) {
    return 'No providers to report on.'
  }

  const divider = '─'.repeat(60)

  return reports
    .map((report) => {
      const lines: string[] = []
      lines.push(`  ${report.providerName} (${report.period}, ${report.unit.toUpperCase()})`)
      lines.push(`  Last:      ${range(report.periods.recent, 1)}`)
      lines.push(`  Previous:  ${range(report.periods.recent, 0)}`)
      lines.push(`  Year ago:  ${range(report.periods.yearAgo, 0)}`)
      lines.push('')
      lines.push(
        formatTable(
          ['Metric', 'Last', 'vs Prev', 'vs Prev Year'],
          report.table.map((row) => [row.title, row.values.last, row.values.prev, row.values.prevYear]),
          ['left', 'right', 'right', 'right']
        )
      )
      return lines.join('\n')
    })
    .join(`\n\n${divider}\n\n`)
}

/**
 * Report CLI command implementation.
 *
 * @example
 * revenue-digest report --period monthly --provider acme --format text
 */
export const reportCommand = async (options: ReportOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const logger = createLogger(config.logLevel)

  const atTime = options.atTime ?? new Date()

  formatter.progress(`Loading ledger from ${config.ledgerPath}...`)
  const ledger = await loadLedger(config.ledgerPath)

  const providers = listProviders(ledger, options.providers)
  const missing = options.providers.filter((slug) => !providers.some((p) => p.slug === slug))
  if (missing.length > 0) {
    formatter.warn(`No provider found for: ${missing.join(', ')}`)
  }

  const collector = createReportCollector()
  runRevenueReport({
    atTime,
    granularity: options.period,
    providers,
    aggregator: createLedgerAggregator(ledger),
    notifier: collector,
    defaultUnit: config.defaultUnit,
    progress: formatter.progress,
    logger,
  })

  const result: RevenueReportResult = {
    success: true,
    atTime: atTime.toISOString(),
    period: options.period,
    reports: collector.reports,
  }

  // Add formatted text for text mode
  if (options.format === 'text') {
    result.formatted = formatTextReport(collector.reports)
  }

  formatter.success(result)
}
