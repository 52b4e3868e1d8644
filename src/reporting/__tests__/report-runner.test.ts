import { describe, it, expect, vi } from 'vitest'
import { runRevenueReport, type RunReportOptions } from '../report-runner.js'
import type { Provider, ReportNotifier } from '../types.js'
import { InvalidTimezoneError } from '../../periods/index.js'
import {
  createMockAggregator,
  createMockAmounts,
  createMockLogger,
  createMockProvider,
  toUtcIso,
} from '../../test-utils/fixtures.js'

const AT_TIME = new Date('2024-03-15T10:37:42.123Z')

const acme = createMockProvider({ slug: 'acme', fullName: 'Acme Corp' })
const globex = createMockProvider({
  slug: 'globex',
  fullName: 'Globex',
  defaultTimezone: 'America/New_York',
})

const amountsBySlug: Record<string, number> = { acme: 100, globex: 7 }

const setup = (overrides: Partial<RunReportOptions> = {}) => {
  const progressLines: string[] = []
  const notifier = { periodSalesReportCreated: vi.fn<ReportNotifier['periodSalesReportCreated']>() }
  const logger = createMockLogger()
  const aggregator = createMockAggregator((provider: Provider) =>
    createMockAmounts(
      {},
      {
        last: (amountsBySlug[provider.slug] ?? 0) * 150,
        prev: (amountsBySlug[provider.slug] ?? 0) * 100,
        prevYear: 0,
      }
    )
  )

  const options: RunReportOptions = {
    atTime: AT_TIME,
    granularity: 'monthly',
    providers: [acme, globex],
    aggregator,
    notifier,
    defaultUnit: 'usd',
    progress: (line) => progressLines.push(line),
    logger,
    ...overrides,
  }

  return { options, progressLines, notifier, logger }
}

describe('runRevenueReport', () => {
  it('announces the run', () => {
    const { options, progressLines } = setup()

    runRevenueReport(options)

    expect(progressLines[0]).toBe(
      'running revenue report for a monthly period at 2024-03-15T10:37:42.123Z'
    )
  })

  it('uses "an" for hourly runs', () => {
    const { options, progressLines } = setup({ granularity: 'hourly' })

    runRevenueReport(options)

    expect(progressLines[0]).toBe(
      'running revenue report for an hourly period at 2024-03-15T10:37:42.123Z'
    )
  })

  it('reports every provider with its own windows and amounts', () => {
    const { options, notifier } = setup()

    const reports = runRevenueReport(options)

    expect(reports).toHaveLength(2)
    expect(notifier.periodSalesReportCreated).toHaveBeenCalledTimes(2)

    const [acmeReport, globexReport] = reports
    expect(acmeReport.provider.slug).toBe('acme')
    expect(acmeReport.table[0].values).toEqual({ last: '$150.00', prev: '+50.0%', prevYear: 'N/A' })
    expect(toUtcIso(acmeReport.windows.recent)).toEqual([
      '2024-01-01T00:00:00.000Z',
      '2024-02-01T00:00:00.000Z',
      '2024-03-01T00:00:00.000Z',
    ])

    expect(globexReport.provider.slug).toBe('globex')
    expect(globexReport.table[0].values).toEqual({ last: '$10.50', prev: '+50.0%', prevYear: 'N/A' })
    expect(toUtcIso(globexReport.windows.recent)).toEqual([
      '2024-01-01T05:00:00.000Z',
      '2024-02-01T05:00:00.000Z',
      '2024-03-01T05:00:00.000Z',
    ])
  })

  it('describes the compared windows for each provider', () => {
    const { options, progressLines } = setup({ providers: [acme] })

    runRevenueReport(options)

    expect(progressLines.slice(1)).toEqual([
      'Provider acme',
      'Two last consecutive monthly periods: 2024-01-01T00:00:00Z to 2024-02-01T00:00:00Z and 2024-02-01T00:00:00Z to 2024-03-01T00:00:00Z',
      'Same monthly period from the previous year: 2023-02-01T00:00:00Z to 2023-03-01T00:00:00Z',
    ])
  })

  it('logs mismatched units and keeps the first one', () => {
    const { options, logger } = setup({
      providers: [acme],
      aggregator: createMockAggregator(
        () => createMockAmounts({}, { last: 100, prev: 100, prevYear: 100 }),
        () => ({ sales: 'usd', payments: 'usd', refunds: 'eur' })
      ),
    })

    const [report] = runRevenueReport(options)

    expect(report.unit).toBe('usd')
    expect(report.table[0].values.last).toBe('$1.00')
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith(
      { provider: 'acme', units: ['usd', 'eur'] },
      'different units in report (period=monthly): usd, eur'
    )
  })

  it('uses the default unit when no aggregation has one', () => {
    const { options, logger } = setup({
      providers: [acme],
      defaultUnit: 'eur',
      aggregator: createMockAggregator(
        () => createMockAmounts(),
        () => ({ sales: null, payments: null, refunds: null })
      ),
    })

    const [report] = runRevenueReport(options)

    expect(report.unit).toBe('eur')
    expect(report.table[0].values.last).toBe('€0.00')
    expect(logger.error).not.toHaveBeenCalled()
  })

  it('reports nothing for an unsupported period', () => {
    const { options, notifier, logger } = setup({ granularity: 'quarterly' })

    const reports = runRevenueReport(options)

    expect(reports).toEqual([])
    expect(notifier.periodSalesReportCreated).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledWith(
      { granularity: 'quarterly' },
      'unsupported period "quarterly", nothing to report'
    )
  })

  it('warns about an unsupported period even without providers', () => {
    const { options, progressLines, logger } = setup({ granularity: 'fortnightly', providers: [] })

    expect(runRevenueReport(options)).toEqual([])
    expect(progressLines).toHaveLength(1)
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith(
      { granularity: 'fortnightly' },
      'unsupported period "fortnightly", nothing to report'
    )
  })

  it('fails on a provider with an unknown timezone', () => {
    const { options } = setup({
      providers: [createMockProvider({ defaultTimezone: 'Atlantis/Capital' })],
    })

    expect(() => runRevenueReport(options)).toThrow(InvalidTimezoneError)
  })

  it('returns an empty list when there are no providers', () => {
    const { options, progressLines } = setup({ providers: [] })

    expect(runRevenueReport(options)).toEqual([])
    expect(progressLines).toHaveLength(1)
  })
})
