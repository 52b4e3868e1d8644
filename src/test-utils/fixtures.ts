import { vi } from 'vitest'
import type { PeriodSequence } from '../periods/index.js'
import type { LedgerTransaction } from '../ledger/index.js'
import type {
  AggregationService,
  MetricAmounts,
  PeriodAmount,
  Provider,
  RawMetricValues,
} from '../reporting/types.js'

/**
 * Creates a mock Provider
 */
export const createMockProvider = (overrides: Partial<Provider> = {}): Provider => ({
  slug: 'acme',
  fullName: 'Acme Corp',
  ...overrides,
})

/**
 * Creates a mock ledger transaction
 */
export const createMockLedgerTransaction = (
  overrides: Partial<LedgerTransaction> = {}
): LedgerTransaction => ({
  id: `tx-${Math.random().toString(36).slice(2, 8)}`,
  createdAt: new Date('2024-02-10T12:00:00Z'),
  provider: 'acme',
  customer: 'customer-1',
  kind: 'sale',
  amount: 1000, // $10.00 in cents
  unit: 'usd',
  ...overrides,
})

/**
 * Same raw values for every metric unless overridden
 */
export const createMockAmounts = (
  overrides: Partial<MetricAmounts> = {},
  values: RawMetricValues = { last: 0, prev: 0, prevYear: 0 }
): MetricAmounts => ({
  'Total Sales': { ...values },
  'New Sales': { ...values },
  'Churned Sales': { ...values },
  Payments: { ...values },
  Refunds: { ...values },
  ...overrides,
})

/**
 * Recent windows (3 boundaries) get [prev, last]; year-ago windows get [prevYear].
 */
const toPeriodAmounts = (periods: PeriodSequence, values: RawMetricValues): PeriodAmount[] => {
  const amounts = periods.length === 3 ? [values.prev, values.last] : [values.prevYear]
  return amounts.map((amount, i) => ({ start: periods[i], end: periods[i + 1], amount }))
}

export interface MockAggregatorUnits {
  sales: string | null
  payments: string | null
  refunds: string | null
}

/**
 * Aggregator answering from fixed per-provider amounts.
 */
export const createMockAggregator = (
  amountsFor: (provider: Provider) => MetricAmounts,
  unitsFor: (provider: Provider) => MockAggregatorUnits = () => ({
    sales: 'usd',
    payments: 'usd',
    refunds: 'usd',
  })
) => {
  const salesChangeByPeriod = vi.fn<AggregationService['salesChangeByPeriod']>(
    (provider, periods) => {
      const amounts = amountsFor(provider)
      return {
        total: toPeriodAmounts(periods, amounts['Total Sales']),
        new: toPeriodAmounts(periods, amounts['New Sales']),
        churned: toPeriodAmounts(periods, amounts['Churned Sales']),
        unit: unitsFor(provider).sales,
      }
    }
  )

  const amountsByPeriod = vi.fn<AggregationService['amountsByPeriod']>(
    (provider, account, periods) => {
      const amounts = amountsFor(provider)
      const units = unitsFor(provider)
      return account === 'payment'
        ? { amounts: toPeriodAmounts(periods, amounts.Payments), unit: units.payments }
        : { amounts: toPeriodAmounts(periods, amounts.Refunds), unit: units.refunds }
    }
  )

  return { salesChangeByPeriod, amountsByPeriod } satisfies AggregationService
}

/**
 * Logger whose methods are spies
 */
export const createMockLogger = () => ({
  error: vi.fn(),
  warn: vi.fn(),
})

/**
 * Boundaries as UTC ISO strings, whatever zone they carry
 */
export const toUtcIso = (sequence: readonly Date[]): string[] =>
  sequence.map((date) => new Date(date.getTime()).toISOString())
