import type { PeriodSequence } from '../periods/index.js'
import type {
  AggregatedAccount,
  AggregationService,
  PeriodAmount,
  Provider,
} from '../reporting/types.js'
import type { Ledger, LedgerTransaction } from './ledger-types.js'

interface Period {
  start: Date
  end: Date
}

const toPeriods = (boundaries: PeriodSequence): Period[] =>
  boundaries.slice(1).map((end, i) => ({ start: boundaries[i], end }))

const inRange = (tx: LedgerTransaction, start: number, end: number): boolean => {
  const at = tx.createdAt.getTime()
  return at >= start && at < end
}

const sum = (transactions: LedgerTransaction[]): number =>
  transactions.reduce((total, tx) => total + tx.amount, 0)

/**
 * Unit of the first transaction (ledger order) inside the requested span.
 */
const unitWithin = (transactions: LedgerTransaction[], periods: Period[]): string | null => {
  const first = periods[0]
  const last = periods[periods.length - 1]
  if (!first || !last) return null

  const match = transactions.find((tx) =>
    inRange(tx, first.start.getTime(), last.end.getTime())
  )
  return match?.unit ?? null
}

/**
 * Sums ledger transactions per period.
 *
 * Sales are split three ways for a period `[start, end)`:
 * - total: every sale in the period
 * - new: sales from customers with no sale before `start`
 * - churned: sales in the preceding window of the same length from customers
 *   with no sale in the period
 *
 * @example
 * const aggregator = createLedgerAggregator(ledger)
 * const { amounts, unit } = aggregator.amountsByPeriod(provider, 'payment', windows.recent)
 */
export const createLedgerAggregator = (ledger: Ledger): AggregationService => {
  const transactionsOf = (provider: Provider, kind: LedgerTransaction['kind']) =>
    ledger.transactions.filter((tx) => tx.provider === provider.slug && tx.kind === kind)

  const salesChangeByPeriod: AggregationService['salesChangeByPeriod'] = (provider, boundaries) => {
    const sales = transactionsOf(provider, 'sale')
    const periods = toPeriods(boundaries)

    const total: PeriodAmount[] = []
    const added: PeriodAmount[] = []
    const churned: PeriodAmount[] = []

    for (const { start, end } of periods) {
      const startMs = start.getTime()
      const endMs = end.getTime()
      const previousStartMs = startMs - (endMs - startMs)

      const current = sales.filter((tx) => inRange(tx, startMs, endMs))
      const activeCustomers = new Set(current.map((tx) => tx.customer))
      const knownCustomers = new Set(
        sales.filter((tx) => tx.createdAt.getTime() < startMs).map((tx) => tx.customer)
      )

      const newSales = current.filter((tx) => !knownCustomers.has(tx.customer))
      const lostSales = sales.filter(
        (tx) => inRange(tx, previousStartMs, startMs) && !activeCustomers.has(tx.customer)
      )

      total.push({ start, end, amount: sum(current) })
      added.push({ start, end, amount: sum(newSales) })
      churned.push({ start, end, amount: sum(lostSales) })
    }

    return { total, new: added, churned, unit: unitWithin(sales, periods) }
  }

  const amountsByPeriod = (
    provider: Provider,
    account: AggregatedAccount,
    boundaries: PeriodSequence
  ) => {
    const transactions = transactionsOf(provider, account)
    const periods = toPeriods(boundaries)

    return {
      amounts: periods.map(({ start, end }) => ({
        start,
        end,
        amount: sum(transactions.filter((tx) => inRange(tx, start.getTime(), end.getTime()))),
      })),
      unit: unitWithin(transactions, periods),
    }
  }

  return { salesChangeByPeriod, amountsByPeriod }
}
