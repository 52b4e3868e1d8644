import type { PeriodWindows } from '../periods/index.js'
import type {
  AggregationService,
  PerfData,
  PeriodAmount,
  Provider,
  RawMetricValues,
} from './types.js'

const amountAt = (amounts: PeriodAmount[], index: number, label: string): number => {
  const period = amounts[index]
  if (!period) {
    throw new RangeError(`${label}: expected a period at index ${index}, got ${amounts.length}`)
  }
  return period.amount
}

/**
 * `last` is the newer recent period, `prev` the older one, `prevYear` the
 * single year-ago period.
 */
const toMetricValues = (
  recent: PeriodAmount[],
  yearAgo: PeriodAmount[],
  label: string
): RawMetricValues => ({
  last: amountAt(recent, 1, label),
  prev: amountAt(recent, 0, label),
  prevYear: amountAt(yearAgo, 0, label),
})

/**
 * Gathers the raw amounts of every metric for one provider.
 *
 * @example
 * const { amounts, units } = collectPerfData(aggregator, provider, windows)
 * amounts['Payments'] // => { last: 150000, prev: 100000, prevYear: 0 }
 * units               // => ['usd', 'usd', null]
 */
export const collectPerfData = (
  aggregator: AggregationService,
  provider: Provider,
  windows: PeriodWindows
): PerfData => {
  const sales = aggregator.salesChangeByPeriod(provider, windows.recent)
  const salesPrevYear = aggregator.salesChangeByPeriod(provider, windows.yearAgo)

  const payments = aggregator.amountsByPeriod(provider, 'payment', windows.recent)
  const paymentsPrevYear = aggregator.amountsByPeriod(provider, 'payment', windows.yearAgo)

  const refunds = aggregator.amountsByPeriod(provider, 'refund', windows.recent)
  const refundsPrevYear = aggregator.amountsByPeriod(provider, 'refund', windows.yearAgo)

  return {
    amounts: {
      'Total Sales': toMetricValues(sales.total, salesPrevYear.total, 'Total Sales'),
      'New Sales': toMetricValues(sales.new, salesPrevYear.new, 'New Sales'),
      'Churned Sales': toMetricValues(sales.churned, salesPrevYear.churned, 'Churned Sales'),
      Payments: toMetricValues(payments.amounts, paymentsPrevYear.amounts, 'Payments'),
      Refunds: toMetricValues(refunds.amounts, refundsPrevYear.amounts, 'Refunds'),
    },
    units: [sales.unit, payments.unit, refunds.unit],
  }
}
