import { asMoney } from './money.js'
import {
  METRIC_CATEGORIES,
  type MetricAmounts,
  type MetricRow,
  type RenderedMetricRow,
  type UnitReconciliation,
} from './types.js'

export const NOT_APPLICABLE = 'N/A'

/**
 * Rounds to two decimals on the exact binary value, ties to even.
 * Only odd multiples of 1/8 sit exactly halfway between two hundredths.
 */
const roundHundredths = (value: number): number => {
  const eighths = value * 8
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100)
    return (lower % 2 === 0 ? lower : lower + 1) / 100
  }
  return Number(value.toFixed(2))
}

/**
 * Percentage change of `current` relative to `previous`, rounded to two
 * decimals. A zero reference has no defined change and yields 'N/A'.
 *
 * @example
 * percentageChange(150, 100) // => '+50.0%'
 * percentageChange(80, 100)  // => '-20.0%'
 * percentageChange(801, 800) // => '+0.12%'
 * percentageChange(50, 0)    // => 'N/A'
 */
export const percentageChange = (current: number, previous: number): string => {
  if (previous === 0) return NOT_APPLICABLE

  const pct = roundHundredths(((current - previous) * 100) / previous)
  const formatted = `${Number.isInteger(pct) ? pct.toFixed(1) : String(pct)}%`
  return pct > 0 ? `+${formatted}` : formatted
}

/**
 * Picks the single unit a table is rendered in.
 * Empty units are ignored; the first distinct unit wins.
 */
export const reconcileUnits = (
  units: readonly (string | null | undefined)[],
  defaultUnit: string
): UnitReconciliation => {
  const distinct: string[] = []
  for (const unit of units) {
    if (unit && !distinct.includes(unit)) {
      distinct.push(unit)
    }
  }

  return {
    unit: distinct[0] ?? defaultUnit,
    distinct,
    consistent: distinct.length <= 1,
  }
}

/**
 * Lays out raw amounts as rows in display order.
 */
export const buildMetricRows = (amounts: MetricAmounts): MetricRow[] =>
  METRIC_CATEGORIES.map((category) => ({
    slug: category,
    title: category,
    values: { ...amounts[category] },
  }))

/**
 * Formats raw rows: percentages are derived from the raw amounts first,
 * then `last` becomes a money string. Input rows are left untouched.
 */
export const renderTable = (rows: readonly MetricRow[], unit: string): RenderedMetricRow[] =>
  rows.map(({ slug, title, values }) => ({
    slug,
    title,
    values: {
      last: asMoney(values.last, unit),
      prev: percentageChange(values.last, values.prev),
      prevYear: percentageChange(values.last, values.prevYear),
    },
  }))

/**
 * Builds the formatted comparison table for one provider.
 *
 * @example
 * const table = buildComparisonTable(amounts, 'usd')
 * table[0] // => { slug: 'Total Sales', title: 'Total Sales', values: { last: '$1,500.00', prev: '+50.0%', prevYear: 'N/A' } }
 */
export const buildComparisonTable = (amounts: MetricAmounts, unit: string): RenderedMetricRow[] =>
  renderTable(buildMetricRows(amounts), unit)
