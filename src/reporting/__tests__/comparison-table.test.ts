import { describe, it, expect } from 'vitest'
import {
  buildComparisonTable,
  buildMetricRows,
  percentageChange,
  reconcileUnits,
  renderTable,
} from '../comparison-table.js'
import type { MetricAmounts } from '../types.js'
import { createMockAmounts } from '../../test-utils/fixtures.js'

describe('percentageChange', () => {
  it('prefixes increases with a plus sign', () => {
    expect(percentageChange(150, 100)).toBe('+50.0%')
    expect(percentageChange(110, 80)).toBe('+37.5%')
  })

  it('keeps the minus sign on decreases', () => {
    expect(percentageChange(80, 100)).toBe('-20.0%')
    expect(percentageChange(0, 100)).toBe('-100.0%')
  })

  it('rounds to two decimals', () => {
    expect(percentageChange(100, 300)).toBe('-66.67%')
    expect(percentageChange(200, 3)).toBe('+6566.67%')
  })

  it('rounds exact halves to the even hundredth', () => {
    expect(percentageChange(801, 800)).toBe('+0.12%')
    expect(percentageChange(803, 800)).toBe('+0.38%')
    expect(percentageChange(805, 800)).toBe('+0.62%')
    expect(percentageChange(799, 800)).toBe('-0.12%')
  })

  it('rounds the stored value, not its decimal spelling', () => {
    // 1.015 is stored just below the half
    expect(percentageChange(20203, 20000)).toBe('+1.01%')
  })

  it('shows no sign when nothing changed', () => {
    expect(percentageChange(100, 100)).toBe('0.0%')
  })

  it('returns N/A when the reference is zero', () => {
    expect(percentageChange(50, 0)).toBe('N/A')
    expect(percentageChange(0, 0)).toBe('N/A')
  })

  it('divides by a negative reference as is', () => {
    expect(percentageChange(50, -100)).toBe('-150.0%')
  })
})

describe('reconcileUnits', () => {
  it('keeps the first unit and flags a mismatch', () => {
    expect(reconcileUnits(['usd', 'usd', 'eur'], 'cad')).toEqual({
      unit: 'usd',
      distinct: ['usd', 'eur'],
      consistent: false,
    })
  })

  it('ignores aggregations without a unit', () => {
    expect(reconcileUnits([null, 'eur', null], 'usd')).toEqual({
      unit: 'eur',
      distinct: ['eur'],
      consistent: true,
    })
  })

  it('falls back to the default unit', () => {
    expect(reconcileUnits([null, null, undefined], 'usd')).toEqual({
      unit: 'usd',
      distinct: [],
      consistent: true,
    })
  })
})

describe('buildMetricRows', () => {
  it('emits rows in display order whatever order the amounts were given in', () => {
    const amounts: MetricAmounts = {
      Refunds: { last: 5, prev: 5, prevYear: 5 },
      Payments: { last: 4, prev: 4, prevYear: 4 },
      'Churned Sales': { last: 3, prev: 3, prevYear: 3 },
      'New Sales': { last: 2, prev: 2, prevYear: 2 },
      'Total Sales': { last: 1, prev: 1, prevYear: 1 },
    }

    const rows = buildMetricRows(amounts)

    expect(rows.map((row) => row.slug)).toEqual([
      'Total Sales',
      'New Sales',
      'Churned Sales',
      'Payments',
      'Refunds',
    ])
    expect(rows.map((row) => row.values.last)).toEqual([1, 2, 3, 4, 5])
    expect(rows.every((row) => row.slug === row.title)).toBe(true)
  })
})

describe('renderTable', () => {
  it('formats money and derives percentages from the raw amounts', () => {
    const rows = buildMetricRows(
      createMockAmounts({
        'Total Sales': { last: 150000, prev: 100000, prevYear: 0 },
        Refunds: { last: 8000, prev: 10000, prevYear: 4000 },
      })
    )

    const table = renderTable(rows, 'usd')

    expect(table[0]).toEqual({
      slug: 'Total Sales',
      title: 'Total Sales',
      values: { last: '$1,500.00', prev: '+50.0%', prevYear: 'N/A' },
    })
    expect(table[4]).toEqual({
      slug: 'Refunds',
      title: 'Refunds',
      values: { last: '$80.00', prev: '-20.0%', prevYear: '+100.0%' },
    })
  })

  it('leaves the raw rows untouched', () => {
    const rows = buildMetricRows(
      createMockAmounts({}, { last: 150, prev: 100, prevYear: 50 })
    )
    const snapshot = structuredClone(rows)

    renderTable(rows, 'usd')

    expect(rows).toEqual(snapshot)
  })
})

describe('buildComparisonTable', () => {
  it('returns the same table for the same input', () => {
    const amounts = createMockAmounts(
      { Payments: { last: 12345, prev: 0, prevYear: 23456 } },
      { last: 100, prev: 300, prevYear: 100 }
    )

    const first = buildComparisonTable(amounts, 'eur')
    const second = buildComparisonTable(amounts, 'eur')

    expect(JSON.stringify(second)).toBe(JSON.stringify(first))
    expect(first[3].values).toEqual({ last: '€123.45', prev: 'N/A', prevYear: '-47.37%' })
    expect(first[0].values).toEqual({ last: '€1.00', prev: '-66.67%', prevYear: '0.0%' })
  })
})
