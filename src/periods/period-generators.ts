import type { TZDate } from '@date-fns/tz'
import {
  startOfDay,
  startOfHour,
  startOfMonth,
  startOfWeek,
  startOfYear,
  subDays,
  subHours,
  subMonths,
  subWeeks,
  subYears,
} from 'date-fns'
import type { PeriodGenerator } from './period-types.js'

interface CalendarUnit {
  startOf: (date: TZDate) => TZDate
  subtract: (date: TZDate, amount: number) => TZDate
}

/**
 * Builds a generator that walks backward from `fromDate` in calendar steps.
 *
 * Without `includeStartDate` the last boundary is the start of the unit that
 * contains `fromDate`, so the in-progress period is left out. With it, the
 * last boundary is `fromDate` itself.
 */
const createGenerator =
  (unit: CalendarUnit): PeriodGenerator =>
  (count, fromDate, timeZone, includeStartDate) => {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Period count must be a positive integer, got ${count}`)
    }

    const from = fromDate.withTimeZone(timeZone)
    const start = unit.startOf(from)

    if (!includeStartDate) {
      return Array.from({ length: count + 1 }, (_, i) => unit.subtract(start, count - i))
    }

    // fromDate on a unit start would otherwise repeat as the previous boundary
    const lastStart = start.getTime() < from.getTime() ? start : unit.subtract(start, 1)
    const boundaries: TZDate[] = Array.from({ length: count }, (_, i) =>
      unit.subtract(lastStart, count - 1 - i)
    )
    boundaries.push(from)
    return boundaries
  }

export const hourPeriods = createGenerator({
  startOf: (date) => startOfHour(date),
  subtract: (date, amount) => subHours(date, amount),
})

export const dayPeriods = createGenerator({
  startOf: (date) => startOfDay(date),
  subtract: (date, amount) => subDays(date, amount),
})

// Weeks start on Monday
export const weekPeriods = createGenerator({
  startOf: (date) => startOfWeek(date, { weekStartsOn: 1 }),
  subtract: (date, amount) => subWeeks(date, amount),
})

export const monthPeriods = createGenerator({
  startOf: (date) => startOfMonth(date),
  subtract: (date, amount) => subMonths(date, amount),
})

export const yearPeriods = createGenerator({
  startOf: (date) => startOfYear(date),
  subtract: (date, amount) => subYears(date, amount),
})
