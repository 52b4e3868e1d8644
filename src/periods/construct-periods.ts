import { TZDate, tzOffset } from '@date-fns/tz'
import { subYears } from 'date-fns'
import {
  dayPeriods,
  hourPeriods,
  monthPeriods,
  weekPeriods,
  yearPeriods,
} from './period-generators.js'
import {
  isGranularity,
  type Granularity,
  type PeriodConstruction,
  type PeriodGenerator,
} from './period-types.js'
import { resolveTimezone } from './timezone.js'

/**
 * Picks the generator for a granularity.
 */
export const periodGenerator = (granularity: Granularity): PeriodGenerator => {
  switch (granularity) {
    case 'hourly':
      return hourPeriods
    case 'daily':
      return dayPeriods
    case 'weekly':
      return weekPeriods
    case 'monthly':
      return monthPeriods
    case 'yearly':
      return yearPeriods
    default: {
      const unreachable: never = granularity
      throw new Error(`Unhandled granularity: ${String(unreachable)}`)
    }
  }
}

const MINUTE_MS = 60 * 1000
const HALF_DAY_MS = 12 * 60 * MINUTE_MS

/**
 * Resolves a wall-clock time (given as UTC fields) to an instant in `timeZone`.
 * A time repeated when clocks fall back resolves to its standard-time
 * occurrence; a time skipped when clocks spring forward is read with the
 * standard offset.
 */
const fromWallClock = (wallClock: number, timeZone: string): TZDate => {
  const offsets = [
    tzOffset(timeZone, new Date(wallClock - HALF_DAY_MS)),
    tzOffset(timeZone, new Date(wallClock + HALF_DAY_MS)),
  ]
  const standardOffset = Math.min(...offsets)

  const matching = offsets.filter(
    (offset) => tzOffset(timeZone, new Date(wallClock - offset * MINUTE_MS)) === offset
  )
  const offset = matching.includes(standardOffset) ? standardOffset : (matching[0] ?? standardOffset)

  return new TZDate(wallClock - offset * MINUTE_MS, timeZone)
}

/**
 * Truncates `atTime` (read in UTC) and re-reads the same wall-clock time in
 * `timeZone`. Yearly anchors keep their minute.
 */
export const localizeAnchor = (
  atTime: Date,
  granularity: Granularity,
  timeZone: string
): TZDate =>
  fromWallClock(
    Date.UTC(
      atTime.getUTCFullYear(),
      atTime.getUTCMonth(),
      atTime.getUTCDate(),
      atTime.getUTCHours(),
      granularity === 'yearly' ? atTime.getUTCMinutes() : 0
    ),
    timeZone
  )

/**
 * Derives the two most recent consecutive periods and the matching period
 * one year earlier.
 *
 * @example
 * const result = constructDatePeriods(new Date('2024-03-15T10:37:00Z'), 'monthly')
 * if (result.status === 'ok') {
 *   result.recent  // 2024-01-01, 2024-02-01, 2024-03-01
 *   result.yearAgo // 2023-02-01, 2023-03-01
 * }
 */
export const constructDatePeriods = (
  atTime: Date,
  granularity: string,
  timeZone?: string | null
): PeriodConstruction => {
  if (!isGranularity(granularity)) {
    return { status: 'unsupported', granularity }
  }

  const zone = resolveTimezone(timeZone)
  const base = localizeAnchor(atTime, granularity, zone)
  const generate = periodGenerator(granularity)

  // Yearly windows end on the anchor itself
  const includeStartDate = granularity === 'yearly'

  let prevYearFromDate = subYears(base, 1)
  if (base.getDate() === 1 && base.getMonth() === 0) {
    prevYearFromDate = subYears(prevYearFromDate, 1)
  }

  return {
    status: 'ok',
    granularity,
    base,
    prevYearFromDate,
    recent: generate(2, base, zone, includeStartDate),
    yearAgo: generate(1, prevYearFromDate, zone, false),
  }
}
