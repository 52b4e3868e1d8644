/**
 * Types for aligned calendar periods.
 *
 * A period sequence is a list of boundary instants: N+1 boundaries describe
 * N contiguous half-open periods `[b[i], b[i + 1])`.
 */
import type { TZDate } from '@date-fns/tz'

export const GRANULARITIES = ['hourly', 'daily', 'weekly', 'monthly', 'yearly'] as const

/**
 * Calendar unit a report is computed over.
 *
 * @example
 * revenue-digest report --period monthly
 */
export type Granularity = (typeof GRANULARITIES)[number]

export const isGranularity = (value: string): value is Granularity =>
  GRANULARITIES.some((granularity) => granularity === value)

/** Strictly increasing, contiguous period boundaries */
export type PeriodSequence = readonly TZDate[]

/**
 * Builds `count + 1` boundaries walking backward from `fromDate`.
 */
export type PeriodGenerator = (
  count: number,
  fromDate: TZDate,
  timeZone: string,
  includeStartDate: boolean
) => PeriodSequence

export interface PeriodWindows {
  /** Two most recent consecutive periods (3 boundaries) */
  recent: PeriodSequence
  /** Same period one year earlier (2 boundaries) */
  yearAgo: PeriodSequence
}

/**
 * Outcome of constructing the comparison windows.
 * An unrecognized granularity is an explicit variant, never an empty list.
 */
export type PeriodConstruction =
  | ({
      status: 'ok'
      granularity: Granularity
      /** Truncated, localized anchor */
      base: TZDate
      /** Anchor the year-ago window is generated from */
      prevYearFromDate: TZDate
    } & PeriodWindows)
  | { status: 'unsupported'; granularity: string }
