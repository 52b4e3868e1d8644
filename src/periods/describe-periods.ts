import { formatISO } from 'date-fns'
import type { Granularity, PeriodSequence, PeriodWindows } from './period-types.js'

const formatRange = (sequence: PeriodSequence, index: number): string => {
  const start = sequence[index]
  const end = sequence[index + 1]
  if (!start || !end) {
    throw new RangeError(`No period at index ${index} in a sequence of ${sequence.length} boundaries`)
  }
  return `${formatISO(start)} to ${formatISO(end)}`
}

/**
 * Describes the compared windows as two human-readable progress lines.
 *
 * @example
 * describePeriodWindows(windows, 'daily')
 * // => [
 * //   'Two last consecutive daily periods: 2024-03-13T00:00:00Z to ... and ...',
 * //   'Same daily period from the previous year: 2023-03-14T00:00:00Z to 2023-03-15T00:00:00Z',
 * // ]
 */
export const describePeriodWindows = (
  windows: PeriodWindows,
  granularity: Granularity
): [string, string] => {
  const current = `Two last consecutive ${granularity} periods: ${formatRange(windows.recent, 0)} and ${formatRange(windows.recent, 1)}`

  const previousYear =
    granularity === 'yearly'
      ? `Year before the corresponding yearly period: ${formatRange(windows.yearAgo, 0)}`
      : `Same ${granularity} period from the previous year: ${formatRange(windows.yearAgo, 0)}`

  return [current, previousYear]
}
