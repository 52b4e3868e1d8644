/**
 * Period alignment: builds the recent and year-ago windows a revenue
 * report compares.
 */

export { constructDatePeriods, localizeAnchor, periodGenerator } from './construct-periods.js'
export { describePeriodWindows } from './describe-periods.js'
export {
  hourPeriods,
  dayPeriods,
  weekPeriods,
  monthPeriods,
  yearPeriods,
} from './period-generators.js'
export { resolveTimezone, InvalidTimezoneError, UTC } from './timezone.js'
export { GRANULARITIES, isGranularity } from './period-types.js'

export type {
  Granularity,
  PeriodSequence,
  PeriodGenerator,
  PeriodWindows,
  PeriodConstruction,
} from './period-types.js'
