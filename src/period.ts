/**
 * Periods
 *
 * A period is an immutable half-open span [begin, end) of one granularity.
 * Granularities form a closed set; each one has a boundary predicate its
 * begin must satisfy and a calendar span that produces its end. Everything
 * here is a pure function over the Period record: periods hold no reference
 * to the factory that built them.
 */

import { DateTime } from 'luxon'
import {
  type LocalDateTime,
  type Weekday,
  addSeconds, addMinutes, addHours, addDaysToDateTime, addMonths, addYears,
  addDays, dateOf, timeOf, dayOf, monthOf, yearOf, minuteOf, secondOf,
  dayOfWeek, weekdayToIndex, isoWeekOf, fromDate,
} from './time-date'

export { InvalidBoundaryError, InvalidGranularityError } from './errors'
import { InvalidBoundaryError, InvalidGranularityError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Coarsest first. */
export const GRANULARITIES = ['year', 'month', 'week', 'day', 'hour', 'minute', 'second'] as const

export type Granularity = (typeof GRANULARITIES)[number]

export type Period<G extends Granularity = Granularity> = {
  readonly granularity: G
  readonly begin: LocalDateTime
  readonly end: LocalDateTime
}

export type Year = Period<'year'>
export type Month = Period<'month'>
export type Week = Period<'week'>
export type Day = Period<'day'>
export type Hour = Period<'hour'>
export type Minute = Period<'minute'>
export type Second = Period<'second'>

export type IntervalUnit = 'years' | 'months' | 'days' | 'hours' | 'minutes' | 'seconds'

/** Calendar interval, shaped like a Luxon DurationLike object. */
export type DateInterval = { readonly [K in IntervalUnit]?: number }

// ============================================================================
// Granularity Table
// ============================================================================

const SPANS: Record<Granularity, { unit: IntervalUnit; amount: number }> = {
  year: { unit: 'years', amount: 1 },
  month: { unit: 'months', amount: 1 },
  week: { unit: 'days', amount: 7 },
  day: { unit: 'days', amount: 1 },
  hour: { unit: 'hours', amount: 1 },
  minute: { unit: 'minutes', amount: 1 },
  second: { unit: 'seconds', amount: 1 },
}

export function isGranularity(value: unknown): value is Granularity {
  return GRANULARITIES.some((g) => g === value)
}

export function assertGranularity(value: string): Granularity {
  if (!isGranularity(value)) {
    throw new InvalidGranularityError(
      `Unknown period type '${value}', expected one of: ${GRANULARITIES.join(', ')}`,
    )
  }
  return value
}

export function getDateInterval(granularity: Granularity): DateInterval {
  const { unit, amount } = SPANS[granularity]
  const interval: { [K in IntervalUnit]?: number } = {}
  interval[unit] = amount
  return interval
}

function shift(dt: LocalDateTime, unit: IntervalUnit, n: number): LocalDateTime {
  switch (unit) {
    case 'years': return addYears(dt, n)
    case 'months': return addMonths(dt, n)
    case 'days': return addDaysToDateTime(dt, n)
    case 'hours': return addHours(dt, n)
    case 'minutes': return addMinutes(dt, n)
    case 'seconds': return addSeconds(dt, n)
  }
}

/** Begin shifted by `count` canonical spans of the granularity. */
export function shiftBegin(granularity: Granularity, begin: LocalDateTime, count: number): LocalDateTime {
  const { unit, amount } = SPANS[granularity]
  return shift(begin, unit, amount * count)
}

export function spanEnd(granularity: Granularity, begin: LocalDateTime): LocalDateTime {
  return shiftBegin(granularity, begin, 1)
}

// ============================================================================
// Boundary Predicates
// ============================================================================

function isMidnight(instant: LocalDateTime): boolean {
  return timeOf(instant) === '00:00:00'
}

export function isValid(
  granularity: Granularity,
  instant: LocalDateTime,
  firstWeekday: Weekday = 'mon',
): boolean {
  const time = timeOf(instant)
  switch (granularity) {
    case 'second':
      return true
    case 'minute':
      return secondOf(time) === 0
    case 'hour':
      return minuteOf(time) === 0 && secondOf(time) === 0
    case 'day':
      return isMidnight(instant)
    case 'week':
      return isMidnight(instant) && dayOfWeek(dateOf(instant)) === firstWeekday
    case 'month':
      return isMidnight(instant) && dayOf(instant) === 1
    case 'year':
      return isMidnight(instant) && dayOf(instant) === 1 && monthOf(instant) === 1
  }
}

// ============================================================================
// Construction
// ============================================================================

function build<G extends Granularity>(granularity: G, begin: LocalDateTime): Period<G> {
  return Object.freeze({ granularity, begin, end: spanEnd(granularity, begin) })
}

/**
 * Builds a period whose begin already sits on the granularity's boundary.
 * Never normalizes: use the period factory to build from an arbitrary instant.
 */
export function makePeriod<G extends Granularity>(
  granularity: G,
  begin: LocalDateTime,
  firstWeekday: Weekday = 'mon',
): Period<G> {
  assertGranularity(granularity)
  if (!isValid(granularity, begin, firstWeekday)) {
    const detail = granularity === 'week' ? ` (first weekday '${firstWeekday}')` : ''
    throw new InvalidBoundaryError(`'${begin}' is not a valid ${granularity} boundary${detail}`)
  }
  return build(granularity, begin)
}

// ============================================================================
// Queries
// ============================================================================

export function getBegin(period: Period): LocalDateTime {
  return period.begin
}

export function getEnd(period: Period): LocalDateTime {
  return period.end
}

export function contains(period: Period, instant: LocalDateTime): boolean {
  return period.begin <= instant && instant < period.end
}

export function overlaps(period: Period, other: Period): boolean {
  return period.begin < other.end && other.begin < period.end
}

/**
 * Strict: `other` lies entirely inside `period`.
 * Non-strict: the two periods share at least one instant.
 */
export function includes(period: Period, other: Period, strict = true): boolean {
  if (strict) return period.begin <= other.begin && other.end <= period.end
  return overlaps(period, other)
}

export function equals(period: Period, other: Period): boolean {
  return period.granularity === other.granularity
    && period.begin === other.begin
    && period.end === other.end
}

export function isCurrent(period: Period, now: LocalDateTime = fromDate(new Date())): boolean {
  return contains(period, now)
}

// ============================================================================
// Navigation
// ============================================================================

export function getNext<G extends Granularity>(period: Period<G>): Period<G> {
  return build(period.granularity, period.end)
}

export function getPrevious<G extends Granularity>(period: Period<G>): Period<G> {
  return build(period.granularity, shiftBegin(period.granularity, period.begin, -1))
}

// ============================================================================
// Display
// ============================================================================

function toLuxon(instant: LocalDateTime, locale: string): DateTime {
  // Wall-clock fields are rendered as-is; UTC has no gaps to shift them
  return DateTime.fromISO(instant, { zone: 'utc', locale })
}

/** Formats the period's begin with a Luxon format pattern. */
export function format(period: Period, pattern: string, locale = 'en-US'): string {
  return toLuxon(period.begin, locale).toFormat(pattern)
}

/** ISO week number of the first Monday on or after the period's begin. */
export function weekNumberOf(period: Period): number {
  const begin = dateOf(period.begin)
  const offset = (7 - weekdayToIndex(dayOfWeek(begin))) % 7
  return isoWeekOf(addDays(begin, offset)).week
}

export function toDisplayString(period: Period): string {
  switch (period.granularity) {
    case 'year':
      return String(yearOf(period.begin))
    case 'month':
      return format(period, 'LLLL')
    case 'week':
      return `Week ${weekNumberOf(period)}`
    case 'day':
      return format(period, 'cccc')
    case 'hour':
    case 'minute':
      return format(period, 'HH:mm')
    case 'second':
      return format(period, 'HH:mm:ss')
  }
}
