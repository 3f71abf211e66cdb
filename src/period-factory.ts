/**
 * Period Factory
 *
 * Normalizes arbitrary instants onto each granularity's boundary and builds
 * the matching period. The factory is configuration-only (the first weekday
 * used by weeks) and is passed explicitly wherever periods need to spawn
 * finer periods, such as iteration.
 */

import {
  type LocalDateTime,
  type Weekday,
  addDays, dateOf, timeOf, makeDate, makeDateTime, makeTime,
  yearOf, monthOf, hourOf, minuteOf,
  dayOfWeek, weekdayToIndex, isWeekday,
} from './time-date'
import {
  type Granularity,
  type Period,
  assertGranularity, makePeriod, getNext, getPrevious,
  isValid as isValidBoundary,
} from './period'

export { InvalidGranularityError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type PeriodFactoryConfig = {
  /** Day weeks start on. Defaults to Monday. */
  firstWeekday?: Weekday
}

export type PeriodFactory = {
  readonly firstWeekday: Weekday

  createPeriod(granularity: string, instant: LocalDateTime): Period
  createNext<G extends Granularity>(period: Period<G>): Period<G>
  createPrevious<G extends Granularity>(period: Period<G>): Period<G>

  createYear(instant: LocalDateTime): Period<'year'>
  createMonth(instant: LocalDateTime): Period<'month'>
  createWeek(instant: LocalDateTime): Period<'week'>
  createDay(instant: LocalDateTime): Period<'day'>
  createHour(instant: LocalDateTime): Period<'hour'>
  createMinute(instant: LocalDateTime): Period<'minute'>
  createSecond(instant: LocalDateTime): Period<'second'>

  findFirstDayOfWeek(instant: LocalDateTime): LocalDateTime
  isValid(granularity: Granularity, instant: LocalDateTime): boolean
}

// ============================================================================
// Normalization
// ============================================================================

/** Midnight of the first `firstWeekday` on or before `instant`. */
export function startOfWeek(instant: LocalDateTime, firstWeekday: Weekday): LocalDateTime {
  const date = dateOf(instant)
  const back = (weekdayToIndex(dayOfWeek(date)) - weekdayToIndex(firstWeekday) + 7) % 7
  return makeDateTime(addDays(date, -back))
}

/** Truncates `instant` to the granularity's boundary. Total for every instant. */
export function normalize(
  granularity: Granularity,
  instant: LocalDateTime,
  firstWeekday: Weekday = 'mon',
): LocalDateTime {
  const date = dateOf(instant)
  const time = timeOf(instant)
  switch (granularity) {
    case 'second':
      return instant
    case 'minute':
      return makeDateTime(date, makeTime(hourOf(time), minuteOf(time), 0))
    case 'hour':
      return makeDateTime(date, makeTime(hourOf(time), 0, 0))
    case 'day':
      return makeDateTime(date)
    case 'week':
      return startOfWeek(instant, firstWeekday)
    case 'month':
      return makeDateTime(makeDate(yearOf(date), monthOf(date), 1))
    case 'year':
      return makeDateTime(makeDate(yearOf(date), 1, 1))
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createPeriodFactory(config: PeriodFactoryConfig = {}): PeriodFactory {
  const firstWeekday = config.firstWeekday ?? 'mon'
  if (!isWeekday(firstWeekday)) {
    throw new ValidationError(`Invalid first weekday: '${String(firstWeekday)}'`)
  }

  function create<G extends Granularity>(granularity: G, instant: LocalDateTime): Period<G> {
    return makePeriod(granularity, normalize(granularity, instant, firstWeekday), firstWeekday)
  }

  const factory: PeriodFactory = {
    firstWeekday,

    createPeriod(granularity, instant) {
      return create(assertGranularity(granularity), instant)
    },

    createNext<G extends Granularity>(period: Period<G>): Period<G> {
      return getNext(period)
    },

    createPrevious<G extends Granularity>(period: Period<G>): Period<G> {
      return getPrevious(period)
    },

    createYear: (instant) => create('year', instant),
    createMonth: (instant) => create('month', instant),
    createWeek: (instant) => create('week', instant),
    createDay: (instant) => create('day', instant),
    createHour: (instant) => create('hour', instant),
    createMinute: (instant) => create('minute', instant),
    createSecond: (instant) => create('second', instant),

    findFirstDayOfWeek(instant) {
      return startOfWeek(instant, firstWeekday)
    },

    isValid(granularity, instant) {
      return isValidBoundary(granularity, instant, firstWeekday)
    },
  }

  return Object.freeze(factory)
}
