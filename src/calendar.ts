/**
 * Calendar
 *
 * Consumer-facing entry point that ties one period factory to one event
 * manager. Handles numeric lookups (year, month, ISO week) and validates
 * them before any period is built.
 */

import {
  type LocalDateTime,
  type Weekday,
  makeDate, makeDateTime, isoWeekStart, isoWeeksInYear, MIN_YEAR, MAX_YEAR,
} from './time-date'
import type { Period } from './period'
import { type PeriodFactory, createPeriodFactory } from './period-factory'
import { type PeriodCursor, childrenOf, createPeriodCursor, weeksOf } from './period-iteration'
import type { EventRecord } from './event'
import type { EventProvider } from './event-provider'
import type { CollectionFactory, EventCollection } from './collection'
import { type EventManager, type FindOptions, createEventManager } from './event-manager'

export { ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CalendarConfig<E extends EventRecord = EventRecord> = {
  firstWeekday?: Weekday
  providers?: ReadonlyArray<EventProvider<E>> | Readonly<Record<string, EventProvider<E>>>
  collectionFactory?: CollectionFactory
}

export type Calendar<E extends EventRecord = EventRecord> = {
  readonly factory: PeriodFactory
  readonly eventManager: EventManager<E>

  getYear(yearOrInstant: number | LocalDateTime): Period<'year'>
  getMonth(instant: LocalDateTime): Period<'month'>
  getMonth(year: number, month: number): Period<'month'>
  getWeek(instant: LocalDateTime): Period<'week'>
  getWeek(isoYear: number, isoWeek: number): Period<'week'>
  getDay(instant: LocalDateTime): Period<'day'>
  getHour(instant: LocalDateTime): Period<'hour'>
  getMinute(instant: LocalDateTime): Period<'minute'>
  getSecond(instant: LocalDateTime): Period<'second'>
  getPeriod(granularity: string, instant: LocalDateTime): Period

  children(period: Period): Generator<[number, Period], void, undefined>
  cursor(period: Period): PeriodCursor
  weeksOf(month: Period<'month'>): Period<'week'>[]

  getEvents(period: Period, options?: FindOptions): EventCollection<E>
}

// ============================================================================
// Validation
// ============================================================================

function requireInt(value: number, min: number, max: number, label: string): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${label} must be an integer between ${min} and ${max}, got ${value}`)
  }
  return value
}

function requireYear(year: number): number {
  return requireInt(year, MIN_YEAR, MAX_YEAR, 'Year')
}

// ============================================================================
// Calendar
// ============================================================================

export function createCalendar<E extends EventRecord = EventRecord>(config: CalendarConfig<E> = {}): Calendar<E> {
  const factory = createPeriodFactory({ firstWeekday: config.firstWeekday })
  const eventManager = createEventManager<E>({
    providers: config.providers,
    collectionFactory: config.collectionFactory,
  })

  function getMonth(yearOrInstant: number | LocalDateTime, month?: number): Period<'month'> {
    if (typeof yearOrInstant === 'string') return factory.createMonth(yearOrInstant)
    const year = requireYear(yearOrInstant)
    const m = requireInt(month ?? Number.NaN, 1, 12, 'Month')
    return factory.createMonth(makeDateTime(makeDate(year, m, 1)))
  }

  function getWeek(yearOrInstant: number | LocalDateTime, week?: number): Period<'week'> {
    if (typeof yearOrInstant === 'string') return factory.createWeek(yearOrInstant)
    const year = requireYear(yearOrInstant)
    const w = requireInt(week ?? Number.NaN, 1, isoWeeksInYear(year), `Week of ${year}`)
    return factory.createWeek(makeDateTime(isoWeekStart(year, w)))
  }

  return {
    factory,
    eventManager,

    getYear(yearOrInstant) {
      if (typeof yearOrInstant === 'string') return factory.createYear(yearOrInstant)
      return factory.createYear(makeDateTime(makeDate(requireYear(yearOrInstant), 1, 1)))
    },

    getMonth,
    getWeek,

    getDay: (instant) => factory.createDay(instant),
    getHour: (instant) => factory.createHour(instant),
    getMinute: (instant) => factory.createMinute(instant),
    getSecond: (instant) => factory.createSecond(instant),
    getPeriod: (granularity, instant) => factory.createPeriod(granularity, instant),

    children: (period) => childrenOf(period, factory),
    cursor: (period) => createPeriodCursor(period, factory),
    weeksOf: (month) => weeksOf(month, factory),

    getEvents(period, options) {
      return eventManager.find(period, options)
    },
  }
}
