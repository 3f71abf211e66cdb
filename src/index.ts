/**
 * calendar-periods
 *
 * Public API exports
 */

// Error system: base class, codes and every error class
export {
  CalendarError, CalendarErrorCode,
  InvalidBoundaryError, InvalidGranularityError,
  ParseError, InvalidRangeError,
  ValidationError, NotFoundError,
} from './errors'
export type { CalendarErrorCode as CalendarErrorCodeType } from './errors'

// Time & Date: branded types and utilities
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  MIN_YEAR, MAX_YEAR, isLeapYear, daysInMonth, daysInYear,
  parseDate, parseTime, parseDateTime, isLocalDateTime,
  makeDate, makeTime, makeDateTime, fromDate, toDate,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addSeconds, addMinutes, addHours, addDaysToDateTime,
  addWeeks, addMonths, addYears,
  isWeekday, dayOfWeek, weekdayToIndex, indexToWeekday,
  isoWeekOf, isoWeekStart, isoWeeksInYear,
  compareDateTimes, minDateTime, maxDateTime,
} from './time-date'

// Periods
export type {
  Granularity, Period, Year, Month, Week, Day, Hour, Minute, Second,
  IntervalUnit, DateInterval,
} from './period'
export {
  GRANULARITIES, isGranularity, assertGranularity,
  getDateInterval, shiftBegin, spanEnd, isValid, makePeriod,
  getBegin, getEnd, contains, overlaps, includes, equals, isCurrent,
  getNext, getPrevious, format, weekNumberOf, toDisplayString,
} from './period'

// Period factory
export type { PeriodFactory, PeriodFactoryConfig } from './period-factory'
export { createPeriodFactory, normalize, startOfWeek } from './period-factory'

// Iteration
export type { CursorState, PeriodCursor } from './period-iteration'
export {
  childGranularity, childKey, createPeriodCursor, childrenOf, weeksOf,
} from './period-iteration'

// Events & collections
export type { EventRecord, CalendarEvent } from './event'
export {
  createEvent, eventContains, eventOverlaps, eventIsDuring, eventContainsPeriod,
} from './event'
export type { CollectionKey, EventCollection, CollectionFactory } from './collection'
export { createBasicCollection } from './basic-collection'
export type { IndexFunction, IndexedCollection } from './indexed-collection'
export { createIndexedCollection, dateIndex, monthIndex } from './indexed-collection'

// Providers & manager
export type {
  EventProvider, ProviderOptions, CachedProvider, CachedProviderOptions,
} from './event-provider'
export {
  createArrayProvider, createAggregateProvider, createCachedProvider,
} from './event-provider'
export type {
  EventManager, EventManagerConfig, EventManagerEvents, FindOptions, ProviderKey,
} from './event-manager'
export { createEventManager } from './event-manager'

// SQLite provider
export type {
  SqliteEventProvider, SqliteEventProviderOptions, SqliteEventColumns,
} from './sqlite-event-provider'
export { createSqliteEventProvider } from './sqlite-event-provider'

// High-level API
export type { Calendar, CalendarConfig } from './calendar'
export { createCalendar } from './calendar'
