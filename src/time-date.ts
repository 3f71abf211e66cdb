/**
 * Time & Date Utilities
 *
 * Pure functions for parsing, formatting and calendar arithmetic on wall-clock
 * local date-times. Uses Julian Day Number for all day arithmetic so month
 * lengths, leap years and DST never leak into period boundaries: adding a day
 * always lands on the same wall-clock time of the next calendar date.
 */

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Errors
// ============================================================================

export { ParseError, ValidationError } from './errors'
import { ParseError, ValidationError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

/**
 * Years accepted from text. One year of headroom on each side keeps every
 * period span and step from a parsed instant inside the four-digit format.
 */
export const MIN_YEAR = 1
export const MAX_YEAR = 9998

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 31
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

function jdnOf(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_RE = /^(\d{2}):(\d{2})(?::(\d{2}))?$/

export function parseDate(str: string): LocalDate {
  const match = DATE_RE.exec(str)
  if (!match) throw new ParseError(`Invalid date format: '${str}'`)

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (year < MIN_YEAR || year > MAX_YEAR)
    throw new ParseError(`Year out of range (${MIN_YEAR}-${MAX_YEAR}) in date: '${str}'`)
  if (month < 1 || month > 12)
    throw new ParseError(`Invalid month in date: '${str}'`)
  if (day < 1 || day > daysInMonth(year, month))
    throw new ParseError(`Invalid day in date: '${str}'`)

  return makeDate(year, month, day)
}

export function parseTime(str: string): LocalTime {
  const match = TIME_RE.exec(str)
  if (!match) throw new ParseError(`Invalid time format: '${str}'`)

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    throw new ParseError(`Invalid hour in time: '${str}'`)
  if (minute > 59)
    throw new ParseError(`Invalid minute in time: '${str}'`)
  if (second > 59)
    throw new ParseError(`Invalid second in time: '${str}'`)

  return makeTime(hour, minute, second)
}

export function parseDateTime(str: string): LocalDateTime {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) throw new ParseError(`Invalid datetime format (missing T): '${str}'`)

  try {
    return makeDateTime(parseDate(str.substring(0, tIdx)), parseTime(str.substring(tIdx + 1)))
  } catch (e) {
    if (e instanceof ParseError) throw new ParseError(`Invalid datetime: '${str}'`)
    throw e
  }
}

/** Non-throwing check that `str` is a well-formed LocalDateTime. */
export function isLocalDateTime(str: string): str is LocalDateTime {
  try {
    return parseDateTime(str) === str
  } catch (e) {
    if (e instanceof ParseError) return false
    throw e
  }
}

// ============================================================================
// Construction
// ============================================================================

/** Throws ValidationError for years the YYYY format cannot hold (0000-9999). */
export function makeDate(year: number, month: number, day: number): LocalDate {
  if (!Number.isInteger(year) || year < 0 || year > 9999) {
    throw new ValidationError(`Year ${year} is outside the representable range 0000-9999`)
  }
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time?: LocalTime): LocalDateTime {
  return `${date}T${time ?? makeTime(0, 0, 0)}` as LocalDateTime
}

/** Wall-clock fields of a host Date, read in the host's local zone. */
export function fromDate(date: Date): LocalDateTime {
  return makeDateTime(
    makeDate(date.getFullYear(), date.getMonth() + 1, date.getDate()),
    makeTime(date.getHours(), date.getMinutes(), date.getSeconds()),
  )
}

/** Host Date for a wall-clock instant, interpreted in the host's local zone. */
export function toDate(dt: LocalDateTime): Date {
  const d = dateOf(dt), t = timeOf(dt)
  return new Date(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate | LocalDateTime): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate | LocalDateTime): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate | LocalDateTime): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(jdnOf(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return jdnOf(b) - jdnOf(a)
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  const time = timeOf(dt)
  let total = hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time) + n

  // Floor division keeps negative offsets on the previous day
  const dayDelta = Math.floor(total / 86400)
  total = total - dayDelta * 86400

  const newTime = makeTime(Math.floor(total / 3600), Math.floor((total % 3600) / 60), total % 60)
  const date = dateOf(dt)
  return makeDateTime(dayDelta === 0 ? date : addDays(date, dayDelta), newTime)
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, n * 60)
}

export function addHours(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, n * 3600)
}

export function addDaysToDateTime(dt: LocalDateTime, n: number): LocalDateTime {
  return makeDateTime(addDays(dateOf(dt), n), timeOf(dt))
}

export function addWeeks(dt: LocalDateTime, n: number): LocalDateTime {
  return addDaysToDateTime(dt, n * 7)
}

/** Adds calendar months; the day is clamped to the target month's length. */
export function addMonths(dt: LocalDateTime, n: number): LocalDateTime {
  const index = yearOf(dt) * 12 + (monthOf(dt) - 1) + n
  const year = Math.floor(index / 12)
  const month = index - year * 12 + 1
  const day = Math.min(dayOf(dt), daysInMonth(year, month))
  return makeDateTime(makeDate(year, month, day), timeOf(dt))
}

export function addYears(dt: LocalDateTime, n: number): LocalDateTime {
  return addMonths(dt, n * 12)
}

// ============================================================================
// Day-of-Week & ISO Weeks
// ============================================================================

const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function isWeekday(value: unknown): value is Weekday {
  return WEEKDAYS.some((w) => w === value)
}

export function dayOfWeek(date: LocalDate): Weekday {
  // JDN mod 7: 0 = Monday (1970-01-01 is JDN 2440588, mod 7 = 3, a Thursday)
  return indexToWeekday(jdnOf(date))
}

/** Monday = 0 … Sunday = 6 */
export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

/** ISO 8601 week-numbering year and week of a date. */
export function isoWeekOf(date: LocalDate): { year: number; week: number } {
  const thursday = addDays(date, 3 - weekdayToIndex(dayOfWeek(date)))
  const year = yearOf(thursday)
  const week = Math.floor(daysBetween(makeDate(year, 1, 1), thursday) / 7) + 1
  return { year, week }
}

/** Monday of the given ISO week. */
export function isoWeekStart(isoYear: number, week: number): LocalDate {
  const jan4 = makeDate(isoYear, 1, 4)
  const firstMonday = addDays(jan4, -weekdayToIndex(dayOfWeek(jan4)))
  return addDays(firstMonday, (week - 1) * 7)
}

export function isoWeeksInYear(isoYear: number): number {
  return isoWeekOf(makeDate(isoYear, 12, 28)).week
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function minDateTime(a: LocalDateTime, b: LocalDateTime): LocalDateTime {
  return a <= b ? a : b
}

export function maxDateTime(a: LocalDateTime, b: LocalDateTime): LocalDateTime {
  return a >= b ? a : b
}
