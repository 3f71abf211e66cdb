/**
 * Events
 *
 * Events are produced by collaborators; this library only reads their uid,
 * begin and end. Extra fields ride along untouched.
 */

import type { LocalDateTime } from './time-date'
import type { Period } from './period'

export { InvalidRangeError } from './errors'
import { InvalidRangeError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type EventRecord = {
  readonly uid: string
  readonly begin: LocalDateTime
  readonly end: LocalDateTime
}

export type CalendarEvent<T = undefined> = EventRecord & {
  readonly data: T
}

// ============================================================================
// Construction
// ============================================================================

export function createEvent(uid: string, begin: LocalDateTime, end: LocalDateTime): CalendarEvent
export function createEvent<T>(uid: string, begin: LocalDateTime, end: LocalDateTime, data: T): CalendarEvent<T>
export function createEvent<T>(
  uid: string,
  begin: LocalDateTime,
  end: LocalDateTime,
  data?: T,
): CalendarEvent<T | undefined> {
  if (end < begin) {
    throw new InvalidRangeError(`Event '${uid}' ends (${end}) before it begins (${begin})`)
  }
  return Object.freeze({ uid, begin, end, data })
}

// ============================================================================
// Queries
// ============================================================================

function isInstant(event: EventRecord): boolean {
  return event.begin === event.end
}

export function eventContains(event: EventRecord, instant: LocalDateTime): boolean {
  if (isInstant(event)) return instant === event.begin
  return event.begin <= instant && instant < event.end
}

/** Whether the event shares at least one instant with [begin, end). */
export function eventOverlaps(event: EventRecord, begin: LocalDateTime, end: LocalDateTime): boolean {
  if (isInstant(event)) return begin <= event.begin && event.begin < end
  return event.begin < end && begin < event.end
}

export function eventIsDuring(event: EventRecord, period: Period): boolean {
  return eventOverlaps(event, period.begin, period.end)
}

export function eventContainsPeriod(event: EventRecord, period: Period): boolean {
  return event.begin <= period.begin && period.end <= event.end
}
