/**
 * Segment 05: Events & Basic Collection Tests
 */

import { describe, it, expect } from 'vitest'
import {
  createEvent,
  eventContains,
  eventOverlaps,
  eventIsDuring,
  eventContainsPeriod,
  InvalidRangeError,
} from '../src/event'
import { createBasicCollection } from '../src/basic-collection'
import { makePeriod } from '../src/period'
import { parseDateTime } from '../src/time-date'
import { CalendarErrorCode } from '../src/errors'

const dt = parseDateTime

// ============================================================================
// 1. EVENT CONSTRUCTION
// ============================================================================

describe('createEvent', () => {
  it('keeps uid, bounds and data', () => {
    const event = createEvent('standup', dt('2024-03-15T09:00:00'), dt('2024-03-15T09:15:00'), { room: 'B2' })
    expect(event.uid).toBe('standup')
    expect(event.begin).toBe('2024-03-15T09:00:00')
    expect(event.end).toBe('2024-03-15T09:15:00')
    expect(event.data).toEqual({ room: 'B2' })
  })

  it('leaves data undefined when omitted', () => {
    expect(createEvent('e', dt('2024-03-15T09:00:00'), dt('2024-03-15T10:00:00')).data).toBeUndefined()
  })

  it('accepts a zero-length event', () => {
    const event = createEvent('ping', dt('2024-03-15T09:00:00'), dt('2024-03-15T09:00:00'))
    expect(event.begin).toBe(event.end)
  })

  it('rejects an event ending before it begins', () => {
    try {
      createEvent('backwards', dt('2024-03-15T10:00:00'), dt('2024-03-15T09:00:00'))
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidRangeError)
      if (e instanceof InvalidRangeError) {
        expect(e.code).toBe(CalendarErrorCode.INVALID_RANGE)
        expect(e.message).toBe("Event 'backwards' ends (2024-03-15T09:00:00) before it begins (2024-03-15T10:00:00)")
      }
    }
  })

  it('freezes the event', () => {
    expect(Object.isFrozen(createEvent('e', dt('2024-03-15T09:00:00'), dt('2024-03-15T10:00:00')))).toBe(true)
  })
})

// ============================================================================
// 2. EVENT QUERIES
// ============================================================================

describe('Event queries', () => {
  const meeting = createEvent('m', dt('2024-03-15T09:00:00'), dt('2024-03-15T10:00:00'))
  const ping = createEvent('p', dt('2024-03-15T12:00:00'), dt('2024-03-15T12:00:00'))
  const day = makePeriod('day', dt('2024-03-15T00:00:00'))
  const nextDay = makePeriod('day', dt('2024-03-16T00:00:00'))

  it('contains instants in [begin, end)', () => {
    expect(eventContains(meeting, dt('2024-03-15T09:00:00'))).toBe(true)
    expect(eventContains(meeting, dt('2024-03-15T09:59:59'))).toBe(true)
    expect(eventContains(meeting, dt('2024-03-15T10:00:00'))).toBe(false)
  })

  it('contains only its own instant when zero-length', () => {
    expect(eventContains(ping, dt('2024-03-15T12:00:00'))).toBe(true)
    expect(eventContains(ping, dt('2024-03-15T12:00:01'))).toBe(false)
  })

  it('overlaps half-open ranges', () => {
    expect(eventOverlaps(meeting, dt('2024-03-15T09:30:00'), dt('2024-03-15T11:00:00'))).toBe(true)
    expect(eventOverlaps(meeting, dt('2024-03-15T10:00:00'), dt('2024-03-15T11:00:00'))).toBe(false)
    expect(eventOverlaps(meeting, dt('2024-03-15T08:00:00'), dt('2024-03-15T09:00:00'))).toBe(false)
  })

  it('places a zero-length event in the period holding its instant', () => {
    expect(eventIsDuring(ping, day)).toBe(true)
    expect(eventIsDuring(ping, nextDay)).toBe(false)
  })

  it('places a multi-day event in every day it touches', () => {
    const trip = createEvent('t', dt('2024-03-15T18:00:00'), dt('2024-03-16T08:00:00'))
    expect(eventIsDuring(trip, day)).toBe(true)
    expect(eventIsDuring(trip, nextDay)).toBe(true)
  })

  it('contains a period it fully covers', () => {
    const conference = createEvent('c', dt('2024-03-14T00:00:00'), dt('2024-03-17T00:00:00'))
    expect(eventContainsPeriod(conference, day)).toBe(true)
    expect(eventContainsPeriod(meeting, day)).toBe(false)
  })
})

// ============================================================================
// 3. BASIC COLLECTION
// ============================================================================

describe('Basic collection', () => {
  const morning = createEvent('a', dt('2024-03-15T09:00:00'), dt('2024-03-15T10:00:00'))
  const evening = createEvent('b', dt('2024-03-15T18:00:00'), dt('2024-03-15T19:00:00'))
  const tomorrow = createEvent('c', dt('2024-03-16T09:00:00'), dt('2024-03-16T10:00:00'))

  it('finds events during a period', () => {
    const collection = createBasicCollection([morning, evening, tomorrow])
    expect(collection.find(makePeriod('day', dt('2024-03-15T00:00:00')))).toEqual([morning, evening])
  })

  it('finds events containing an instant', () => {
    const collection = createBasicCollection([morning, evening, tomorrow])
    expect(collection.find('2024-03-15T18:30:00')).toEqual([evening])
  })

  it('finds nothing for a key that is not an instant', () => {
    expect(createBasicCollection([morning]).find('2024-03-15')).toEqual([])
  })

  it('answers has() by lookup', () => {
    const collection = createBasicCollection([morning])
    expect(collection.has(makePeriod('hour', dt('2024-03-15T09:00:00')))).toBe(true)
    expect(collection.has(makePeriod('hour', dt('2024-03-15T10:00:00')))).toBe(false)
  })

  it('adds and counts', () => {
    const collection = createBasicCollection([morning])
    collection.add(tomorrow)
    expect(collection.count()).toBe(2)
    expect(collection.all()).toEqual([morning, tomorrow])
  })

  it('removes every event with the uid', () => {
    const duplicate = createEvent('a', dt('2024-03-20T09:00:00'), dt('2024-03-20T10:00:00'))
    const collection = createBasicCollection([morning, evening, duplicate])
    expect(collection.remove(morning)).toBe(true)
    expect(collection.all()).toEqual([evening])
  })

  it('reports a remove of an unknown uid', () => {
    const collection = createBasicCollection([morning])
    expect(collection.remove(evening)).toBe(false)
    expect(collection.count()).toBe(1)
  })

  it('returns copies from all()', () => {
    const collection = createBasicCollection([morning])
    collection.all().push(evening)
    expect(collection.count()).toBe(1)
  })
})
