/**
 * Segment 04: Period Iteration Tests
 *
 * Cursor states, child keys, fresh traversals and month week spans.
 */

import { describe, it, expect } from 'vitest'
import {
  createPeriodCursor,
  childrenOf,
  childGranularity,
  weeksOf,
} from '../src/period-iteration'
import { createPeriodFactory } from '../src/period-factory'
import { makePeriod, getBegin } from '../src/period'
import { parseDateTime } from '../src/time-date'

const dt = parseDateTime
const factory = createPeriodFactory()

// ============================================================================
// 1. CURSOR PROTOCOL
// ============================================================================

describe('Period cursor', () => {
  const day = makePeriod('day', dt('2024-03-15T00:00:00'))

  it('starts unpositioned', () => {
    const cursor = createPeriodCursor(day, factory)
    expect(cursor.state).toBe('not-started')
    expect(cursor.current).toBeNull()
    expect(cursor.key).toBeNull()
    expect(cursor.valid).toBe(false)
  })

  it('positions on the first child after restart', () => {
    const cursor = createPeriodCursor(day, factory)
    expect(cursor.restart()).toBe(true)
    expect(cursor.state).toBe('positioned')
    expect(cursor.current?.begin).toBe('2024-03-15T00:00:00')
    expect(cursor.key).toBe(0)
  })

  it('positions on the first child after the first advance', () => {
    const cursor = createPeriodCursor(day, factory)
    expect(cursor.advance()).toBe(true)
    expect(cursor.key).toBe(0)
  })

  it('walks 24 hours then exhausts', () => {
    const cursor = createPeriodCursor(day, factory)
    let steps = 0
    while (cursor.advance()) steps++
    expect(steps).toBe(24)
    expect(cursor.state).toBe('exhausted')
    expect(cursor.valid).toBe(false)
    expect(cursor.current).toBeNull()
  })

  it('stays exhausted on further advances', () => {
    const cursor = createPeriodCursor(day, factory)
    while (cursor.advance()) { /* drain */ }
    expect(cursor.advance()).toBe(false)
    expect(cursor.state).toBe('exhausted')
  })

  it('restarts after exhaustion', () => {
    const cursor = createPeriodCursor(day, factory)
    while (cursor.advance()) { /* drain */ }
    expect(cursor.restart()).toBe(true)
    expect(cursor.key).toBe(0)
  })

  it('keeps independent cursors over the same period apart', () => {
    const a = createPeriodCursor(day, factory)
    const b = createPeriodCursor(day, factory)
    a.advance()
    a.advance()
    a.advance()
    b.advance()
    expect(a.key).toBe(2)
    expect(b.key).toBe(0)
  })

  it('is exhausted at once for a second', () => {
    const cursor = createPeriodCursor(makePeriod('second', dt('2024-03-15T10:30:05')), factory)
    expect(cursor.advance()).toBe(false)
    expect(cursor.state).toBe('exhausted')
  })
})

// ============================================================================
// 2. CHILD SEQUENCES
// ============================================================================

describe('childrenOf', () => {
  it('yields 29 days for a leap February keyed by day of month', () => {
    const february = makePeriod('month', dt('2024-02-01T00:00:00'))
    const children = [...childrenOf(february, factory)]
    expect(children).toHaveLength(29)
    expect(children[0]?.[0]).toBe(1)
    expect(children[28]?.[0]).toBe(29)
    expect(children[28]?.[1].begin).toBe('2024-02-29T00:00:00')
  })

  it('yields 28 days for February 2023', () => {
    const february = makePeriod('month', dt('2023-02-01T00:00:00'))
    expect([...childrenOf(february, factory)]).toHaveLength(28)
  })

  it('yields 24 hours for a day keyed 0-23', () => {
    const keys = [...childrenOf(makePeriod('day', dt('2024-03-15T00:00:00')), factory)].map(([key]) => key)
    expect(keys).toEqual(Array.from({ length: 24 }, (_, hour) => hour))
  })

  it('yields 12 months for a year keyed 1-12', () => {
    const keys = [...childrenOf(makePeriod('year', dt('2024-01-01T00:00:00')), factory)].map(([key]) => key)
    expect(keys).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12])
  })

  it('keys week days by position from the first day', () => {
    const week = makePeriod('week', dt('2024-03-11T00:00:00'))
    const children = [...childrenOf(week, factory)]
    expect(children.map(([key]) => key)).toEqual([0, 1, 2, 3, 4, 5, 6])
    expect(children[6]?.[1].begin).toBe('2024-03-17T00:00:00')
  })

  it('keys a Sunday week the same way', () => {
    const sundays = createPeriodFactory({ firstWeekday: 'sun' })
    const week = makePeriod('week', dt('2024-03-10T00:00:00'), 'sun')
    const children = [...childrenOf(week, sundays)]
    expect(children[0]).toEqual([0, { granularity: 'day', begin: '2024-03-10T00:00:00', end: '2024-03-11T00:00:00' }])
  })

  it('yields 60 minutes for an hour', () => {
    const keys = [...childrenOf(makePeriod('hour', dt('2024-03-15T10:00:00')), factory)].map(([key]) => key)
    expect(keys).toHaveLength(60)
    expect(keys[59]).toBe(59)
  })

  it('yields 60 seconds for a minute', () => {
    expect([...childrenOf(makePeriod('minute', dt('2024-03-15T10:30:00')), factory)]).toHaveLength(60)
  })

  it('yields nothing for a second', () => {
    expect([...childrenOf(makePeriod('second', dt('2024-03-15T10:30:00')), factory)]).toEqual([])
  })

  it('starts over on every call', () => {
    const day = makePeriod('day', dt('2024-03-15T00:00:00'))
    const first = [...childrenOf(day, factory)]
    const second = [...childrenOf(day, factory)]
    expect(second).toEqual(first)
  })

  it('is lazy', () => {
    const year = makePeriod('year', dt('2024-01-01T00:00:00'))
    const iterator = childrenOf(year, factory)
    const first = iterator.next()
    expect(first.done).toBe(false)
    expect(first.value).toEqual([1, { granularity: 'month', begin: '2024-01-01T00:00:00', end: '2024-02-01T00:00:00' }])
  })
})

describe('childGranularity', () => {
  it('follows the granularity chain', () => {
    expect(childGranularity('year')).toBe('month')
    expect(childGranularity('month')).toBe('day')
    expect(childGranularity('week')).toBe('day')
    expect(childGranularity('second')).toBeNull()
  })
})

// ============================================================================
// 3. WEEKS OF A MONTH
// ============================================================================

describe('weeksOf', () => {
  it('spans March 2024 in five Monday weeks from Feb 26', () => {
    const weeks = weeksOf(factory.createMonth(dt('2024-03-01T00:00:00')), factory)
    expect(weeks.map(getBegin)).toEqual([
      '2024-02-26T00:00:00',
      '2024-03-04T00:00:00',
      '2024-03-11T00:00:00',
      '2024-03-18T00:00:00',
      '2024-03-25T00:00:00',
    ])
  })

  it('spans February 2021 in exactly four weeks', () => {
    const weeks = weeksOf(factory.createMonth(dt('2021-02-01T00:00:00')), factory)
    expect(weeks).toHaveLength(4)
    expect(weeks[3]?.end).toBe('2021-03-01T00:00:00')
  })
})
