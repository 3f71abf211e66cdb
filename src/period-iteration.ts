/**
 * Period Iteration
 *
 * Lazy traversal of a period's immediate children (year → month → day →
 * hour → minute → second, week → day). Traversal state lives in a cursor
 * created per traversal, never on the period, so two walks over equal
 * periods cannot disturb each other.
 *
 * Keys yielded alongside each child:
 * - year → month: month number, 1-12
 * - month → day: day of month, 1-31
 * - week → day: position from the week's first day, 0-6
 * - day → hour: hour of day, 0-23
 * - hour → minute: minute, 0-59
 * - minute → second: second, 0-59
 *
 * A second has no finer granularity: its cursor is exhausted on the first
 * advance and its sequence is empty.
 */

import {
  dateOf, timeOf, daysBetween, monthOf, dayOf,
  hourOf, minuteOf, secondOf,
} from './time-date'
import { type Granularity, type Period, contains, getNext } from './period'
import type { PeriodFactory } from './period-factory'

// ============================================================================
// Types
// ============================================================================

export type CursorState = 'not-started' | 'positioned' | 'exhausted'

export type PeriodCursor = {
  readonly parent: Period
  readonly state: CursorState
  /** Child the cursor is positioned on, or null before the first advance and after exhaustion. */
  readonly current: Period | null
  readonly key: number | null
  readonly valid: boolean
  /** Moves to the next child; returns whether the cursor is still positioned. */
  advance(): boolean
  /** Resets the traversal and positions the cursor on the first child. */
  restart(): boolean
}

// ============================================================================
// Granularity Chain
// ============================================================================

const CHILD_GRANULARITY: Record<Granularity, Granularity | null> = {
  year: 'month',
  month: 'day',
  week: 'day',
  day: 'hour',
  hour: 'minute',
  minute: 'second',
  second: null,
}

export function childGranularity(granularity: Granularity): Granularity | null {
  return CHILD_GRANULARITY[granularity]
}

/** Key of `child` within `parent`, per the table in the module header. */
export function childKey(parent: Period, child: Period): number {
  const time = timeOf(child.begin)
  switch (parent.granularity) {
    case 'year':
      return monthOf(child.begin)
    case 'month':
      return dayOf(child.begin)
    case 'week':
      return daysBetween(dateOf(parent.begin), dateOf(child.begin))
    case 'day':
      return hourOf(time)
    case 'hour':
      return minuteOf(time)
    case 'minute':
    case 'second':
      return secondOf(time)
  }
}

// ============================================================================
// Cursor
// ============================================================================

export function createPeriodCursor(parent: Period, factory: PeriodFactory): PeriodCursor {
  let state: CursorState = 'not-started'
  let current: Period | null = null

  function exhaust(): boolean {
    state = 'exhausted'
    current = null
    return false
  }

  function advance(): boolean {
    switch (state) {
      case 'exhausted':
        return false
      case 'not-started': {
        const granularity = childGranularity(parent.granularity)
        if (granularity === null) return exhaust()
        current = factory.createPeriod(granularity, parent.begin)
        state = 'positioned'
        return true
      }
      case 'positioned': {
        if (current === null) return exhaust()
        const successor = getNext(current)
        if (!contains(parent, successor.begin)) return exhaust()
        current = successor
        return true
      }
    }
  }

  return {
    parent,
    get state() {
      return state
    },
    get current() {
      return current
    },
    get key() {
      return current === null ? null : childKey(parent, current)
    },
    get valid() {
      return current !== null
    },
    advance,
    restart() {
      state = 'not-started'
      current = null
      return advance()
    },
  }
}

// ============================================================================
// Sequences
// ============================================================================

/** Lazily yields `[key, child]` pairs; every call starts a fresh traversal. */
export function* childrenOf(period: Period, factory: PeriodFactory): Generator<[number, Period], void, undefined> {
  const cursor = createPeriodCursor(period, factory)
  cursor.restart()
  let child = cursor.current
  while (child !== null) {
    yield [childKey(period, child), child]
    cursor.advance()
    child = cursor.current
  }
}

/** Weeks overlapping a month, from the week holding its first day. */
export function weeksOf(month: Period<'month'>, factory: PeriodFactory): Period<'week'>[] {
  const weeks: Period<'week'>[] = []
  for (let week = factory.createWeek(month.begin); week.begin < month.end; week = getNext(week)) {
    weeks.push(week)
  }
  return weeks
}
