/**
 * Indexed Event Collection
 *
 * Stores events in buckets keyed by an index function applied to each
 * event's begin. The default index is the calendar date (YYYY-MM-DD), so a
 * day period finds the events that begin on that day in O(1).
 *
 * Invariants:
 * - every stored event sits in bucket `indexFunction(event.begin)`
 * - count() equals the total size of all buckets
 * - insertion order is kept inside a bucket
 */

import { type LocalDateTime, dateOf, isLocalDateTime } from './time-date'
import type { EventRecord } from './event'
import type { CollectionKey, EventCollection } from './collection'

// ============================================================================
// Types
// ============================================================================

/** Pure, total mapping from an instant to a bucket key. */
export type IndexFunction = (instant: LocalDateTime) => string

export type IndexedCollection<E extends EventRecord = EventRecord> = EventCollection<E> & {
  /** Bucket keys in bucket order. */
  keys(): string[]
  readonly indexFunction: IndexFunction
}

export const dateIndex: IndexFunction = (instant) => dateOf(instant)

/** Buckets events by calendar month: "YYYY-MM". */
export const monthIndex: IndexFunction = (instant) => instant.substring(0, 7)

// ============================================================================
// Collection
// ============================================================================

/**
 * Keys passed to find/has resolve as follows: a period is reduced to its
 * begin and indexed; a string that is a well-formed LocalDateTime is indexed;
 * any other string is used as a bucket key as-is.
 */
export function createIndexedCollection<E extends EventRecord>(
  events: Iterable<E> = [],
  indexFunction: IndexFunction = dateIndex,
): IndexedCollection<E> {
  const buckets = new Map<string, E[]>()
  let total = 0

  function resolveKey(key: CollectionKey): string {
    if (typeof key !== 'string') return indexFunction(key.begin)
    if (isLocalDateTime(key)) return indexFunction(key)
    return key
  }

  function find(key: CollectionKey): E[] {
    const bucket = buckets.get(resolveKey(key))
    return bucket ? [...bucket] : []
  }

  function add(event: E): void {
    const index = indexFunction(event.begin)
    const bucket = buckets.get(index)
    if (bucket) {
      bucket.push(event)
    } else {
      buckets.set(index, [event])
    }
    total++
  }

  const collection: IndexedCollection<E> = {
    indexFunction,

    add,

    // Only the event's own bucket is scanned. Only the first uid match goes;
    // duplicates sharing a uid in the same bucket stay.
    remove(event) {
      const index = indexFunction(event.begin)
      const bucket = buckets.get(index)
      if (!bucket) return false

      const position = bucket.findIndex((e) => e.uid === event.uid)
      if (position === -1) return false

      bucket.splice(position, 1)
      if (bucket.length === 0) buckets.delete(index)
      total--
      return true
    },

    has(key) {
      return find(key).length > 0
    },

    find,

    all() {
      const results: E[] = []
      for (const bucket of buckets.values()) results.push(...bucket)
      return results
    },

    count() {
      return total
    },

    keys() {
      return [...buckets.keys()]
    },
  }

  for (const event of events) add(event)

  return collection
}
