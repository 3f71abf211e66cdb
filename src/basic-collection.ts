/**
 * Basic Event Collection
 *
 * Flat, unindexed storage. Lookups scan every event, so it suits the small
 * result sets the event manager produces for a single period.
 */

import { isLocalDateTime } from './time-date'
import { type EventRecord, eventContains, eventIsDuring } from './event'
import type { CollectionKey, EventCollection } from './collection'

export function createBasicCollection<E extends EventRecord>(events: Iterable<E> = []): EventCollection<E> {
  let stored: E[] = [...events]

  function find(key: CollectionKey): E[] {
    if (typeof key !== 'string') return stored.filter((e) => eventIsDuring(e, key))
    if (isLocalDateTime(key)) return stored.filter((e) => eventContains(e, key))
    return []
  }

  return {
    add(event) {
      stored.push(event)
    },

    remove(event) {
      const before = stored.length
      stored = stored.filter((e) => e.uid !== event.uid)
      return stored.length !== before
    },

    has(key) {
      return find(key).length > 0
    },

    find,

    all() {
      return [...stored]
    },

    count() {
      return stored.length
    },
  }
}
