/**
 * Event Collection Contract
 *
 * Shared by the indexed and basic collections, and by the event manager,
 * which hands results back in whichever collection its caller configured.
 */

import type { EventRecord } from './event'
import type { Period } from './period'

/**
 * What a collection can be searched by: a period, an instant, or (for the
 * indexed collection) a raw index key.
 */
export type CollectionKey = Period | string

export type EventCollection<E extends EventRecord = EventRecord> = {
  add(event: E): void
  /** Removes a stored event with the same uid. Returns whether anything was removed. */
  remove(event: EventRecord): boolean
  has(key: CollectionKey): boolean
  find(key: CollectionKey): E[]
  all(): E[]
  count(): number
}

export type CollectionFactory = <E extends EventRecord>(events: Iterable<E>) => EventCollection<E>
