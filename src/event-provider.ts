/**
 * Event Providers
 *
 * A provider supplies the events overlapping a time range. Providers are
 * registered with the event manager; these are the in-memory building blocks.
 */

import type { LocalDateTime } from './time-date'
import { type EventRecord, eventOverlaps } from './event'

export { ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Free-form options forwarded from the manager's find() to each provider. */
export type ProviderOptions = Readonly<Record<string, unknown>>

export type EventProvider<E extends EventRecord = EventRecord> = {
  /** Events overlapping [begin, end). */
  getEvents(begin: LocalDateTime, end: LocalDateTime, options?: ProviderOptions): E[]
}

export type CachedProviderOptions = {
  /** Ranges kept before the least recently used one is evicted. Defaults to 100. */
  maxEntries?: number
}

export type CachedProvider<E extends EventRecord> = EventProvider<E> & {
  clear(): void
  size(): number
}

// ============================================================================
// Array Provider
// ============================================================================

export function createArrayProvider<E extends EventRecord>(events: Iterable<E>): EventProvider<E> {
  const stored = [...events]
  return {
    getEvents(begin, end) {
      return stored.filter((e) => eventOverlaps(e, begin, end))
    },
  }
}

// ============================================================================
// Aggregate Provider
// ============================================================================

export function createAggregateProvider<E extends EventRecord>(
  providers: ReadonlyArray<EventProvider<E>>,
): EventProvider<E> {
  const members = [...providers]
  return {
    getEvents(begin, end, options) {
      return members.flatMap((p) => p.getEvents(begin, end, options))
    },
  }
}

// ============================================================================
// Cached Provider
// ============================================================================

function cacheKey(begin: LocalDateTime, end: LocalDateTime, options?: ProviderOptions): string {
  return `${begin}|${end}|${JSON.stringify(options ?? {})}`
}

/** Memoizes a provider per (begin, end, options) with LRU eviction. */
export function createCachedProvider<E extends EventRecord>(
  provider: EventProvider<E>,
  options: CachedProviderOptions = {},
): CachedProvider<E> {
  const maxEntries = options.maxEntries ?? 100
  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new ValidationError(`maxEntries must be a positive integer, got ${maxEntries}`)
  }

  // Map iteration order doubles as recency order
  const cache = new Map<string, E[]>()

  return {
    getEvents(begin, end, providerOptions) {
      const key = cacheKey(begin, end, providerOptions)
      const hit = cache.get(key)
      if (hit) {
        cache.delete(key)
        cache.set(key, hit)
        return [...hit]
      }

      const events = provider.getEvents(begin, end, providerOptions)
      cache.set(key, events)
      if (cache.size > maxEntries) {
        const oldest = cache.keys().next()
        if (!oldest.done) cache.delete(oldest.value)
      }
      return [...events]
    },

    clear() {
      cache.clear()
    },

    size() {
      return cache.size
    },
  }
}
