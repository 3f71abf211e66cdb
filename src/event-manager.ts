/**
 * Event Manager
 *
 * Fans a period query out to every registered provider and gathers the
 * events that fall during the period into a collection.
 *
 * Providers may be registered under an alias. A provider without one is
 * referenced by its registration position (0-based); positions stay valid
 * for aliased providers too.
 */

import type { Period } from './period'
import { type EventRecord, eventIsDuring } from './event'
import type { EventProvider, ProviderOptions } from './event-provider'
import type { CollectionFactory, EventCollection } from './collection'
import { createIndexedCollection } from './indexed-collection'

export { NotFoundError, ValidationError } from './errors'
import { NotFoundError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Alias, or registration position for providers registered without one. */
export type ProviderKey = string | number

export type EventManagerConfig<E extends EventRecord> = {
  /** Registered in order; record keys become aliases. */
  providers?: ReadonlyArray<EventProvider<E>> | Readonly<Record<string, EventProvider<E>>>
  /** Builds the collection find() returns. Defaults to a date-indexed collection. */
  collectionFactory?: CollectionFactory
}

export type FindOptions = {
  /** Restricts the query to these providers. Defaults to all of them. */
  readonly providers?: ProviderKey | ReadonlyArray<ProviderKey>
  /** Anything else is forwarded to each provider. */
  readonly [option: string]: unknown
}

export type EventManagerEvents<E extends EventRecord> = {
  providerAdded: [key: ProviderKey]
  find: [period: Period, events: E[]]
}

type Handler<E extends EventRecord, K extends keyof EventManagerEvents<E>> =
  (...args: EventManagerEvents<E>[K]) => void

export type EventManager<E extends EventRecord = EventRecord> = {
  addProvider(provider: EventProvider<E>, alias?: string): ProviderKey
  getProvider(key: ProviderKey): EventProvider<E>
  hasProvider(key: ProviderKey): boolean
  providerKeys(): ProviderKey[]
  find(period: Period, options?: FindOptions): EventCollection<E>
  on<K extends keyof EventManagerEvents<E>>(event: K, handler: Handler<E, K>): void
}

type Registration<E extends EventRecord> = {
  alias: string | null
  provider: EventProvider<E>
}

// ============================================================================
// Manager
// ============================================================================

function defaultCollectionFactory<E extends EventRecord>(events: Iterable<E>): EventCollection<E> {
  return createIndexedCollection(events)
}

function isProviderList<E extends EventRecord>(
  providers: EventManagerConfig<E>['providers'],
): providers is ReadonlyArray<EventProvider<E>> {
  return Array.isArray(providers)
}

export function createEventManager<E extends EventRecord = EventRecord>(
  config: EventManagerConfig<E> = {},
): EventManager<E> {
  const registrations: Registration<E>[] = []
  const collectionFactory = config.collectionFactory ?? defaultCollectionFactory

  const handlers: { [K in keyof EventManagerEvents<E>]: Handler<E, K>[] } = {
    providerAdded: [],
    find: [],
  }

  function emit<K extends keyof EventManagerEvents<E>>(event: K, ...args: EventManagerEvents<E>[K]): void {
    for (const handler of handlers[event]) {
      try { handler(...args) } catch (e) { console.error(`Event handler error on '${event}':`, e) }
    }
  }

  function keyOf(registration: Registration<E>, position: number): ProviderKey {
    return registration.alias ?? position
  }

  function positionOf(key: ProviderKey): number {
    if (typeof key === 'number') {
      return Number.isInteger(key) && key >= 0 && key < registrations.length ? key : -1
    }
    return registrations.findIndex((r) => r.alias === key)
  }

  function getProvider(key: ProviderKey): EventProvider<E> {
    const registration = registrations[positionOf(key)]
    if (!registration) throw new NotFoundError(`No event provider registered as '${String(key)}'`)
    return registration.provider
  }

  function addProvider(provider: EventProvider<E>, alias?: string): ProviderKey {
    if (alias !== undefined) {
      if (alias.trim() === '') throw new ValidationError('Provider alias must not be empty')
      if (positionOf(alias) !== -1) throw new ValidationError(`Provider alias '${alias}' is already registered`)
    }
    const registration: Registration<E> = { alias: alias ?? null, provider }
    registrations.push(registration)
    const key = keyOf(registration, registrations.length - 1)
    emit('providerAdded', key)
    return key
  }

  function selectProviders(selection: FindOptions['providers']): EventProvider<E>[] {
    if (selection === undefined) return registrations.map((r) => r.provider)
    const keys: ReadonlyArray<ProviderKey> = typeof selection === 'string' || typeof selection === 'number' ? [selection] : selection
    return keys.map(getProvider)
  }

  const manager: EventManager<E> = {
    addProvider,
    getProvider,

    hasProvider(key) {
      return positionOf(key) !== -1
    },

    providerKeys() {
      return registrations.map(keyOf)
    },

    find(period, options = {}) {
      const { providers, ...rest } = options
      const providerOptions: ProviderOptions = rest
      const events = selectProviders(providers)
        .flatMap((p) => p.getEvents(period.begin, period.end, providerOptions))
        .filter((e) => eventIsDuring(e, period))
      emit('find', period, [...events])
      return collectionFactory(events)
    },

    on<K extends keyof EventManagerEvents<E>>(event: K, handler: Handler<E, K>) {
      handlers[event].push(handler)
    },
  }

  const initial = config.providers
  if (isProviderList(initial)) {
    for (const provider of initial) addProvider(provider)
  } else if (initial) {
    for (const [alias, provider] of Object.entries(initial)) addProvider(provider, alias)
  }

  return manager
}
