/**
 * SQLite Event Provider
 *
 * Read-only provider over an events table that a collaborator owns, using
 * better-sqlite3. Instants are stored as LocalDateTime text; `HH:MM` times
 * are accepted and read back with seconds.
 */
import Database from 'better-sqlite3'
import { type LocalDateTime, parseDateTime } from './time-date'
import { type EventRecord, eventOverlaps } from './event'
import type { EventProvider } from './event-provider'

export { ParseError, ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type SqliteEventColumns = {
  uid: string
  begin: string
  end: string
}

export type SqliteEventProviderOptions = {
  /** Defaults to "event". */
  table?: string
  /** Defaults to uid / begin_at / end_at. */
  columns?: Partial<SqliteEventColumns>
}

export type SqliteEventProvider = EventProvider<EventRecord> & {
  readonly table: string
  close(): void
}

type EventRow = {
  uid: string | number
  begin_at: string
  end_at: string
}

const DEFAULT_COLUMNS: SqliteEventColumns = {
  uid: 'uid',
  begin: 'begin_at',
  end: 'end_at',
}

// ============================================================================
// Helpers
// ============================================================================

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/

function identifier(name: string, role: string): string {
  if (!IDENTIFIER_RE.test(name)) throw new ValidationError(`Invalid ${role} name: '${name}'`)
  return `"${name}"`
}

function isEventRow(row: unknown): row is EventRow {
  if (typeof row !== 'object' || row === null) return false
  return (
    'uid' in row && (typeof row.uid === 'string' || typeof row.uid === 'number') &&
    'begin_at' in row && typeof row.begin_at === 'string' &&
    'end_at' in row && typeof row.end_at === 'string'
  )
}

function mapError(e: unknown, table: string): never {
  const msg = e instanceof Error ? e.message : String(e)
  throw new ValidationError(`Cannot read events from table '${table}': ${msg}`)
}

// ============================================================================
// Provider
// ============================================================================

/**
 * `source` is an open database or a path to one; a path is opened read-only
 * and closed by `close()`. A database passed in stays owned by the caller.
 */
export function createSqliteEventProvider(
  source: Database.Database | string,
  options: SqliteEventProviderOptions = {},
): SqliteEventProvider {
  const table = options.table ?? 'event'
  const columns = { ...DEFAULT_COLUMNS, ...options.columns }

  const from = identifier(table, 'table')
  const uid = identifier(columns.uid, 'column')
  const begin = identifier(columns.begin, 'column')
  const end = identifier(columns.end, 'column')

  const ownsDb = typeof source === 'string'
  const db = typeof source === 'string' ? new Database(source, { readonly: true, fileMustExist: true }) : source

  // Minute prefixes agree between HH:MM and HH:MM:SS text, so this
  // prefilter never drops an overlapping row; eventOverlaps decides exactly
  const sql = `
    SELECT ${uid} AS uid, ${begin} AS begin_at, ${end} AS end_at
    FROM ${from}
    WHERE substr(${begin}, 1, 16) <= substr(@end, 1, 16)
      AND substr(${end}, 1, 16) >= substr(@begin, 1, 16)
    ORDER BY ${begin}, ${uid}
  `

  function prepare(): Database.Statement {
    try {
      return db.prepare(sql)
    } catch (e) {
      if (ownsDb) db.close()
      return mapError(e, table)
    }
  }

  const statement = prepare()

  function toEvent(row: unknown): EventRecord {
    if (!isEventRow(row)) throw new ValidationError(`Malformed row in table '${table}'`)
    return {
      uid: String(row.uid),
      begin: parseDateTime(row.begin_at),
      end: parseDateTime(row.end_at),
    }
  }

  return {
    table,

    getEvents(rangeBegin: LocalDateTime, rangeEnd: LocalDateTime) {
      return statement
        .all({ begin: rangeBegin, end: rangeEnd })
        .map(toEvent)
        .filter((e) => eventOverlaps(e, rangeBegin, rangeEnd))
    },

    close() {
      if (ownsDb) db.close()
    },
  }
}
