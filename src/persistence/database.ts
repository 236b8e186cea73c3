/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open the state database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Component } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

const IN_MEMORY = ':memory:'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

/**
 * Opens a SQLite database, applies required PRAGMAs, and exposes the raw
 * BetterSqlite3 instance.
 */
export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  get path(): string {
    return this._path
  }

  /**
   * Open the database (creating its directory) and apply all PRAGMAs.
   * Idempotent: calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    if (this._path !== IN_MEMORY) {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    this._db = new BetterSqlite3(this._path)

    const journalMode: unknown = this._db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal' && this._path !== IN_MEMORY) {
      logger.warn({ result: journalMode }, 'WAL pragma did not return "wal"')
    }
    // CLI commands and the running supervisor share the file
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')
  }

  /**
   * Close the database. Idempotent: calling close() when already closed is a no-op.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * Return the raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  /** Whether the database is currently open */
  get isOpen(): boolean {
    return this._db !== null
  }
}

/**
 * Open a database and bring its schema up to date. Used by short-lived CLI
 * commands; the caller closes the returned wrapper.
 */
export function openStateDatabase(databasePath: string): DatabaseWrapper {
  const wrapper = new DatabaseWrapper(databasePath)
  wrapper.open()
  try {
    runMigrations(wrapper.db)
  } catch (err) {
    wrapper.close()
    throw err
  }
  return wrapper
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

/**
 * Database lifecycle component exposing the raw BetterSqlite3 instance to
 * query modules.
 */
export interface DatabaseService extends Component {
  /** Whether the database connection is open and ready */
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance: use for prepared statements */
  readonly db: BetterSqlite3Database
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  async initialize(): Promise<void> {
    this._wrapper.open()
    runMigrations(this._wrapper.db)
    logger.debug({ path: this._wrapper.path }, 'DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    if (this._wrapper.isOpen && this._wrapper.path !== IN_MEMORY) {
      this._wrapper.db.pragma('wal_checkpoint(TRUNCATE)')
    }
    this._wrapper.close()
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
