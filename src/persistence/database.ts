/**
 * DatabaseWrapper — thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by the stores
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

/**
 * Thin wrapper that opens a SQLite database, applies required PRAGMAs,
 * and exposes the raw BetterSqlite3 instance.
 */
export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string
  private readonly _logger: Logger

  constructor(databasePath: string, logger?: Logger) {
    this._path = databasePath
    this._logger = logger ?? createLogger('persistence:database')
  }

  /**
   * Open the database at the configured path and apply all required PRAGMAs.
   * Idempotent — calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    if (this._path !== ':memory:') {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    this._logger.info({ path: this._path }, 'Opening SQLite database')
    this._db = new BetterSqlite3(this._path)

    const walResult = this._db.pragma('journal_mode = WAL') as { journal_mode: string }[]
    if (walResult[0]?.journal_mode !== 'wal') {
      this._logger.debug(
        { result: walResult[0]?.journal_mode },
        'WAL pragma did not return "wal" — journal_mode may be "memory" or unsupported',
      )
    }
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')
  }

  /**
   * Close the database. Idempotent — calling close() when already closed is a no-op.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    this._logger.info({ path: this._path }, 'SQLite database closed')
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

// ---------------------------------------------------------------------------
// DatabaseService interface
// ---------------------------------------------------------------------------

/**
 * DatabaseService lifecycle wrapper exposing the raw BetterSqlite3 instance
 * to the SQLite-backed stores.
 */
export interface DatabaseService extends BaseService {
  /** Whether the database connection is open and ready */
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance — use for prepared statements */
  readonly db: BetterSqlite3Database
}

// ---------------------------------------------------------------------------
// DatabaseServiceImpl
// ---------------------------------------------------------------------------

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper
  private readonly _logger: Logger

  constructor(databasePath: string, logger?: Logger) {
    this._logger = logger ?? createLogger('persistence:database')
    this._wrapper = new DatabaseWrapper(databasePath, this._logger)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  /**
   * Open the database and apply pending migrations. Idempotent, so the engine
   * factory may open it eagerly before the registry initializes services.
   */
  async initialize(): Promise<void> {
    if (this._wrapper.isOpen) return
    this._wrapper.open()
    runMigrations(this._wrapper.db, this._logger)
    this._logger.info('DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
    this._logger.info('DatabaseService shut down')
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDatabaseService(databasePath: string, logger?: Logger): DatabaseService {
  return new DatabaseServiceImpl(databasePath, logger)
}

/**
 * Open a migrated in-memory database. Used by tests and dry runs.
 */
export function openInMemoryDatabase(logger?: Logger): BetterSqlite3Database {
  const wrapper = new DatabaseWrapper(':memory:', logger)
  wrapper.open()
  runMigrations(wrapper.db, logger)
  return wrapper.db
}
