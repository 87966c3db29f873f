/**
 * SqliteVersionStore — VersionStore backed by better-sqlite3.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConflictError, NotFoundError, ValidationError } from '../../core/errors.js'
import type { FileId, Version } from '../../core/types.js'
import {
  getVersionRow,
  insertVersion,
  insertVersionSupersession,
  listPassNumbers,
  listVersionSupersessionRows,
  updateVersionContent,
} from '../../persistence/queries/versions.js'
import type { VersionRow } from '../../persistence/queries/versions.js'
import { createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { Clock } from '../collaborators/types.js'
import type { ReplaceVersionOptions, VersionStore, VersionSupersession } from './version-store.js'

export interface SqliteVersionStoreOptions {
  db: BetterSqlite3Database
  clock: Clock
  logger?: Logger
}

function rowToVersion(row: VersionRow): Version {
  return {
    fileId: row.file_id,
    passNumber: row.pass_number,
    content: row.content,
    createdAt: row.created_at,
  }
}

function assertPassNumber(passNumber: number): void {
  if (!Number.isInteger(passNumber) || passNumber < 0) {
    throw new ValidationError(`Pass number must be a non-negative integer, got ${String(passNumber)}`, {
      passNumber,
    })
  }
}

export class SqliteVersionStore implements VersionStore {
  private readonly _db: BetterSqlite3Database
  private readonly _clock: Clock
  private readonly _logger: Logger

  constructor(options: SqliteVersionStoreOptions) {
    this._db = options.db
    this._clock = options.clock
    this._logger = options.logger ?? createLogger('version-store')
  }

  putVersion(fileId: FileId, passNumber: number, content: string): Version {
    assertPassNumber(passNumber)
    return this._db
      .transaction((): Version => {
        if (getVersionRow(this._db, fileId, passNumber) !== undefined) {
          throw new ConflictError(`Version already exists: ${fileId}@${String(passNumber)}`, { fileId, passNumber })
        }
        const row: VersionRow = {
          file_id: fileId,
          pass_number: passNumber,
          content,
          created_at: this._clock.now().toISOString(),
        }
        insertVersion(this._db, row)
        return rowToVersion(row)
      })
      .immediate()
  }

  getVersion(fileId: FileId, passNumber: number): string {
    return this.getVersionRecord(fileId, passNumber).content
  }

  getVersionRecord(fileId: FileId, passNumber: number): Version {
    assertPassNumber(passNumber)
    const row = getVersionRow(this._db, fileId, passNumber)
    if (row === undefined) {
      throw new NotFoundError('Version', `${fileId}@${String(passNumber)}`, { fileId, passNumber })
    }
    return rowToVersion(row)
  }

  hasVersion(fileId: FileId, passNumber: number): boolean {
    return getVersionRow(this._db, fileId, passNumber) !== undefined
  }

  listPasses(fileId: FileId): number[] {
    return listPassNumbers(this._db, fileId)
  }

  replaceVersion(fileId: FileId, passNumber: number, content: string, options: ReplaceVersionOptions): Version {
    assertPassNumber(passNumber)
    return this._db
      .transaction((): Version => {
        const previous = getVersionRow(this._db, fileId, passNumber)
        if (previous === undefined) {
          throw new NotFoundError('Version', `${fileId}@${String(passNumber)}`, { fileId, passNumber })
        }
        const replacedAt = this._clock.now().toISOString()
        insertVersionSupersession(this._db, {
          file_id: fileId,
          pass_number: passNumber,
          previous_content: previous.content,
          previous_created_at: previous.created_at,
          replaced_at: replacedAt,
          reason: options.reason,
          job_id: options.jobId ?? null,
        })
        const row: VersionRow = { file_id: fileId, pass_number: passNumber, content, created_at: replacedAt }
        updateVersionContent(this._db, row)
        this._logger.info({ fileId, passNumber, reason: options.reason, jobId: options.jobId }, 'Version superseded')
        return rowToVersion(row)
      })
      .immediate()
  }

  listSupersessions(fileId: FileId): VersionSupersession[] {
    return listVersionSupersessionRows(this._db, fileId).map((row) => ({
      fileId: row.file_id,
      passNumber: row.pass_number,
      previousContent: row.previous_content,
      previousCreatedAt: row.previous_created_at,
      replacedAt: row.replaced_at,
      reason: row.reason,
      jobId: row.job_id,
    }))
  }
}

export function createSqliteVersionStore(options: SqliteVersionStoreOptions): VersionStore {
  return new SqliteVersionStore(options)
}
