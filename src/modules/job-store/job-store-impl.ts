/**
 * SqliteJobStore — JobStore backed by better-sqlite3.
 *
 * Sequence numbers are allocated inside an IMMEDIATE transaction as
 * MAX(sequence) + 1, and the UNIQUE(job_id, sequence) constraint rejects any
 * writer that slipped past it from another process.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConflictError, NotFoundError, ValidationError } from '../../core/errors.js'
import { StructuredMapSchema } from '../../core/structured-value.js'
import type { Job, JobEvent, JobFilter, JobId, StartJobRequest } from '../../core/types.js'
import { getLastJobEventRow, getMaxSequence, insertJobEvent, listJobEventRows } from '../../persistence/queries/job-events.js'
import {
  getPendingJobSignal,
  insertJobSignal,
  markJobSignalsProcessed,
} from '../../persistence/queries/job-signals.js'
import {
  findStaleJobRows,
  getActiveJobRowForFile,
  getJobRow,
  insertJob,
  listJobRows,
  touchJob,
  updateJobStateRow,
} from '../../persistence/queries/jobs.js'
import { createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { Clock, IdGenerator } from '../collaborators/types.js'
import type { AppendEventInput, CreateJobOptions, JobStore, TransitionResult } from './job-store.js'
import { rowToJob, rowToJobEvent } from './mappers.js'
import { JobFilterSchema, StartJobRequestSchema } from './schemas.js'
import { applyTransition } from './state-machine.js'
import type { JobTransition } from './state-machine.js'

export interface SqliteJobStoreOptions {
  db: BetterSqlite3Database
  clock: Clock
  ids: IdGenerator
  logger?: Logger
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

export class SqliteJobStore implements JobStore {
  private readonly _db: BetterSqlite3Database
  private readonly _clock: Clock
  private readonly _ids: IdGenerator
  private readonly _logger: Logger

  constructor(options: SqliteJobStoreOptions) {
    this._db = options.db
    this._clock = options.clock
    this._ids = options.ids
    this._logger = options.logger ?? createLogger('job-store')
  }

  createJob(request: StartJobRequest, options: CreateJobOptions = {}): Job {
    const parsed = StartJobRequestSchema.safeParse(request)
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid job request', {
        issues: parsed.error.issues,
      })
    }
    const input = parsed.data

    const id = this._db
      .transaction((): JobId => {
        if (options.exclusive === true) {
          const active = getActiveJobRowForFile(this._db, input.fileId)
          if (active !== undefined) {
            throw new ConflictError(`File ${input.fileId} already has an active job: ${active.id}`, {
              fileId: input.fileId,
              activeJobId: active.id,
              activeStatus: active.status,
            })
          }
        }

        const now = this._now()
        const jobId = this._ids.next('job')
        insertJob(this._db, {
          id: jobId,
          file_id: input.fileId,
          file_name: input.fileName,
          user_id: input.userId ?? null,
          status: 'pending',
          current_pass: 0,
          total_passes: input.totalPasses,
          model: input.model,
          created_at: now,
          updated_at: now,
          metadata_json: JSON.stringify(input.metadata ?? {}),
        })
        return jobId
      })
      .immediate()

    this._logger.debug({ jobId: id, fileId: input.fileId, totalPasses: input.totalPasses }, 'Job created')
    return this.getJob(id)
  }

  getJob(jobId: JobId): Job {
    const row = getJobRow(this._db, jobId)
    if (row === undefined) {
      throw new NotFoundError('Job', jobId)
    }
    return rowToJob(row)
  }

  listJobs(filter: JobFilter = {}): Job[] {
    const parsed = JobFilterSchema.safeParse(filter)
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid job filter', {
        issues: parsed.error.issues,
      })
    }
    const { status, userId, createdAfter, createdBefore, limit, offset } = parsed.data
    const statuses = status === undefined ? undefined : Array.isArray(status) ? status : [status]
    return listJobRows(this._db, {
      statuses,
      user_id: userId,
      created_after: createdAfter === undefined ? undefined : new Date(createdAfter).toISOString(),
      created_before: createdBefore === undefined ? undefined : new Date(createdBefore).toISOString(),
      limit,
      offset,
    }).map(rowToJob)
  }

  appendEvent(jobId: JobId, input: AppendEventInput): JobEvent {
    return this._db.transaction(() => this._appendEventInTransaction(jobId, input)).immediate()
  }

  updateJobState(jobId: JobId, transition: JobTransition): Job {
    return this._db.transaction(() => this._updateStateInTransaction(jobId, transition)).immediate()
  }

  recordTransition(jobId: JobId, transition: JobTransition, events: AppendEventInput[]): TransitionResult {
    return this._db
      .transaction((): TransitionResult => {
        const job = this._updateStateInTransaction(jobId, transition)
        const appended = events.map((input) => this._appendEventInTransaction(jobId, input))
        return { job, events: appended }
      })
      .immediate()
  }

  listEvents(jobId: JobId, sinceSequence = 0, limit?: number): JobEvent[] {
    this._requireJob(jobId)
    return listJobEventRows(this._db, jobId, sinceSequence, limit).map(rowToJobEvent)
  }

  getLastEvent(jobId: JobId): JobEvent | undefined {
    this._requireJob(jobId)
    const row = getLastJobEventRow(this._db, jobId)
    return row === undefined ? undefined : rowToJobEvent(row)
  }

  requestCancel(jobId: JobId, reason?: string): void {
    this._requireJob(jobId)
    insertJobSignal(this._db, jobId, 'cancel', reason ?? null, this._now())
    this._logger.info({ jobId, reason }, 'Cancel requested')
  }

  hasPendingCancel(jobId: JobId): boolean {
    return getPendingJobSignal(this._db, jobId, 'cancel') !== undefined
  }

  pendingCancelReason(jobId: JobId): string | undefined {
    return getPendingJobSignal(this._db, jobId, 'cancel')?.reason ?? undefined
  }

  markCancelProcessed(jobId: JobId): void {
    markJobSignalsProcessed(this._db, jobId, 'cancel', this._now())
  }

  findStaleJobs(olderThan: Date): Job[] {
    return findStaleJobRows(this._db, olderThan.toISOString()).map(rowToJob)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _now(): string {
    return this._clock.now().toISOString()
  }

  private _requireJob(jobId: JobId): void {
    if (getJobRow(this._db, jobId) === undefined) {
      throw new NotFoundError('Job', jobId)
    }
  }

  private _appendEventInTransaction(jobId: JobId, input: AppendEventInput): JobEvent {
    this._requireJob(jobId)

    const details = StructuredMapSchema.safeParse(input.details ?? {})
    if (!details.success) {
      throw new ValidationError('Event details must be a structured map', {
        jobId,
        issues: details.error.issues,
      })
    }

    const sequence = getMaxSequence(this._db, jobId) + 1
    if (input.expectedSequence !== undefined && input.expectedSequence !== sequence) {
      throw new ConflictError(
        `Expected next sequence ${String(input.expectedSequence)} for job ${jobId}, found ${String(sequence)}`,
        { jobId, expectedSequence: input.expectedSequence, actualSequence: sequence },
      )
    }

    const now = this._now()
    const row = {
      id: this._ids.next('evt'),
      job_id: jobId,
      sequence,
      event_type: input.eventType,
      pass_number: input.passNumber ?? null,
      message: input.message,
      details_json: JSON.stringify(details.data),
      created_at: now,
    }

    try {
      insertJobEvent(this._db, row)
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Sequence ${String(sequence)} already taken for job ${jobId}`, { jobId, sequence })
      }
      throw err
    }
    touchJob(this._db, jobId, now)

    return rowToJobEvent(row)
  }

  private _updateStateInTransaction(jobId: JobId, transition: JobTransition): Job {
    const current = this.getJob(jobId)
    let next: Job
    try {
      next = applyTransition(current, transition, this._now())
    } catch (err) {
      this._logger.error({ jobId, transition: transition.type, status: current.status, err }, 'Invalid job transition')
      throw err
    }

    const updated = updateJobStateRow(
      this._db,
      jobId,
      { status: current.status, current_pass: current.currentPass },
      {
        status: next.status,
        current_pass: next.currentPass,
        completed_at: next.completedAt,
        error_message: next.errorMessage,
        result_json: next.result === null ? null : JSON.stringify(next.result),
        updated_at: next.updatedAt,
      },
    )
    if (!updated) {
      throw new ConflictError(`Job ${jobId} changed while applying "${transition.type}"`, {
        jobId,
        transition: transition.type,
      })
    }

    return next
  }
}

export function createSqliteJobStore(options: SqliteJobStoreOptions): JobStore {
  return new SqliteJobStore(options)
}
