/**
 * CrashRecoveryManager — finds jobs a dead process left behind and gets them moving again.
 *
 * Responsibilities:
 *  - Close a dangling `pass_started` with a `pass_failed` (reason `interrupted`);
 *    the interrupted attempt counts against the pass's attempt budget
 *  - Resume `processing` jobs at their current pass, or fail them once the
 *    pass has no attempts left
 *  - Re-submit `pending` jobs that were queued when the process stopped
 *
 * Two recoverers racing on the same job are serialised by the store: the
 * closing `pass_failed` is appended with an expected sequence, and the loser
 * sees a ConflictError and skips the job.
 */

import type { TypedEventBus } from '../core/event-bus.js'
import { ConflictError, InvalidTransitionError } from '../core/errors.js'
import type { Job, JobEvent, JobId } from '../core/types.js'
import type { JobStore } from '../modules/job-store/job-store.js'
import type { JobOrchestrator } from '../modules/job-orchestrator/job-orchestrator.js'
import { countFailedAttempts } from '../modules/job-orchestrator/attempts.js'
import { childLogger, createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecoveryAction {
  jobId: JobId
  action: 'resumed' | 'requeued' | 'failed' | 'skipped'
  reason: string
}

export interface RecoveryResult {
  /** `processing` jobs handed back to the orchestrator */
  resumed: number
  /** `pending` jobs re-submitted */
  requeued: number
  /** Jobs failed because their pass ran out of attempts */
  failed: number
  /** Jobs another writer got to first */
  skipped: number
  actions: RecoveryAction[]
}

export interface CrashRecoveryManagerOptions {
  jobStore: JobStore
  orchestrator: Pick<JobOrchestrator, 'submit' | 'isActive'>
  eventBus: TypedEventBus
  maxAttemptsPerPass: number
  logger?: Logger
}

// ---------------------------------------------------------------------------
// CrashRecoveryManager
// ---------------------------------------------------------------------------

export class CrashRecoveryManager {
  private readonly _store: JobStore
  private readonly _orchestrator: Pick<JobOrchestrator, 'submit' | 'isActive'>
  private readonly _eventBus: TypedEventBus
  private readonly _maxAttempts: number
  private readonly _logger: Logger

  constructor(options: CrashRecoveryManagerOptions) {
    this._store = options.jobStore
    this._orchestrator = options.orchestrator
    this._eventBus = options.eventBus
    this._maxAttempts = options.maxAttemptsPerPass
    this._logger = options.logger ?? createLogger('crash-recovery')
  }

  /**
   * Startup recovery: every `processing` job not driven here, then every
   * `pending` job, oldest first.
   */
  recover(): RecoveryResult {
    const result = emptyResult()

    const processing = this._store.listJobs({ status: 'processing' }).reverse()
    for (const job of processing) {
      this._recoverProcessing(job, result)
    }

    const pending = this._store.listJobs({ status: 'pending' }).reverse()
    for (const job of pending) {
      this._orchestrator.submit(job.id)
      result.requeued++
      result.actions.push({ jobId: job.id, action: 'requeued', reason: 'pending at startup' })
    }

    this._logger.info(
      { resumed: result.resumed, requeued: result.requeued, failed: result.failed, skipped: result.skipped },
      `Recovery complete: resumed=${String(result.resumed)} requeued=${String(result.requeued)} failed=${String(result.failed)}`,
    )
    return result
  }

  /**
   * Recover `processing` jobs with no write since `olderThan`. Used by the
   * watchdog to pick up jobs whose driver died while this process runs.
   */
  recoverStale(olderThan: Date): RecoveryResult {
    const result = emptyResult()
    for (const job of this._store.findStaleJobs(olderThan)) {
      this._recoverProcessing(job, result)
    }
    if (result.actions.length > 0) {
      this._logger.info({ olderThan: olderThan.toISOString(), actions: result.actions }, 'Recovered stale jobs')
    }
    return result
  }

  private _recoverProcessing(job: Job, result: RecoveryResult): void {
    if (this._orchestrator.isActive(job.id)) {
      result.skipped++
      result.actions.push({ jobId: job.id, action: 'skipped', reason: 'driven by this process' })
      return
    }

    const log = childLogger(this._logger, { jobId: job.id })
    const passNumber = job.currentPass + 1

    try {
      const last = this._store.getLastEvent(job.id)
      if (last !== undefined && last.eventType === 'pass_started') {
        this._closeInterruptedAttempt(job, last)
      }

      const failures = countFailedAttempts(this._store.listEvents(job.id, 0), passNumber)
      if (failures >= this._maxAttempts) {
        const message = `Pass ${String(passNumber)} failed after ${String(failures)} attempt(s): interrupted`
        const recorded = this._store.recordTransition(job.id, { type: 'fail', errorMessage: message }, [
          { eventType: 'job_failed', passNumber, message, details: { reason: 'interrupted' } },
        ])
        this._publish(recorded.events)
        this._eventBus.emit('job:terminal', { jobId: job.id, status: recorded.job.status })
        result.failed++
        result.actions.push({ jobId: job.id, action: 'failed', reason: message })
        log.warn({ passNumber, failures }, 'Interrupted job has no attempts left; failed')
        return
      }

      this._orchestrator.submit(job.id, { resume: true })
      result.resumed++
      result.actions.push({
        jobId: job.id,
        action: 'resumed',
        reason: `pass ${String(passNumber)} has ${String(this._maxAttempts - failures)} attempt(s) left`,
      })
      log.info({ passNumber, failures }, 'Resuming interrupted job')
    } catch (err) {
      if (err instanceof ConflictError || err instanceof InvalidTransitionError) {
        result.skipped++
        result.actions.push({ jobId: job.id, action: 'skipped', reason: 'recovered by another writer' })
        log.debug({ err }, 'Job already recovered elsewhere')
        return
      }
      throw err
    }
  }

  private _closeInterruptedAttempt(job: Job, started: JobEvent): void {
    const attempt = typeof started.details.attempt === 'number' ? started.details.attempt : 1
    const event = this._store.appendEvent(job.id, {
      eventType: 'pass_failed',
      passNumber: started.passNumber,
      message: `Pass ${String(started.passNumber)} attempt ${String(attempt)} interrupted`,
      details: { attempt, retryable: true, error: 'interrupted', reason: 'interrupted' },
      expectedSequence: started.sequence + 1,
    })
    this._publish([event])
  }

  private _publish(events: JobEvent[]): void {
    for (const event of events) {
      this._eventBus.emit('job:event', { event })
    }
  }
}

function emptyResult(): RecoveryResult {
  return { resumed: 0, requeued: 0, failed: 0, skipped: 0, actions: [] }
}
