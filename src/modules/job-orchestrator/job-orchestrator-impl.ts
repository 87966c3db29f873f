/**
 * JobOrchestratorImpl — admission queue plus the per-job pass loop.
 *
 * Architecture constraints:
 *  - Every state change goes through JobStore.recordTransition so a status
 *    is never visible without its event
 *  - Events are published on the bus only after they are durable
 *  - Cancellation is cooperative: checked before each pass, before each
 *    retry, and after an in-flight call returns (its result is discarded)
 *  - Shutdown stops admission and lets in-flight passes finish; a job
 *    interrupted between passes stays `processing` for crash recovery
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { ConflictError, FatalError, InvalidTransitionError, TransientError } from '../../core/errors.js'
import { isTerminalStatus } from '../../core/types.js'
import type { Job, JobEvent, JobId } from '../../core/types.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import { errorMessage, sleep } from '../../utils/helpers.js'
import type { FileSource, RefinementCollaborator } from '../collaborators/types.js'
import type { AppendEventInput, JobStore } from '../job-store/job-store.js'
import type { JobTransition } from '../job-store/state-machine.js'
import type { VersionStore } from '../version-store/version-store.js'
import { AdmissionQueue } from './admission.js'
import { backoffDelay, countFailedAttempts } from './attempts.js'
import type { JobOrchestrator } from './job-orchestrator.js'
import type { OrchestratorOptions, OrchestratorStatus, SubmitOptions } from './types.js'

export interface JobOrchestratorDeps {
  jobStore: JobStore
  versionStore: VersionStore
  refiner: RefinementCollaborator
  fileSource: FileSource
  eventBus: TypedEventBus
  options: OrchestratorOptions
  logger?: Logger
}

/** Outcome of one pass, as seen by the job loop */
type PassOutcome = 'advanced' | 'completed' | 'stopped'

export class JobOrchestratorImpl implements JobOrchestrator {
  private readonly _store: JobStore
  private readonly _versions: VersionStore
  private readonly _refiner: RefinementCollaborator
  private readonly _files: FileSource
  private readonly _eventBus: TypedEventBus
  private readonly _options: OrchestratorOptions
  private readonly _logger: Logger

  private readonly _queue: AdmissionQueue<JobId>
  private readonly _resume = new Set<JobId>()
  private readonly _cancelRequested = new Map<JobId, string | undefined>()
  /** Aborted on cancel or shutdown to cut a retry backoff short */
  private readonly _wakeups = new Map<JobId, AbortController>()
  private _stopping = false

  constructor(deps: JobOrchestratorDeps) {
    this._store = deps.jobStore
    this._versions = deps.versionStore
    this._refiner = deps.refiner
    this._files = deps.fileSource
    this._eventBus = deps.eventBus
    this._options = deps.options
    this._logger = deps.logger ?? createLogger('job-orchestrator')
    this._queue = new AdmissionQueue<JobId>(
      this._options.maxConcurrentJobs,
      (jobId) => this._drive(jobId),
      (jobId, err) => {
        this._logger.error({ jobId, err }, 'Job driver failed unexpectedly')
      },
    )
  }

  // -------------------------------------------------------------------------
  // BaseService
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    this._logger.debug({ options: this._options }, 'Job orchestrator ready')
  }

  async shutdown(): Promise<void> {
    const dropped = this._queue.close()
    this._stopping = true
    for (const wakeup of this._wakeups.values()) wakeup.abort()
    if (dropped.length > 0) {
      this._logger.info({ jobs: dropped }, 'Left queued jobs pending for the next start')
    }
    await this._queue.whenIdle()
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  submit(jobId: JobId, options: SubmitOptions = {}): number {
    if (this._queue.closed) {
      this._logger.warn({ jobId }, 'Orchestrator is shutting down; job left for recovery')
      return 0
    }
    if (options.resume === true) this._resume.add(jobId)
    const position = this._queue.enqueue(jobId)
    this._eventBus.emit('job:queued', { jobId, position })
    return position
  }

  cancel(jobId: JobId, reason?: string): Job {
    const job = this._store.getJob(jobId)
    if (job.status === 'cancelled') return job
    if (isTerminalStatus(job.status)) {
      throw new InvalidTransitionError(job.status, 'cancel', 'job already finished', { jobId })
    }

    if (job.status === 'pending' && !this._queue.isRunning(jobId)) {
      this._queue.remove(jobId)
      return this._applyCancel(job, reason)
    }

    if (this._queue.isRunning(jobId)) {
      this._cancelRequested.set(jobId, reason)
      this._wakeups.get(jobId)?.abort()
      this._logger.info({ jobId, reason }, 'Cancel requested for running job')
    } else {
      // Driven by another process: leave a signal it polls at pass boundaries
      this._store.requestCancel(jobId, reason)
    }
    return job
  }

  isActive(jobId: JobId): boolean {
    return this._queue.isRunning(jobId)
  }

  status(): OrchestratorStatus {
    return { running: this._queue.running, queued: this._queue.waiting, accepting: !this._queue.closed }
  }

  whenIdle(): Promise<void> {
    return this._queue.whenIdle()
  }

  // -------------------------------------------------------------------------
  // Job loop
  // -------------------------------------------------------------------------

  private async _drive(jobId: JobId): Promise<void> {
    const log = childLogger(this._logger, { jobId })
    const resumed = this._resume.delete(jobId)
    const wakeup = new AbortController()
    this._wakeups.set(jobId, wakeup)

    try {
      let job = this._store.getJob(jobId)

      if (job.status === 'pending') {
        if (this._isCancelRequested(jobId)) {
          this._applyCancel(job, this._cancelReason(jobId))
          return
        }
        job = this._record(job, { type: 'start' }, [
          {
            eventType: 'job_started',
            message: `Job started: ${String(job.totalPasses)} pass(es) of ${job.fileName}`,
            details: { totalPasses: job.totalPasses, model: job.model, fileId: job.fileId },
          },
        ])
      } else if (job.status !== 'processing') {
        log.debug({ status: job.status }, 'Job no longer runnable; skipping')
        return
      }

      this._eventBus.emit('job:claimed', { jobId, resumed })
      log.info({ resumed, currentPass: job.currentPass, totalPasses: job.totalPasses }, 'Driving job')

      if (job.currentPass === 0 && !(await this._seedOriginal(job, log))) return

      while (job.status === 'processing') {
        const outcome = await this._runPass(job, wakeup.signal, log)
        if (outcome === 'stopped') return
        job = this._store.getJob(jobId)
      }
    } catch (err) {
      if (err instanceof ConflictError || err instanceof InvalidTransitionError) {
        // Another writer (recovery or a second process) moved the job on
        log.warn({ err }, 'Lost ownership of job')
        return
      }
      throw err
    } finally {
      this._wakeups.delete(jobId)
      this._cancelRequested.delete(jobId)
    }
  }

  /**
   * Store the original content as pass 0.
   * @returns false when the job ended instead
   */
  private async _seedOriginal(job: Job, log: Logger): Promise<boolean> {
    let original: string
    try {
      original = await this._files.fetchOriginal(job.fileId)
    } catch (err) {
      log.error({ err, fileId: job.fileId }, 'Could not fetch original content')
      this._failJob(job, `Could not fetch original content: ${errorMessage(err)}`, [])
      return false
    }

    if (this._versions.hasVersion(job.fileId, 0)) {
      if (this._versions.getVersion(job.fileId, 0) !== original) {
        this._versions.replaceVersion(job.fileId, 0, original, {
          reason: `original refetched by job ${job.id}`,
          jobId: job.id,
        })
      }
    } else {
      this._versions.putVersion(job.fileId, 0, original)
    }
    return true
  }

  private async _runPass(job: Job, wakeup: AbortSignal, log: Logger): Promise<PassOutcome> {
    const passNumber = job.currentPass + 1
    const passLog = childLogger(log, { passNumber })
    const maxAttempts = this._options.maxAttemptsPerPass
    const priorFailures = countFailedAttempts(this._store.listEvents(job.id, 0), passNumber)

    if (priorFailures >= maxAttempts) {
      this._failJob(job, `Pass ${String(passNumber)} failed after ${String(priorFailures)} attempt(s)`, [])
      return 'stopped'
    }

    const input = this._versions.getVersion(job.fileId, passNumber - 1)

    for (let attempt = priorFailures + 1; attempt <= maxAttempts; attempt++) {
      if (this._isCancelRequested(job.id)) {
        this._applyCancel(job, this._cancelReason(job.id))
        return 'stopped'
      }
      if (this._stopping) {
        passLog.info('Shutdown requested; leaving job for recovery')
        return 'stopped'
      }

      this._append(job.id, {
        eventType: 'pass_started',
        passNumber,
        message: `Pass ${String(passNumber)} of ${String(job.totalPasses)} started (attempt ${String(attempt)})`,
        details: { attempt, maxAttempts },
      })

      let output: string
      try {
        output = await this._callRefiner(job, passNumber, input)
      } catch (err) {
        if (this._isCancelRequested(job.id)) {
          this._applyCancel(job, this._cancelReason(job.id))
          return 'stopped'
        }

        const fatal = err instanceof FatalError
        const message = errorMessage(err)
        const failedEvent: AppendEventInput = {
          eventType: 'pass_failed',
          passNumber,
          message: `Pass ${String(passNumber)} attempt ${String(attempt)} failed: ${message}`,
          details: { attempt, retryable: !fatal, error: message },
        }

        if (fatal || attempt >= maxAttempts) {
          passLog.error({ err, attempt, fatal }, 'Pass failed; failing job')
          const reason = fatal
            ? `Pass ${String(passNumber)} failed: ${message}`
            : `Pass ${String(passNumber)} failed after ${String(attempt)} attempt(s): ${message}`
          this._failJob(job, reason, [failedEvent])
          return 'stopped'
        }

        passLog.warn({ err, attempt }, 'Pass attempt failed; retrying')
        this._append(job.id, failedEvent)
        await sleep(backoffDelay(this._options.retryBackoffMs, attempt), wakeup)
        continue
      }

      if (this._isCancelRequested(job.id)) {
        passLog.info('Cancelled while the pass was running; discarding its output')
        this._applyCancel(job, this._cancelReason(job.id))
        return 'stopped'
      }

      this._snapshot(job, passNumber, output)
      const completedEvent: AppendEventInput = {
        eventType: 'pass_completed',
        passNumber,
        message: `Pass ${String(passNumber)} of ${String(job.totalPasses)} completed`,
        details: { attempt, characters: output.length },
      }

      if (passNumber < job.totalPasses) {
        this._record(job, { type: 'advance', passNumber }, [completedEvent])
        passLog.info({ attempt }, 'Pass completed')
        return 'advanced'
      }

      const finished = this._record(
        job,
        {
          type: 'complete',
          result: { fileId: job.fileId, finalPass: passNumber, characters: output.length },
        },
        [completedEvent, { eventType: 'job_completed', message: `Job completed after ${String(passNumber)} pass(es)` }],
      )
      passLog.info({ attempt, status: finished.status }, 'Job completed')
      return 'completed'
    }

    // Unreachable: the last attempt either returns or fails the job
    return 'stopped'
  }

  private async _callRefiner(job: Job, passNumber: number, content: string): Promise<string> {
    const controller = new AbortController()
    const timeoutMs = this._options.passTimeoutMs
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new TransientError(`Pass ${String(passNumber)} timed out after ${String(timeoutMs)} ms`, {
          jobId: job.id,
          passNumber,
        })
        reject(err)
        controller.abort(err)
      }, timeoutMs)
    })

    try {
      return await Promise.race([
        this._refiner.runPass({
          fileId: job.fileId,
          passNumber,
          content,
          model: job.model,
          config: job.metadata,
          signal: controller.signal,
        }),
        timeout,
      ])
    } finally {
      clearTimeout(timer)
    }
  }

  /** Store the pass output, superseding a snapshot left by an earlier run */
  private _snapshot(job: Job, passNumber: number, content: string): void {
    try {
      this._versions.putVersion(job.fileId, passNumber, content)
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err
      this._versions.replaceVersion(job.fileId, passNumber, content, {
        reason: `pass ${String(passNumber)} rerun by job ${job.id}`,
        jobId: job.id,
      })
    }
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  private _record(job: Job, transition: JobTransition, events: AppendEventInput[]): Job {
    const result = this._store.recordTransition(job.id, transition, events)
    this._publish(result.events)
    if (isTerminalStatus(result.job.status)) {
      this._eventBus.emit('job:terminal', { jobId: job.id, status: result.job.status })
    }
    return result.job
  }

  private _failJob(job: Job, errorMessageText: string, leading: AppendEventInput[]): void {
    this._record(job, { type: 'fail', errorMessage: errorMessageText }, [
      ...leading,
      { eventType: 'job_failed', passNumber: job.currentPass + 1, message: errorMessageText, details: {} },
    ])
  }

  private _applyCancel(job: Job, reason: string | undefined): Job {
    const cancelled = this._record(job, { type: 'cancel', reason }, [
      {
        eventType: 'job_cancelled',
        passNumber: job.status === 'processing' ? job.currentPass : null,
        message: reason === undefined ? 'Job cancelled' : `Job cancelled: ${reason}`,
        details: reason === undefined ? {} : { reason },
      },
    ])
    this._store.markCancelProcessed(job.id)
    this._logger.info({ jobId: job.id, currentPass: job.currentPass }, 'Job cancelled')
    return cancelled
  }

  private _append(jobId: JobId, input: AppendEventInput): JobEvent {
    const event = this._store.appendEvent(jobId, input)
    this._publish([event])
    return event
  }

  private _publish(events: JobEvent[]): void {
    for (const event of events) {
      this._eventBus.emit('job:event', { event })
    }
  }

  private _isCancelRequested(jobId: JobId): boolean {
    if (this._cancelRequested.has(jobId)) return true
    return this._store.hasPendingCancel(jobId)
  }

  private _cancelReason(jobId: JobId): string | undefined {
    return this._cancelRequested.get(jobId) ?? this._store.pendingCancelReason(jobId)
  }
}

export function createJobOrchestrator(deps: JobOrchestratorDeps): JobOrchestrator {
  return new JobOrchestratorImpl(deps)
}
