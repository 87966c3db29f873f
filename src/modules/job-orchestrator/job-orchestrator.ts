/**
 * JobOrchestrator — drives jobs through their passes.
 *
 * The orchestrator is the single writer of job state: it claims a job,
 * seeds pass 0 from the file source, runs every pass through the
 * refinement collaborator with retries and a timeout, snapshots each pass,
 * and records every transition together with its events.
 */

import type { BaseService } from '../../core/di.js'
import type { Job, JobId } from '../../core/types.js'
import type { OrchestratorStatus, SubmitOptions } from './types.js'

export interface JobOrchestrator extends BaseService {
  /**
   * Queue a job for driving. A job already queued or running here is ignored.
   * @returns its queue position (0 when it started immediately)
   */
  submit(jobId: JobId, options?: SubmitOptions): number

  /**
   * Request cancellation. A pending job is cancelled at once; a running job
   * stops at its next pass boundary; a job driven by another process is
   * signalled through the store.
   *
   * @throws {NotFoundError}
   * @throws {InvalidTransitionError} when the job already completed or failed
   */
  cancel(jobId: JobId, reason?: string): Job

  /** Whether this process is currently driving the job */
  isActive(jobId: JobId): boolean

  status(): OrchestratorStatus

  /** Resolves when no job is running or queued */
  whenIdle(): Promise<void>
}
