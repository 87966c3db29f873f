/**
 * Types for the job-orchestrator module.
 */

import type { JobId } from '../../core/types.js'

export interface OrchestratorOptions {
  /** Jobs driven at the same time; the rest wait in `pending` */
  maxConcurrentJobs: number
  /** Attempts per pass, interrupted attempts included */
  maxAttemptsPerPass: number
  /** Base of the exponential backoff between attempts */
  retryBackoffMs: number
  /** Upper bound on one refinement call */
  passTimeoutMs: number
}

export interface SubmitOptions {
  /** The job is already `processing` and continues from its current pass */
  resume?: boolean
}

/**
 * Snapshot of what the orchestrator is doing, for status output.
 */
export interface OrchestratorStatus {
  running: JobId[]
  queued: JobId[]
  accepting: boolean
}
