/**
 * JobStore — durable job records and their append-only event logs.
 */

import type { Job, JobEvent, JobEventType, JobFilter, JobId, StartJobRequest, StructuredMap } from '../../core/types.js'
import type { JobTransition } from './state-machine.js'

/** Input for one appended event; id, sequence and timestamp are assigned by the store */
export interface AppendEventInput {
  eventType: JobEventType
  passNumber?: number | null
  message: string
  details?: StructuredMap
  /**
   * When set, the append only succeeds if this is the next sequence for the
   * job. Used by crash recovery so two recoverers cannot both close a pass.
   */
  expectedSequence?: number
}

export interface CreateJobOptions {
  /**
   * Refuse the job while another pending or processing job exists for the
   * same file. Checked and inserted in one transaction.
   */
  exclusive?: boolean
}

export interface TransitionResult {
  job: Job
  events: JobEvent[]
}

export interface JobStore {
  /**
   * @throws {ValidationError} when totalPasses < 1 or the request is malformed
   * @throws {ConflictError} when `exclusive` is set and the file has an active job
   */
  createJob(request: StartJobRequest, options?: CreateJobOptions): Job

  /** @throws {NotFoundError} */
  getJob(jobId: JobId): Job

  /** Newest first */
  listJobs(filter?: JobFilter): Job[]

  /**
   * Append one event with the next sequence number.
   *
   * @throws {NotFoundError} when the job does not exist
   * @throws {ConflictError} when `expectedSequence` is not the next sequence
   */
  appendEvent(jobId: JobId, input: AppendEventInput): JobEvent

  /**
   * Apply one state-machine transition with a compare-and-set on the status
   * and pass read beforehand.
   *
   * @throws {InvalidTransitionError} when the transition is illegal
   * @throws {ConflictError} when another writer changed the job in between
   */
  updateJobState(jobId: JobId, transition: JobTransition): Job

  /**
   * `updateJobState` plus `appendEvent` for each input, in one transaction.
   */
  recordTransition(jobId: JobId, transition: JobTransition, events: AppendEventInput[]): TransitionResult

  /** Events with sequence > sinceSequence, ascending */
  listEvents(jobId: JobId, sinceSequence?: number, limit?: number): JobEvent[]

  getLastEvent(jobId: JobId): JobEvent | undefined

  /** Record a cancel request in the signal queue */
  requestCancel(jobId: JobId, reason?: string): void

  hasPendingCancel(jobId: JobId): boolean

  /** Reason given with the oldest unprocessed cancel request, if it had one */
  pendingCancelReason(jobId: JobId): string | undefined

  markCancelProcessed(jobId: JobId): void

  /** Processing jobs with no write since `olderThan` */
  findStaleJobs(olderThan: Date): Job[]
}
