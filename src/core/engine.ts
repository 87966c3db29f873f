/**
 * RedraftEngine interface — the public contract of the refinement engine.
 *
 * All callers (CLI, HTTP server, WebSocket gateway) depend on this interface.
 * Create an instance via `createRedraftEngine()` from engine-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { Job, JobEvent, JobFilter, JobId, StartJobRequest } from './types.js'
import type { RedraftConfig } from '../modules/config/config-schema.js'
import type { Clock, FileSource, IdGenerator, RefinementCollaborator } from '../modules/collaborators/types.js'
import type { Diff } from '../modules/diff-engine/types.js'
import type { JobEventSubscription } from '../modules/broadcaster/types.js'
import type { OrchestratorStatus } from '../modules/job-orchestrator/types.js'
import type { RecoveryResult } from '../recovery/crash-recovery.js'
import type { Logger } from '../utils/logger.js'

// ---------------------------------------------------------------------------
// RedraftEngineOptions
// ---------------------------------------------------------------------------

export interface RedraftEngineOptions {
  /** Fully merged configuration, usually from ConfigSystem.getConfig() */
  config: RedraftConfig

  /** Defaults to a CommandRefiner built from `config.refiner` */
  refiner?: RefinementCollaborator

  /** Defaults to an FsFileSource rooted at `config.files.root_dir` */
  fileSource?: FileSource

  clock?: Clock
  ids?: IdGenerator
  logger?: Logger

  /**
   * Run crash recovery during startup.
   * @default true
   */
  recoverOnStart?: boolean

  /**
   * Start the stale-job watchdog.
   * @default true
   */
  enableWatchdog?: boolean

  /**
   * Shut down gracefully on SIGTERM/SIGINT.
   * @default false
   */
  handleSignals?: boolean
}

export interface AttachOptions {
  jobId: JobId
  /** Deliver events with a sequence greater than this (default 0: the whole log) */
  sinceSequence?: number
}

export interface DiffRequest {
  fileId: string
  fromPass: number
  toPass: number
}

// ---------------------------------------------------------------------------
// RedraftEngine interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *  1. Create via `createRedraftEngine(options)`; services initialize and
 *     jobs left behind by a previous process are recovered
 *  2. `engine:ready` is emitted on the event bus
 *  3. Start, watch and cancel jobs
 *  4. `shutdown()` stops admission, lets running passes finish, ends live
 *     subscriptions and closes the database
 */
export interface RedraftEngine {
  /** The configuration the engine was built from */
  readonly config: RedraftConfig

  readonly eventBus: TypedEventBus

  readonly isReady: boolean

  /**
   * Create a pending job and queue it for refinement.
   * @throws {ValidationError} when the request is malformed
   * @throws {ConflictError} while another job for the same file is pending or processing
   */
  startJob(request: StartJobRequest): Job

  /**
   * Live, ordered feed of a job's events starting after `sinceSequence`.
   * @throws {NotFoundError}
   * @throws {ValidationError} when `sinceSequence` is not a non-negative integer
   */
  attach(options: AttachOptions): JobEventSubscription

  /** @throws {NotFoundError} */
  getJob(jobId: JobId): Job

  /** Newest first */
  listJobs(filter?: JobFilter): Job[]

  /** Stored events after `sinceSequence`, ascending */
  listEvents(jobId: JobId, sinceSequence?: number): JobEvent[]

  /**
   * @throws {NotFoundError} when either pass has no snapshot
   */
  diff(request: DiffRequest): Diff

  /**
   * Best-effort, cooperative cancellation.
   * @throws {InvalidTransitionError} when the job already completed or failed
   */
  cancel(jobId: JobId, reason?: string): Job

  /**
   * Start a new job with the same file, passes and model as a failed or
   * cancelled one. The new job's metadata records `retryOf`.
   * @throws {InvalidTransitionError} when the job is not failed or cancelled
   * @throws {ConflictError} while another job for the same file is pending or processing
   */
  retryJob(jobId: JobId): Job

  /** Resume or fail jobs a dead process left behind */
  recover(): RecoveryResult

  status(): OrchestratorStatus

  /** Resolves when no job is running or queued in this process */
  whenIdle(): Promise<void>

  /**
   * Graceful shutdown. Safe to call multiple times.
   */
  shutdown(): Promise<void>
}
