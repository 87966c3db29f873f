/**
 * RedraftEngineImpl — concrete implementation of the RedraftEngine interface.
 *
 * The createRedraftEngine() factory:
 *  1. Opens and migrates the database
 *  2. Instantiates the TypedEventBus
 *  3. Creates stores, broadcaster, orchestrator, recovery and watchdog via
 *     constructor injection
 *  4. Registers the services in the ServiceRegistry and initializes them
 *  5. Recovers jobs left behind by a previous process
 *  6. Optionally sets up SIGTERM/SIGINT graceful shutdown handlers
 *  7. Emits engine:ready
 *
 * Architecture constraints:
 *  - No module imports another module's implementation; all wiring is here
 *  - Modules communicate only via the event bus or injected interfaces
 */

import { InvalidTransitionError, ValidationError } from './errors.js'
import { createEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import type { TypedEventBus } from './event-bus.js'
import type { AttachOptions, DiffRequest, RedraftEngine, RedraftEngineOptions } from './engine.js'
import type { Job, JobEvent, JobFilter, JobId, StartJobRequest } from './types.js'
import { createDatabaseService } from '../persistence/database.js'
import { SqliteJobStore } from '../modules/job-store/job-store-impl.js'
import type { JobStore } from '../modules/job-store/job-store.js'
import { SqliteVersionStore } from '../modules/version-store/version-store-impl.js'
import { createDiffEngine } from '../modules/diff-engine/diff-engine-impl.js'
import type { DiffEngine } from '../modules/diff-engine/diff-engine.js'
import type { Diff } from '../modules/diff-engine/types.js'
import { BroadcasterImpl } from '../modules/broadcaster/broadcaster-impl.js'
import type { Broadcaster } from '../modules/broadcaster/broadcaster.js'
import type { JobEventSubscription } from '../modules/broadcaster/types.js'
import { JobOrchestratorImpl } from '../modules/job-orchestrator/job-orchestrator-impl.js'
import type { JobOrchestrator } from '../modules/job-orchestrator/job-orchestrator.js'
import type { OrchestratorStatus } from '../modules/job-orchestrator/types.js'
import { systemClock, uuidGenerator } from '../modules/collaborators/clock.js'
import { CommandRefiner } from '../modules/collaborators/command-refiner.js'
import { FsFileSource } from '../modules/collaborators/fs-file-source.js'
import { CrashRecoveryManager } from '../recovery/crash-recovery.js'
import type { RecoveryResult } from '../recovery/crash-recovery.js'
import { IntervalWatchdog } from '../recovery/watchdog.js'
import { childLogger, createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'
import type { RedraftConfig } from '../modules/config/config-schema.js'

// ---------------------------------------------------------------------------
// RedraftEngineImpl
// ---------------------------------------------------------------------------

interface EngineParts {
  config: RedraftConfig
  eventBus: TypedEventBus
  registry: ServiceRegistry
  jobStore: JobStore
  diffEngine: DiffEngine
  broadcaster: Broadcaster
  orchestrator: JobOrchestrator
  recovery: CrashRecoveryManager
  logger: Logger
}

class RedraftEngineImpl implements RedraftEngine {
  readonly config: RedraftConfig
  readonly eventBus: TypedEventBus
  private readonly _registry: ServiceRegistry
  private readonly _store: JobStore
  private readonly _diff: DiffEngine
  private readonly _broadcaster: Broadcaster
  private readonly _orchestrator: JobOrchestrator
  private readonly _recovery: CrashRecoveryManager
  private readonly _logger: Logger
  private _ready = false
  private _shutdownPromise: Promise<void> | null = null
  private _sigtermHandler: (() => void) | null = null
  private _sigintHandler: (() => void) | null = null

  constructor(parts: EngineParts) {
    this.config = parts.config
    this.eventBus = parts.eventBus
    this._registry = parts.registry
    this._store = parts.jobStore
    this._diff = parts.diffEngine
    this._broadcaster = parts.broadcaster
    this._orchestrator = parts.orchestrator
    this._recovery = parts.recovery
    this._logger = parts.logger
  }

  get isReady(): boolean {
    return this._ready
  }

  startJob(request: StartJobRequest): Job {
    const job = this._store.createJob(request, { exclusive: true })
    const position = this._orchestrator.submit(job.id)
    this._logger.info({ jobId: job.id, fileId: job.fileId, totalPasses: job.totalPasses, position }, 'Job accepted')
    return job
  }

  attach(options: AttachOptions): JobEventSubscription {
    const since = options.sinceSequence ?? 0
    if (!Number.isInteger(since) || since < 0) {
      throw new ValidationError(`sinceSequence must be a non-negative integer, got ${String(since)}`, {
        jobId: options.jobId,
      })
    }
    // Resolve the job now so an unknown id fails before any transport commits to a stream
    this._store.getJob(options.jobId)
    return this._broadcaster.subscribe(options.jobId, since)
  }

  getJob(jobId: JobId): Job {
    return this._store.getJob(jobId)
  }

  listJobs(filter?: JobFilter): Job[] {
    return this._store.listJobs(filter)
  }

  listEvents(jobId: JobId, sinceSequence = 0): JobEvent[] {
    this._store.getJob(jobId)
    return this._store.listEvents(jobId, sinceSequence)
  }

  diff(request: DiffRequest): Diff {
    return this._diff.computeDiff(request.fileId, request.fromPass, request.toPass)
  }

  cancel(jobId: JobId, reason?: string): Job {
    return this._orchestrator.cancel(jobId, reason)
  }

  retryJob(jobId: JobId): Job {
    const previous = this._store.getJob(jobId)
    if (previous.status !== 'failed' && previous.status !== 'cancelled') {
      throw new InvalidTransitionError(previous.status, 'retry', 'only failed or cancelled jobs can be retried', {
        jobId,
      })
    }
    const job = this.startJob({
      fileId: previous.fileId,
      fileName: previous.fileName,
      totalPasses: previous.totalPasses,
      model: previous.model,
      userId: previous.userId,
      metadata: { ...previous.metadata, retryOf: previous.id },
    })
    this._logger.info({ jobId: job.id, retryOf: previous.id }, 'Job retried')
    return job
  }

  recover(): RecoveryResult {
    return this._recovery.recover()
  }

  status(): OrchestratorStatus {
    return this._orchestrator.status()
  }

  whenIdle(): Promise<void> {
    return this._orchestrator.whenIdle()
  }

  shutdown(): Promise<void> {
    if (this._shutdownPromise === null) {
      this._shutdownPromise = this._shutdown()
    }
    return this._shutdownPromise
  }

  private async _shutdown(): Promise<void> {
    this._logger.info('Engine shutdown initiated')
    this._ready = false
    this._removeShutdownHandlers()
    this.eventBus.emit('engine:shutdown', { reason: 'shutdown() called' })

    try {
      await this._registry.shutdownAll()
    } catch (err) {
      this._logger.error({ err }, 'Error during engine shutdown')
    }

    this._logger.info('Engine shutdown complete')
  }

  /** @internal used by the factory */
  markReady(): void {
    this._ready = true
  }

  /** @internal used by the factory */
  registerShutdownHandlers(): void {
    if (this._sigtermHandler !== null) return

    const makeHandler = (signal: string) => () => {
      this._logger.info({ signal }, 'Received signal; shutting down')
      this.shutdown()
        .then(() => {
          process.exit(0)
        })
        .catch((err: unknown) => {
          this._logger.error({ err }, 'Error during signal-triggered shutdown')
          process.exit(1)
        })
    }

    this._sigtermHandler = makeHandler('SIGTERM')
    this._sigintHandler = makeHandler('SIGINT')
    process.once('SIGTERM', this._sigtermHandler)
    process.once('SIGINT', this._sigintHandler)
  }

  private _removeShutdownHandlers(): void {
    if (this._sigtermHandler !== null) {
      process.removeListener('SIGTERM', this._sigtermHandler)
      this._sigtermHandler = null
    }
    if (this._sigintHandler !== null) {
      process.removeListener('SIGINT', this._sigintHandler)
      this._sigintHandler = null
    }
  }
}

// ---------------------------------------------------------------------------
// createRedraftEngine factory
// ---------------------------------------------------------------------------

/**
 * Build, initialize and start an engine.
 *
 * @example
 * const configSystem = createConfigSystem()
 * await configSystem.load()
 * const engine = await createRedraftEngine({ config: configSystem.getConfig() })
 * const job = engine.startJob({ fileId: 'docs/intro.md', fileName: 'intro.md', totalPasses: 3, model: 'default' })
 */
export async function createRedraftEngine(options: RedraftEngineOptions): Promise<RedraftEngine> {
  const { config } = options
  const logger = options.logger ?? createLogger('redraft', { level: config.global.log_level })
  const clock = options.clock ?? systemClock
  const ids = options.ids ?? uuidGenerator

  logger.info({ databasePath: config.global.database_path }, 'Initializing engine')

  const eventBus = createEventBus()

  // The stores prepare statements against an open connection
  const databaseService = createDatabaseService(config.global.database_path, childLogger(logger, { module: 'database' }))
  await databaseService.initialize()
  const db = databaseService.db

  const jobStore = new SqliteJobStore({ db, clock, ids, logger: childLogger(logger, { module: 'job-store' }) })
  const versionStore = new SqliteVersionStore({ db, clock, logger: childLogger(logger, { module: 'version-store' }) })
  const diffEngine = createDiffEngine(versionStore, { maxAlignmentCells: config.diff.max_alignment_cells })

  const broadcaster = new BroadcasterImpl({
    eventBus,
    store: jobStore,
    ids,
    options: {
      subscriberBufferSize: config.broadcast.subscriber_buffer_size,
      replayPageSize: config.broadcast.replay_page_size,
    },
    logger: childLogger(logger, { module: 'broadcaster' }),
  })

  const refiner =
    options.refiner ??
    new CommandRefiner({
      command: config.refiner.command,
      args: config.refiner.args,
      fatalExitCodes: config.refiner.fatal_exit_codes,
      cwd: config.files.root_dir,
      logger: childLogger(logger, { module: 'command-refiner' }),
    })
  const fileSource = options.fileSource ?? new FsFileSource(config.files.root_dir)

  const orchestrator = new JobOrchestratorImpl({
    jobStore,
    versionStore,
    refiner,
    fileSource,
    eventBus,
    options: {
      maxConcurrentJobs: config.orchestrator.max_concurrent_jobs,
      maxAttemptsPerPass: config.orchestrator.max_attempts_per_pass,
      retryBackoffMs: config.orchestrator.retry_backoff_ms,
      passTimeoutMs: config.orchestrator.pass_timeout_ms,
    },
    logger: childLogger(logger, { module: 'job-orchestrator' }),
  })

  const recovery = new CrashRecoveryManager({
    jobStore,
    orchestrator,
    eventBus,
    maxAttemptsPerPass: config.orchestrator.max_attempts_per_pass,
    logger: childLogger(logger, { module: 'crash-recovery' }),
  })

  // Registration order is initialization order; shutdown runs in reverse, so
  // running passes finish before live subscriptions end and the database closes
  const registry = new ServiceRegistry()
  registry.register('database', databaseService)
  registry.register('broadcaster', broadcaster)
  registry.register('orchestrator', orchestrator)
  if (options.enableWatchdog ?? true) {
    registry.register(
      'watchdog',
      new IntervalWatchdog({
        recovery,
        clock,
        staleThresholdMs: config.recovery.stale_job_threshold_ms,
        intervalMs: config.recovery.watchdog_interval_ms,
        logger: childLogger(logger, { module: 'watchdog' }),
      }),
    )
  }

  const engine = new RedraftEngineImpl({
    config,
    eventBus,
    registry,
    jobStore,
    diffEngine,
    broadcaster,
    orchestrator,
    recovery,
    logger,
  })

  try {
    await registry.initializeAll()
    if (options.recoverOnStart ?? true) {
      recovery.recover()
    }
  } catch (err) {
    logger.error({ err }, 'Engine initialization failed; cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  if (options.handleSignals === true) {
    engine.registerShutdownHandlers()
  }

  engine.markReady()
  eventBus.emit('engine:ready', {})
  logger.info('Engine ready')
  return engine
}
