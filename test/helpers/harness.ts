/**
 * Wires the stores, bus, broadcaster and orchestrator over an in-memory
 * database for module-level tests.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createEventBus } from '../../src/core/event-bus.js'
import type { TypedEventBus } from '../../src/core/event-bus.js'
import { openInMemoryDatabase } from '../../src/persistence/database.js'
import { BroadcasterImpl } from '../../src/modules/broadcaster/broadcaster-impl.js'
import { ManualClock, SequentialIdGenerator } from '../../src/modules/collaborators/clock.js'
import { SqliteJobStore } from '../../src/modules/job-store/job-store-impl.js'
import { JobOrchestratorImpl } from '../../src/modules/job-orchestrator/job-orchestrator-impl.js'
import type { OrchestratorOptions } from '../../src/modules/job-orchestrator/types.js'
import { SqliteVersionStore } from '../../src/modules/version-store/version-store-impl.js'
import { FakeFileSource, FakeRefiner } from './fakes.js'

export interface Harness {
  db: BetterSqlite3Database
  clock: ManualClock
  ids: SequentialIdGenerator
  store: SqliteJobStore
  versions: SqliteVersionStore
  bus: TypedEventBus
  broadcaster: BroadcasterImpl
  refiner: FakeRefiner
  files: FakeFileSource
  orchestrator: JobOrchestratorImpl
  close(): Promise<void>
}

export const TEST_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  maxConcurrentJobs: 2,
  maxAttemptsPerPass: 3,
  retryBackoffMs: 0,
  passTimeoutMs: 1000,
}

export async function createHarness(options: Partial<OrchestratorOptions> = {}): Promise<Harness> {
  const db = openInMemoryDatabase()
  const clock = new ManualClock('2024-06-01T12:00:00.000Z', 1000)
  const ids = new SequentialIdGenerator()
  const store = new SqliteJobStore({ db, clock, ids })
  const versions = new SqliteVersionStore({ db, clock })
  const bus = createEventBus()
  const broadcaster = new BroadcasterImpl({
    eventBus: bus,
    store,
    ids,
    options: { subscriberBufferSize: 256, replayPageSize: 100 },
  })
  const refiner = new FakeRefiner()
  const files = new FakeFileSource({ 'file-a': 'First paragraph.\n\nSecond paragraph.' })
  const orchestrator = new JobOrchestratorImpl({
    jobStore: store,
    versionStore: versions,
    refiner,
    fileSource: files,
    eventBus: bus,
    options: { ...TEST_ORCHESTRATOR_OPTIONS, ...options },
  })

  await broadcaster.initialize()
  await orchestrator.initialize()

  return {
    db,
    clock,
    ids,
    store,
    versions,
    bus,
    broadcaster,
    refiner,
    files,
    orchestrator,
    async close() {
      await orchestrator.shutdown()
      await broadcaster.shutdown()
      db.close()
    },
  }
}
