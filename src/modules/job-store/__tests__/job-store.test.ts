/**
 * SqliteJobStore tests against a migrated in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openInMemoryDatabase } from '../../../persistence/database.js'
import { ConflictError, InvalidTransitionError, NotFoundError, ValidationError } from '../../../core/errors.js'
import { ManualClock, SequentialIdGenerator } from '../../collaborators/clock.js'
import { SqliteJobStore } from '../job-store-impl.js'
import { JobFilterSchema } from '../schemas.js'
import type { StartJobRequest } from '../../../core/types.js'

const REQUEST: StartJobRequest = {
  fileId: 'file-a',
  fileName: 'a.md',
  totalPasses: 2,
  model: 'test-model',
  metadata: { tone: 'formal' },
}

describe('SqliteJobStore', () => {
  let db: BetterSqlite3Database
  let clock: ManualClock
  let store: SqliteJobStore

  beforeEach(() => {
    db = openInMemoryDatabase()
    clock = new ManualClock('2024-03-01T10:00:00.000Z', 1000)
    store = new SqliteJobStore({ db, clock, ids: new SequentialIdGenerator() })
  })

  afterEach(() => {
    db.close()
  })

  describe('createJob / getJob', () => {
    it('creates a pending job at pass 0', () => {
      const job = store.createJob(REQUEST)
      expect(job).toEqual({
        id: 'job_1',
        fileId: 'file-a',
        fileName: 'a.md',
        userId: null,
        status: 'pending',
        currentPass: 0,
        totalPasses: 2,
        model: 'test-model',
        createdAt: '2024-03-01T10:00:00.000Z',
        updatedAt: '2024-03-01T10:00:00.000Z',
        completedAt: null,
        errorMessage: null,
        result: null,
        metadata: { tone: 'formal' },
      })
      expect(store.getJob('job_1')).toEqual(job)
    })

    it('rejects totalPasses below 1 and creates nothing', () => {
      expect(() => store.createJob({ ...REQUEST, totalPasses: 0 })).toThrow(ValidationError)
      expect(store.listJobs()).toEqual([])
    })

    it('exclusive create refuses a file with a pending or processing job', () => {
      const first = store.createJob(REQUEST, { exclusive: true })
      expect(() => store.createJob(REQUEST, { exclusive: true })).toThrow(ConflictError)

      store.updateJobState(first.id, { type: 'start' })
      expect(() => store.createJob(REQUEST, { exclusive: true })).toThrow(
        'File file-a already has an active job: job_1',
      )
      expect(store.createJob({ ...REQUEST, fileId: 'file-b' }, { exclusive: true }).id).toBe('job_2')

      store.updateJobState(first.id, { type: 'fail', errorMessage: 'boom' })
      expect(store.createJob(REQUEST, { exclusive: true }).id).toBe('job_3')
      expect(store.listJobs({ status: 'pending' }).map((job) => job.fileId)).toEqual(['file-a', 'file-b'])
    })

    it('getJob throws NotFoundError for an unknown id', () => {
      expect(() => store.getJob('job_missing')).toThrow('Job not found: job_missing')
    })
  })

  describe('listJobs', () => {
    it('returns newest first and filters by status and user', () => {
      store.createJob({ ...REQUEST, userId: 'u1' })
      store.createJob({ ...REQUEST, userId: 'u2' })
      store.createJob({ ...REQUEST, userId: 'u1' })
      store.updateJobState('job_2', { type: 'start' })

      expect(store.listJobs().map((j) => j.id)).toEqual(['job_3', 'job_2', 'job_1'])
      expect(store.listJobs({ userId: 'u1' }).map((j) => j.id)).toEqual(['job_3', 'job_1'])
      expect(store.listJobs({ status: 'processing' }).map((j) => j.id)).toEqual(['job_2'])
      expect(store.listJobs({ status: ['pending'], limit: 1, offset: 1 }).map((j) => j.id)).toEqual(['job_1'])
    })

    it('filters by creation window', () => {
      store.createJob(REQUEST) // 10:00:00
      store.createJob(REQUEST) // 10:00:01
      store.createJob(REQUEST) // 10:00:02
      const ids = store
        .listJobs({ createdAfter: '2024-03-01T10:00:01.000Z', createdBefore: '2024-03-01T10:00:01.000Z' })
        .map((j) => j.id)
      expect(ids).toEqual(['job_2'])
    })

    it('rejects an unknown status in the filter schema', () => {
      expect(JobFilterSchema.safeParse({ status: 'paused' }).success).toBe(false)
      expect(JobFilterSchema.safeParse({ status: ['pending', 'failed'] }).success).toBe(true)
    })

    it('rejects a malformed date bound', () => {
      expect(() => store.listJobs({ createdAfter: 'yesterday' })).toThrow(ValidationError)
    })
  })

  describe('appendEvent / listEvents', () => {
    it('assigns gapless sequences from 1', () => {
      store.createJob(REQUEST)
      const a = store.appendEvent('job_1', { eventType: 'job_started', message: 'started' })
      const b = store.appendEvent('job_1', { eventType: 'pass_started', passNumber: 1, message: 'p1', details: { attempt: 1 } })
      expect([a.sequence, b.sequence]).toEqual([1, 2])
      expect(store.listEvents('job_1', 1)).toEqual([b])
      expect(store.listEvents('job_1', 0, 1)).toEqual([a])
      expect(b.details).toEqual({ attempt: 1 })
    })

    it('keeps sequences independent per job', () => {
      store.createJob(REQUEST)
      store.createJob(REQUEST)
      store.appendEvent('job_1', { eventType: 'job_started', message: 'started' })
      const other = store.appendEvent('job_2', { eventType: 'job_started', message: 'started' })
      expect(other.sequence).toBe(1)
    })

    it('touches updated_at on append', () => {
      store.createJob(REQUEST) // 10:00:00, getJob does not tick the clock
      store.appendEvent('job_1', { eventType: 'job_started', message: 'started' })
      expect(store.getJob('job_1').updatedAt).toBe('2024-03-01T10:00:01.000Z')
    })

    it('raises ConflictError when expectedSequence is stale', () => {
      store.createJob(REQUEST)
      store.appendEvent('job_1', { eventType: 'job_started', message: 'started' })
      expect(() =>
        store.appendEvent('job_1', { eventType: 'pass_failed', message: 'x', expectedSequence: 1 }),
      ).toThrow(ConflictError)
      expect(store.appendEvent('job_1', { eventType: 'pass_started', message: 'y', expectedSequence: 2 }).sequence).toBe(2)
    })

    it('raises NotFoundError for an unknown job', () => {
      expect(() => store.appendEvent('job_9', { eventType: 'job_started', message: 'x' })).toThrow(NotFoundError)
      expect(() => store.listEvents('job_9')).toThrow(NotFoundError)
    })

    it('getLastEvent returns the highest sequence', () => {
      store.createJob(REQUEST)
      expect(store.getLastEvent('job_1')).toBeUndefined()
      store.appendEvent('job_1', { eventType: 'job_started', message: 'a' })
      store.appendEvent('job_1', { eventType: 'pass_started', message: 'b' })
      expect(store.getLastEvent('job_1')?.eventType).toBe('pass_started')
    })
  })

  describe('updateJobState / recordTransition', () => {
    it('persists a legal transition', () => {
      store.createJob(REQUEST)
      store.updateJobState('job_1', { type: 'start' })
      const job = store.updateJobState('job_1', { type: 'advance', passNumber: 1 })
      expect(job.currentPass).toBe(1)
      expect(store.getJob('job_1').currentPass).toBe(1)
    })

    it('rejects an illegal transition without writing', () => {
      store.createJob(REQUEST)
      expect(() => store.updateJobState('job_1', { type: 'complete', result: null })).toThrow(InvalidTransitionError)
      expect(store.getJob('job_1').status).toBe('pending')
    })

    it('applies the state change and its events atomically', () => {
      store.createJob({ ...REQUEST, totalPasses: 1 })
      store.updateJobState('job_1', { type: 'start' })

      const { job, events } = store.recordTransition('job_1', { type: 'complete', result: { ok: true } }, [
        { eventType: 'pass_completed', passNumber: 1, message: 'pass 1 done' },
        { eventType: 'job_completed', message: 'done' },
      ])
      expect(job.status).toBe('completed')
      expect(job.result).toEqual({ ok: true })
      expect(events.map((e) => [e.sequence, e.eventType])).toEqual([
        [1, 'pass_completed'],
        [2, 'job_completed'],
      ])
    })

    it('rolls back the state change when an event append fails', () => {
      store.createJob({ ...REQUEST, totalPasses: 1 })
      store.updateJobState('job_1', { type: 'start' })
      expect(() =>
        store.recordTransition('job_1', { type: 'fail', errorMessage: 'boom' }, [
          { eventType: 'job_failed', message: 'failed', expectedSequence: 5 },
        ]),
      ).toThrow(ConflictError)
      expect(store.getJob('job_1').status).toBe('processing')
      expect(store.listEvents('job_1')).toEqual([])
    })

    it('raises ConflictError when the row changed underneath', () => {
      store.createJob(REQUEST)
      const original = store.getJob.bind(store)
      // Simulate a concurrent writer between the read and the compare-and-set
      store.getJob = (jobId: string) => {
        const job = original(jobId)
        db.prepare("UPDATE jobs SET status = 'cancelled' WHERE id = ?").run(jobId)
        return job
      }
      expect(() => store.updateJobState('job_1', { type: 'start' })).toThrow(ConflictError)
    })
  })

  describe('cancel signals', () => {
    it('records, detects and clears a pending cancel', () => {
      store.createJob(REQUEST)
      expect(store.hasPendingCancel('job_1')).toBe(false)
      store.requestCancel('job_1', 'user asked')
      expect(store.hasPendingCancel('job_1')).toBe(true)
      store.markCancelProcessed('job_1')
      expect(store.hasPendingCancel('job_1')).toBe(false)
    })
  })

  describe('findStaleJobs', () => {
    it('returns processing jobs not written since the cutoff', () => {
      store.createJob(REQUEST) // job_1 created 10:00:00
      store.createJob(REQUEST) // job_2 created 10:00:01
      store.updateJobState('job_1', { type: 'start' }) // updated 10:00:02
      store.updateJobState('job_2', { type: 'start' }) // updated 10:00:03

      const stale = store.findStaleJobs(new Date('2024-03-01T10:00:03.000Z'))
      expect(stale.map((j) => j.id)).toEqual(['job_1'])
    })
  })
})
