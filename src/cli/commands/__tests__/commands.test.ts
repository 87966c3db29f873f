/**
 * Tests for the job commands, run against a real engine on a temporary
 * SQLite file with in-process refiner and file source.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ManualClock, SequentialIdGenerator } from '../../../modules/collaborators/clock.js'
import { SqliteJobStore } from '../../../modules/job-store/job-store-impl.js'
import { DatabaseWrapper } from '../../../persistence/database.js'
import { runMigrations } from '../../../persistence/migrations/index.js'
import { FakeFileSource, FakeRefiner } from '../../../../test/helpers/fakes.js'
import { createEngineOpener } from '../../utils/engine-session.js'
import type { EngineOpener } from '../../utils/engine-session.js'
import { runCancelAction } from '../cancel.js'
import { runDiffAction } from '../diff.js'
import { runListAction } from '../list.js'
import { runRecoverAction } from '../recover.js'
import { runRetryAction } from '../retry.js'
import { runStartAction } from '../start.js'
import { runStatusAction } from '../status.js'
import { runWatchAction } from '../watch.js'

const ORIGINAL = 'Opening line.\n\nClosing line.'

describe('job commands', () => {
  let dir: string
  let databasePath: string
  let refiner: FakeRefiner
  let ids: SequentialIdGenerator
  let open: EngineOpener
  let stdoutChunks: string[]
  let stderrChunks: string[]

  function out(): string {
    return stdoutChunks.join('')
  }

  function err(): string {
    return stderrChunks.join('')
  }

  function clearOut(): void {
    stdoutChunks.length = 0
  }

  interface JsonLine {
    command: string
    data: Record<string, unknown>
  }

  function jsonLines(): JsonLine[] {
    return out()
      .trimEnd()
      .split('\n')
      .map((line) => {
        const parsed: JsonLine = JSON.parse(line)
        return parsed
      })
  }

  /** A job written straight to the database, as another process would */
  function seedPendingJob(): string {
    const wrapper = new DatabaseWrapper(databasePath)
    wrapper.open()
    runMigrations(wrapper.db)
    const store = new SqliteJobStore({ db: wrapper.db, clock: new ManualClock('2024-06-01T09:00:00.000Z', 1000), ids })
    const job = store.createJob({ fileId: 'doc-1', fileName: 'doc-1.md', totalPasses: 1, model: 'test-model' })
    wrapper.close()
    return job.id
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'redraft-cli-'))
    databasePath = join(dir, 'redraft.db')
    refiner = new FakeRefiner()
    ids = new SequentialIdGenerator()
    open = createEngineOpener({
      projectConfigDir: join(dir, '.redraft'),
      cliOverrides: {
        global: { database_path: databasePath, log_level: 'silent' },
        orchestrator: { retry_backoff_ms: 0 },
      },
      engineOverrides: {
        refiner,
        fileSource: new FakeFileSource({ 'doc-1': ORIGINAL }),
        clock: new ManualClock('2024-06-01T12:00:00.000Z', 1000),
        ids,
        handleSignals: false,
      },
    })
    stdoutChunks = []
    stderrChunks = []
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdoutChunks.push(String(chunk))
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderrChunks.push(String(chunk))
      return true
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  async function startJob(passes = 2): Promise<void> {
    const code = await runStartAction({ fileId: 'doc-1', passes, model: 'test-model', outputFormat: 'human', open })
    expect(code).toBe(0)
    clearOut()
  }

  describe('start', () => {
    it('drives the job to completion and prints its events', async () => {
      const code = await runStartAction({ fileId: 'doc-1', passes: 2, model: 'test-model', outputFormat: 'human', open })

      expect(code).toBe(0)
      const lines = out().split('\n')
      expect(lines[0]).toBe('Started job job_1 (2 pass(es))')
      const eventTypes = lines.filter((line) => line.startsWith('#')).map((line) => line.split(' ')[1])
      expect(eventTypes).toEqual([
        'job_started',
        'pass_started',
        'pass_completed',
        'pass_started',
        'pass_completed',
        'job_completed',
      ])
      expect(out()).toContain('Job job_1  Status: completed  Pass: 2/2\nFile:    doc-1 (doc-1)\nModel:   test-model\n')
    })

    it('writes one JSON line per step with --output-format json', async () => {
      const code = await runStartAction({
        fileId: 'doc-1',
        fileName: 'Doc One',
        passes: 1,
        model: 'test-model',
        outputFormat: 'json',
        version: '1.2.3',
        open,
      })

      expect(code).toBe(0)
      const lines = jsonLines()
      expect(lines).toHaveLength(6)
      expect(lines.every((line) => line.command === 'start')).toBe(true)
      expect(lines[0]?.data.job).toMatchObject({ id: 'job_1', status: 'pending', fileName: 'Doc One' })
      expect(lines.slice(1, 5).map((line) => line.data.type)).toEqual(['event', 'event', 'event', 'event'])
      expect(lines[5]?.data.job).toMatchObject({ id: 'job_1', status: 'completed' })
    })

    it('exits 2 on a malformed request', async () => {
      const code = await runStartAction({ fileId: 'doc-1', passes: 0, model: 'test-model', outputFormat: 'human', open })

      expect(code).toBe(2)
      expect(err()).toBe('Error: totalPasses must be at least 1\n')
    })

    it('exits 2 on metadata that is not an object', async () => {
      const code = await runStartAction({
        fileId: 'doc-1',
        passes: 1,
        model: 'test-model',
        metadataJson: '[1, 2]',
        outputFormat: 'human',
        open,
      })

      expect(code).toBe(2)
      expect(err()).toBe('Error: --metadata must be a JSON object\n')
    })

    it('exits 1 while the file already has a job waiting', async () => {
      const jobId = seedPendingJob()

      const code = await runStartAction({ fileId: 'doc-1', passes: 1, model: 'test-model', outputFormat: 'human', open })

      expect(code).toBe(1)
      expect(err()).toBe(`Error: File doc-1 already has an active job: ${jobId}\n`)
      expect(out()).toBe('')
    })

    it('exits 1 when the job fails', async () => {
      refiner.setHandler(() => {
        throw new Error('model unavailable')
      })

      const code = await runStartAction({ fileId: 'doc-1', passes: 1, model: 'test-model', outputFormat: 'human', open })

      expect(code).toBe(1)
      expect(out()).toContain('Status: failed')
    })
  })

  describe('status', () => {
    it('shows a finished job with its events', async () => {
      await startJob(1)

      const code = await runStatusAction({ jobId: 'job_1', showEvents: true, outputFormat: 'human', open })

      expect(code).toBe(0)
      const lines = out().trimEnd().split('\n')
      expect(lines[0]).toBe('Job job_1  Status: completed  Pass: 1/1')
      expect(lines.filter((line) => line.startsWith('#')).map((line) => line.split(' ')[0])).toEqual([
        '#1',
        '#2',
        '#3',
        '#4',
      ])
    })

    it('exits 2 for an unknown job', async () => {
      const code = await runStatusAction({ jobId: 'job_404', showEvents: false, outputFormat: 'human', open })

      expect(code).toBe(2)
      expect(err()).toBe('Error: Job not found: job_404\n')
    })
  })

  describe('list', () => {
    it('says so when there are no jobs', async () => {
      const code = await runListAction({ outputFormat: 'human', open })
      expect(code).toBe(0)
      expect(out()).toBe('No jobs found.\n')
    })

    it('filters by status', async () => {
      await startJob(1)

      await runListAction({ status: 'completed', outputFormat: 'json', open })
      await runListAction({ status: 'pending,processing', outputFormat: 'json', open })

      const [completed, active] = jsonLines()
      expect(completed?.data.jobs).toMatchObject([{ id: 'job_1' }])
      expect(active?.data.jobs).toEqual([])
    })

    it('exits 2 for an unknown status', async () => {
      const code = await runListAction({ status: 'completed,bogus', outputFormat: 'human', open })
      expect(code).toBe(2)
      expect(err()).toBe('Error: Unknown status "bogus"\n')
    })
  })

  describe('watch', () => {
    it('prints the remaining events of a finished job and exits', async () => {
      await startJob(2)

      const code = await runWatchAction({ jobId: 'job_1', sinceSequence: 4, pollIntervalMs: 10, outputFormat: 'human', open })

      expect(code).toBe(0)
      const lines = out().trimEnd().split('\n')
      expect(lines.map((line) => line.split(' ').slice(0, 2).join(' '))).toEqual(['#5 pass_completed', '#6 job_completed'])
    })

    it('exits at once when nothing follows the given sequence', async () => {
      await startJob(1)

      const code = await runWatchAction({ jobId: 'job_1', sinceSequence: 4, pollIntervalMs: 10, outputFormat: 'json', open })

      expect(code).toBe(0)
      expect(out()).toBe('')
    })

    it('stops when aborted', async () => {
      const jobId = seedPendingJob()
      const controller = new AbortController()
      controller.abort()

      const code = await runWatchAction({
        jobId,
        sinceSequence: 0,
        pollIntervalMs: 10,
        outputFormat: 'human',
        open,
        signal: controller.signal,
      })

      expect(code).toBe(0)
      expect(out()).toBe('')
    })
  })

  describe('diff', () => {
    it('diffs two passes of a refined file', async () => {
      await startJob(2)

      const code = await runDiffAction({ fileId: 'doc-1', fromPass: 0, toPass: 2, outputFormat: 'json', open })

      expect(code).toBe(0)
      expect(jsonLines()[0]?.data).toMatchObject({ fileId: 'doc-1', fromPass: 0, toPass: 2 })
    })

    it('exits 2 when a pass has no snapshot', async () => {
      await startJob(1)

      const code = await runDiffAction({ fileId: 'doc-1', fromPass: 0, toPass: 5, outputFormat: 'human', open })
      expect(code).toBe(2)
    })
  })

  describe('cancel', () => {
    it('cancels a pending job at once', async () => {
      const jobId = seedPendingJob()

      const code = await runCancelAction({ jobId, reason: 'wrong file', outputFormat: 'human', open })

      expect(code).toBe(0)
      expect(out()).toBe(`Job ${jobId} cancelled.\n`)
    })

    it('exits 1 for a completed job', async () => {
      await startJob(1)

      const code = await runCancelAction({ jobId: 'job_1', outputFormat: 'human', open })

      expect(code).toBe(1)
      expect(err()).toBe('Error: Invalid transition "cancel" from status "completed": job already finished\n')
    })
  })

  describe('retry', () => {
    it('re-runs a failed job as a new job', async () => {
      refiner.setHandler(() => {
        throw new Error('model unavailable')
      })
      await runStartAction({ fileId: 'doc-1', passes: 1, model: 'test-model', outputFormat: 'human', open })
      refiner.setHandler((req) => `${req.content} ok`)
      clearOut()

      const code = await runRetryAction({ jobId: 'job_1', follow: false, outputFormat: 'json', open })

      expect(code).toBe(0)
      const lines = jsonLines()
      expect(lines[0]?.data).toMatchObject({ retryOf: 'job_1', job: { id: 'job_2', metadata: { retryOf: 'job_1' } } })
      expect(lines[1]?.data.job).toMatchObject({ id: 'job_2', status: 'completed' })
    })
  })

  describe('recover', () => {
    it('requeues a job left pending and drives it', async () => {
      const jobId = seedPendingJob()

      const code = await runRecoverAction({ outputFormat: 'human', open })

      expect(code).toBe(0)
      expect(out()).toBe(
        'Recovery: resumed=0 requeued=1 failed=0 skipped=0\n' + `  ${jobId}  requeued  pending at startup\n`,
      )
      clearOut()
      await runStatusAction({ jobId, showEvents: false, outputFormat: 'human', open })
      expect(out().split('\n')[0]).toBe(`Job ${jobId}  Status: completed  Pass: 1/1`)
    })
  })
})
