/**
 * SocketGateway driven through an in-memory connection.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createRedraftEngine } from '../../core/engine-impl.js'
import type { RedraftEngine } from '../../core/engine.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { ManualClock, SequentialIdGenerator } from '../../modules/collaborators/clock.js'
import { createLogger } from '../../utils/logger.js'
import { FakeFileSource, FakeRefiner, createGate } from '../../../test/helpers/fakes.js'
import { SocketGateway } from '../socket-gateway.js'
import type { AttachAck, GatewayConnection, GatewayMessage } from '../socket-gateway.js'

class FakeConnection implements GatewayConnection {
  readonly sent: GatewayMessage[] = []
  private _attach: (payload: unknown, ack?: (response: AttachAck) => void) => void = () => undefined
  private _detach: (payload: unknown) => void = () => undefined
  private _disconnect: (reason: string) => void = () => undefined

  constructor(readonly id: string) {}

  send(message: GatewayMessage): void {
    this.sent.push(message)
  }

  onAttach(handler: (payload: unknown, ack?: (response: AttachAck) => void) => void): void {
    this._attach = handler
  }

  onDetach(handler: (payload: unknown) => void): void {
    this._detach = handler
  }

  onDisconnect(handler: (reason: string) => void): void {
    this._disconnect = handler
  }

  attach(payload: unknown): AttachAck | undefined {
    let response: AttachAck | undefined
    this._attach(payload, (ack) => {
      response = ack
    })
    return response
  }

  detach(payload: unknown): void {
    this._detach(payload)
  }

  disconnect(reason = 'client namespace disconnect'): void {
    this._disconnect(reason)
  }

  events(): string[] {
    return this.sent.map((message) => message.event)
  }
}

const jobBody = { fileId: 'doc-1', fileName: 'doc-1.md', totalPasses: 1, model: 'test-model' }

describe('SocketGateway', () => {
  let engine: RedraftEngine
  let refiner: FakeRefiner
  let gateway: SocketGateway

  beforeEach(async () => {
    refiner = new FakeRefiner()
    engine = await createRedraftEngine({
      config: { ...DEFAULT_CONFIG, global: { log_level: 'silent', database_path: ':memory:' } },
      refiner,
      fileSource: new FakeFileSource({ 'doc-1': 'Only paragraph.' }),
      clock: new ManualClock('2024-06-01T12:00:00.000Z', 1000),
      ids: new SequentialIdGenerator(),
      enableWatchdog: false,
    })
    gateway = new SocketGateway({ engine, heartbeatIntervalMs: 0, logger: createLogger('test', { level: 'silent' }) })
  })

  afterEach(async () => {
    await engine.shutdown()
  })

  it('greets a new connection', () => {
    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)
    expect(conn.sent).toEqual([{ event: 'connected', payload: { socketId: 'sock-1' } }])
  })

  it('replays a finished job and ends the stream', async () => {
    const job = engine.startJob(jobBody)
    await engine.whenIdle()
    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)

    const ack = conn.attach({ jobId: job.id })
    expect(ack).toEqual({ ok: true, jobId: job.id, sinceSequence: 0 })

    await vi.waitFor(() => {
      expect(conn.events().at(-1)).toBe('stream-end')
    })
    expect(conn.events()).toEqual(['connected', 'job-event', 'job-event', 'job-event', 'job-event', 'stream-end'])
    expect(conn.sent.at(-1)).toEqual({
      event: 'stream-end',
      payload: { jobId: job.id, reason: 'terminal', lastSequence: 4 },
    })
    expect(gateway.activeFeeds).toBe(0)
  })

  it('starts after sinceSequence', async () => {
    const job = engine.startJob(jobBody)
    await engine.whenIdle()
    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)

    conn.attach({ jobId: job.id, sinceSequence: 2 })
    await vi.waitFor(() => {
      expect(conn.events().at(-1)).toBe('stream-end')
    })

    const sequences = conn.sent.flatMap((message) => (message.event === 'job-event' ? [message.payload.sequence] : []))
    expect(sequences).toEqual([3, 4])
  })

  it('rejects an attach for an unknown job', () => {
    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)

    const ack = conn.attach({ jobId: 'job_404' })

    expect(ack).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Job not found: job_404' })
    expect(conn.sent.at(-1)).toEqual({
      event: 'attach-error',
      payload: { jobId: 'job_404', error: 'NOT_FOUND', message: 'Job not found: job_404' },
    })
  })

  it('rejects a malformed attach payload', () => {
    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)

    const ack = conn.attach({ jobId: 'job_1', sinceSequence: -3 })

    expect(ack).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' })
    expect(gateway.activeFeeds).toBe(0)
  })

  it('stops every feed when the client disconnects', async () => {
    const started = createGate()
    const release = createGate()
    refiner.setHandler(async (req) => {
      started.open()
      await release.promise
      return `${req.content} refined`
    })
    const job = engine.startJob(jobBody)
    await started.promise

    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)
    conn.attach({ jobId: job.id })
    expect(gateway.activeFeeds).toBe(1)

    conn.disconnect()
    expect(gateway.activeFeeds).toBe(0)

    release.open()
    await engine.whenIdle()
  })

  it('ends a feed on detach with reason cancelled', async () => {
    const started = createGate()
    const release = createGate()
    refiner.setHandler(async (req) => {
      started.open()
      await release.promise
      return `${req.content} refined`
    })
    const job = engine.startJob(jobBody)
    await started.promise

    const conn = new FakeConnection('sock-1')
    gateway.handleConnection(conn)
    conn.attach({ jobId: job.id })
    conn.detach({ jobId: job.id })

    await vi.waitFor(() => {
      expect(conn.events().at(-1)).toBe('stream-end')
    })
    const end = conn.sent.at(-1)
    expect(end?.event === 'stream-end' ? end.payload.reason : undefined).toBe('cancelled')

    release.open()
    await engine.whenIdle()
  })
})
