/**
 * SocketGateway — job event feeds over socket.io.
 *
 * Client → server:
 *   attach { jobId, sinceSequence? }   (ack: AttachAck)
 *   detach { jobId }
 * Server → client:
 *   connected, job-event, resync-required, heartbeat, stream-end, attach-error
 *
 * One socket may follow several jobs; re-attaching to a job replaces the
 * previous feed. All feeds stop when the socket disconnects.
 */

import type { Server, Socket } from 'socket.io'
import type { RedraftEngine } from '../core/engine.js'
import { RedraftError } from '../core/errors.js'
import type { JobEvent, JobId } from '../core/types.js'
import type { JobEventSubscription, StreamEndReason } from '../modules/broadcaster/types.js'
import { pumpSubscription, wsMessage } from '../modules/broadcaster/framing.js'
import { childLogger, createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'
import { errorMessage } from '../utils/helpers.js'
import { AttachPayloadSchema, DetachPayloadSchema, parseOrThrow } from './schemas.js'

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export interface StreamEndPayload {
  jobId: JobId
  reason: StreamEndReason
  lastSequence: number
}

export interface GatewayErrorPayload {
  jobId: JobId | null
  error: string
  message: string
}

export type AttachAck =
  | { ok: true; jobId: JobId; sinceSequence: number }
  | { ok: false; error: string; message: string }

export interface ServerToClientEvents {
  connected: (payload: { socketId: string }) => void
  'job-event': (payload: JobEvent) => void
  'resync-required': (payload: { jobId: JobId; lastSequence: number }) => void
  heartbeat: (payload: { jobId: JobId }) => void
  'stream-end': (payload: StreamEndPayload) => void
  'attach-error': (payload: GatewayErrorPayload) => void
}

export interface ClientToServerEvents {
  attach: (payload: unknown, ack?: (response: AttachAck) => void) => void
  detach: (payload: unknown) => void
}

export type GatewayMessage =
  | { event: 'connected'; payload: { socketId: string } }
  | { event: 'job-event'; payload: JobEvent }
  | { event: 'resync-required'; payload: { jobId: JobId; lastSequence: number } }
  | { event: 'heartbeat'; payload: { jobId: JobId } }
  | { event: 'stream-end'; payload: StreamEndPayload }
  | { event: 'attach-error'; payload: GatewayErrorPayload }

/**
 * What the gateway needs from one client connection. `fromSocket` adapts a
 * socket.io socket; tests drive the gateway with an in-memory one.
 */
export interface GatewayConnection {
  readonly id: string
  send(message: GatewayMessage): void
  onAttach(handler: (payload: unknown, ack?: (response: AttachAck) => void) => void): void
  onDetach(handler: (payload: unknown) => void): void
  onDisconnect(handler: (reason: string) => void): void
}

export type RedraftSocket = Socket<ClientToServerEvents, ServerToClientEvents>
export type RedraftSocketServer = Server<ClientToServerEvents, ServerToClientEvents>

export function fromSocket(socket: RedraftSocket): GatewayConnection {
  return {
    id: socket.id,
    send(message) {
      switch (message.event) {
        case 'connected':
          socket.emit('connected', message.payload)
          break
        case 'job-event':
          socket.emit('job-event', message.payload)
          break
        case 'resync-required':
          socket.emit('resync-required', message.payload)
          break
        case 'heartbeat':
          socket.emit('heartbeat', message.payload)
          break
        case 'stream-end':
          socket.emit('stream-end', message.payload)
          break
        case 'attach-error':
          socket.emit('attach-error', message.payload)
          break
      }
    },
    onAttach(handler) {
      socket.on('attach', handler)
    },
    onDetach(handler) {
      socket.on('detach', handler)
    },
    onDisconnect(handler) {
      socket.on('disconnect', handler)
    },
  }
}

// ---------------------------------------------------------------------------
// SocketGateway
// ---------------------------------------------------------------------------

export interface SocketGatewayOptions {
  engine: RedraftEngine
  heartbeatIntervalMs: number
  logger?: Logger
}

export class SocketGateway {
  private readonly _engine: RedraftEngine
  private readonly _heartbeatIntervalMs: number
  private readonly _logger: Logger
  private readonly _connections = new Map<string, Map<JobId, JobEventSubscription>>()

  constructor(options: SocketGatewayOptions) {
    this._engine = options.engine
    this._heartbeatIntervalMs = options.heartbeatIntervalMs
    this._logger = options.logger ?? createLogger('socket-gateway')
  }

  /** Serve every connection of a socket.io server */
  bind(io: RedraftSocketServer): void {
    io.on('connection', (socket) => {
      this.handleConnection(fromSocket(socket))
    })
  }

  /** Number of live feeds across all connections */
  get activeFeeds(): number {
    let total = 0
    for (const feeds of this._connections.values()) total += feeds.size
    return total
  }

  handleConnection(connection: GatewayConnection): void {
    const feeds = new Map<JobId, JobEventSubscription>()
    this._connections.set(connection.id, feeds)
    const log = childLogger(this._logger, { socketId: connection.id })
    log.info('Client connected')

    connection.send({ event: 'connected', payload: { socketId: connection.id } })

    connection.onAttach((payload, ack) => {
      this._attach(connection, feeds, log, payload, ack)
    })

    connection.onDetach((payload) => {
      const parsed = DetachPayloadSchema.safeParse(payload)
      if (!parsed.success) return
      feeds.get(parsed.data.jobId)?.cancel()
    })

    connection.onDisconnect((reason) => {
      log.info({ reason, feeds: feeds.size }, 'Client disconnected')
      for (const subscription of feeds.values()) subscription.cancel()
      feeds.clear()
      this._connections.delete(connection.id)
    })
  }

  private _attach(
    connection: GatewayConnection,
    feeds: Map<JobId, JobEventSubscription>,
    log: Logger,
    payload: unknown,
    ack: ((response: AttachAck) => void) | undefined,
  ): void {
    let subscription: JobEventSubscription
    let sinceSequence: number
    try {
      const request = parseOrThrow(AttachPayloadSchema, payload, 'attach request')
      sinceSequence = request.sinceSequence
      subscription = this._engine.attach({ jobId: request.jobId, sinceSequence })
    } catch (err) {
      const error = err instanceof RedraftError ? err.code : 'INTERNAL_ERROR'
      const message = errorMessage(err)
      const jobId = requestedJobId(payload)
      log.debug({ jobId, error }, `Attach rejected: ${message}`)
      connection.send({ event: 'attach-error', payload: { jobId, error, message } })
      ack?.({ ok: false, error, message })
      return
    }

    const jobId = subscription.jobId
    feeds.get(jobId)?.cancel()
    feeds.set(jobId, subscription)
    ack?.({ ok: true, jobId, sinceSequence })
    log.debug({ jobId, sinceSequence }, 'Client attached')

    pumpSubscription(
      subscription,
      (item) => {
        connection.send(wsMessage(item))
      },
      {
        heartbeatIntervalMs: this._heartbeatIntervalMs,
        onHeartbeat: () => {
          connection.send({ event: 'heartbeat', payload: { jobId } })
        },
      },
    )
      .then((result) => {
        if (feeds.get(jobId) === subscription) {
          feeds.delete(jobId)
        } else if (feeds.has(jobId)) {
          // replaced by a newer attach to the same job
          return
        }
        connection.send({
          event: 'stream-end',
          payload: { jobId, reason: result.reason, lastSequence: result.lastSequence },
        })
      })
      .catch((err: unknown) => {
        if (feeds.get(jobId) === subscription) feeds.delete(jobId)
        log.error({ err, jobId }, 'Job feed failed')
      })
  }
}

function requestedJobId(payload: unknown): JobId | null {
  if (typeof payload === 'object' && payload !== null && 'jobId' in payload && typeof payload.jobId === 'string') {
    return payload.jobId
  }
  return null
}
