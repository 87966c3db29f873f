/**
 * HTTP API over a RedraftEngine.
 *
 * Routes:
 *   POST /jobs                      start a job
 *   GET  /jobs                      list jobs
 *   GET  /jobs/:id                  poll one job
 *   GET  /jobs/:id/events?since=N   SSE feed, ends when the job is terminal
 *   POST /jobs/:id/cancel           request cancellation
 *   POST /jobs/:id/retry            start a new job from a failed/cancelled one
 *   GET  /files/:fileId/diff        diff two pass snapshots (?from=&to=)
 *   GET  /health
 */

import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import type { RedraftEngine } from '../core/engine.js'
import { childLogger, createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'
import { errorResponse } from './error-response.js'
import {
  CancelBodySchema,
  DiffQuerySchema,
  EventsHeadersSchema,
  EventsQuerySchema,
  FileParamsSchema,
  JobParamsSchema,
  ListJobsQuerySchema,
  StartJobRequestSchema,
  parseOrThrow,
} from './schemas.js'
import { streamSse } from './sse.js'

export interface ServerAppOptions {
  engine: RedraftEngine
  /** SSE/WebSocket heartbeat; 0 disables it */
  heartbeatIntervalMs: number
  /** @default 3000 */
  sseRetryMs?: number
  logger?: Logger
}

export function buildServerApp(options: ServerAppOptions): FastifyInstance {
  const { engine } = options
  const logger = options.logger ?? createLogger('server')
  const sseRetryMs = options.sseRetryMs ?? 3000

  const app = Fastify({ logger: false })

  app.setErrorHandler((err, request, reply) => {
    const { status, body } = errorResponse(err)
    if (status >= 500) {
      logger.error({ err, method: request.method, url: request.url }, 'Request failed')
    } else {
      logger.debug({ method: request.method, url: request.url, error: body.error }, body.message)
    }
    void reply.status(status).send(body)
  })

  app.addHook('onResponse', async (request, reply) => {
    logger.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request completed')
  })

  app.get('/health', async () => {
    return { status: engine.isReady ? 'ok' : 'starting', ...engine.status() }
  })

  app.post('/jobs', async (request, reply) => {
    const body = parseOrThrow(StartJobRequestSchema, request.body ?? {}, 'job request')
    const job = engine.startJob(body)
    return reply.status(201).send(job)
  })

  app.get('/jobs', async (request) => {
    const query = parseOrThrow(ListJobsQuerySchema, request.query, 'job filter')
    return { jobs: engine.listJobs(query) }
  })

  app.get('/jobs/:id', async (request) => {
    const { id } = parseOrThrow(JobParamsSchema, request.params, 'job id')
    return engine.getJob(id)
  })

  app.get('/jobs/:id/events', async (request, reply) => {
    const { id } = parseOrThrow(JobParamsSchema, request.params, 'job id')
    const { since } = parseOrThrow(EventsQuerySchema, request.query, 'event query')
    const headers = parseOrThrow(EventsHeadersSchema, request.headers, 'event headers')
    const sinceSequence = headers['last-event-id'] ?? since

    // Unknown jobs get a JSON 404 before the stream opens
    const subscription = engine.attach({ jobId: id, sinceSequence })

    reply.hijack()
    await streamSse(subscription, reply.raw, {
      retryMs: sseRetryMs,
      heartbeatIntervalMs: options.heartbeatIntervalMs,
      logger: childLogger(logger, { jobId: id }),
    })
  })

  app.post('/jobs/:id/cancel', async (request, reply) => {
    const { id } = parseOrThrow(JobParamsSchema, request.params, 'job id')
    const { reason } = parseOrThrow(CancelBodySchema, request.body ?? {}, 'cancel request')
    const job = engine.cancel(id, reason)
    return reply.status(202).send(job)
  })

  app.post('/jobs/:id/retry', async (request, reply) => {
    const { id } = parseOrThrow(JobParamsSchema, request.params, 'job id')
    const job = engine.retryJob(id)
    return reply.status(201).send(job)
  })

  app.get('/files/:fileId/diff', async (request) => {
    const { fileId } = parseOrThrow(FileParamsSchema, request.params, 'file id')
    const { from, to } = parseOrThrow(DiffQuerySchema, request.query, 'diff query')
    return engine.diff({ fileId, fromPass: from, toPass: to })
  })

  return app
}
