/**
 * Server-Sent Events stream of one job's events.
 */

import type { ServerResponse } from 'node:http'
import type { JobEventSubscription } from '../modules/broadcaster/types.js'
import { pumpSubscription, sseFrame, sseHeartbeat, sseRetry } from '../modules/broadcaster/framing.js'
import type { PumpResult } from '../modules/broadcaster/framing.js'
import type { Logger } from '../utils/logger.js'

export interface SseStreamOptions {
  /** Reconnect delay sent to EventSource clients */
  retryMs: number
  heartbeatIntervalMs: number
  logger: Logger
}

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const

/**
 * Write the subscription to `res` until the job reaches a terminal state,
 * the subscriber is dropped, or the client goes away. Ends the response.
 */
export async function streamSse(
  subscription: JobEventSubscription,
  res: ServerResponse,
  options: SseStreamOptions,
): Promise<PumpResult> {
  const log = options.logger
  res.writeHead(200, SSE_HEADERS)
  res.write(sseRetry(options.retryMs))

  const onClose = (): void => {
    subscription.cancel()
  }
  res.on('close', onClose)

  log.debug({ jobId: subscription.jobId, subscriptionId: subscription.id }, 'SSE client attached')
  try {
    const result = await pumpSubscription(
      subscription,
      (item) => {
        res.write(sseFrame(item))
      },
      {
        heartbeatIntervalMs: options.heartbeatIntervalMs,
        onHeartbeat: () => {
          res.write(sseHeartbeat())
        },
      },
    )
    log.debug({ jobId: subscription.jobId, ...result }, 'SSE stream ended')
    return result
  } finally {
    res.off('close', onClose)
    res.end()
  }
}
