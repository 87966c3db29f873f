/**
 * Wire framing for subscription streams, shared by the SSE, WebSocket and
 * CLI transports.
 *
 * SSE wire format for an event:
 *   id: <sequence>\n
 *   event: job-event\n
 *   data: <json>\n
 *   \n
 */

import type { JobEvent } from '../../core/types.js'
import type { JobEventSubscription, StreamEndReason, StreamItem } from './types.js'

export const SSE_EVENT_NAME = 'job-event'
export const SSE_RESYNC_NAME = 'resync-required'

export type WsMessage =
  | { event: 'job-event'; payload: JobEvent }
  | { event: 'resync-required'; payload: { jobId: string; lastSequence: number } }

/** One NDJSON line, newline included */
export function ndjsonLine(item: StreamItem): string {
  return JSON.stringify(item) + '\n'
}

export function sseFrame(item: StreamItem): string {
  if (item.type === 'event') {
    return `id: ${String(item.event.sequence)}\nevent: ${SSE_EVENT_NAME}\ndata: ${JSON.stringify(item.event)}\n\n`
  }
  const data = JSON.stringify({ jobId: item.jobId, lastSequence: item.lastSequence })
  return `event: ${SSE_RESYNC_NAME}\ndata: ${data}\n\n`
}

/** Reconnect delay hint for EventSource clients */
export function sseRetry(ms: number): string {
  return `retry: ${String(ms)}\n\n`
}

/** Comment frame; ignored by EventSource, keeps proxies from timing out */
export function sseHeartbeat(): string {
  return ': heartbeat\n\n'
}

export function wsMessage(item: StreamItem): WsMessage {
  if (item.type === 'event') {
    return { event: 'job-event', payload: item.event }
  }
  return { event: 'resync-required', payload: { jobId: item.jobId, lastSequence: item.lastSequence } }
}

// ---------------------------------------------------------------------------
// pumpSubscription
// ---------------------------------------------------------------------------

export interface PumpOptions {
  /** 0 or undefined disables the heartbeat */
  heartbeatIntervalMs?: number
  onHeartbeat?: () => void
}

export interface PumpResult {
  reason: StreamEndReason
  lastSequence: number
  delivered: number
}

/**
 * Drive a pull subscription into a push sink until it ends.
 *
 * A `send` that throws cancels the subscription and rethrows.
 */
export async function pumpSubscription(
  subscription: JobEventSubscription,
  send: (item: StreamItem) => void | Promise<void>,
  options: PumpOptions = {},
): Promise<PumpResult> {
  let heartbeat: ReturnType<typeof setInterval> | null = null
  const { heartbeatIntervalMs, onHeartbeat } = options
  if (heartbeatIntervalMs !== undefined && heartbeatIntervalMs > 0 && onHeartbeat !== undefined) {
    heartbeat = setInterval(onHeartbeat, heartbeatIntervalMs)
  }

  let delivered = 0
  try {
    for await (const item of subscription) {
      await send(item)
      delivered++
    }
  } finally {
    if (heartbeat !== null) clearInterval(heartbeat)
    subscription.cancel()
  }

  return {
    reason: subscription.endReason ?? 'cancelled',
    lastSequence: subscription.lastSequence,
    delivered,
  }
}
