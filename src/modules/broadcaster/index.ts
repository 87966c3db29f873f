/**
 * Broadcaster module — barrel export.
 */

export type { Broadcaster } from './broadcaster.js'
export { BroadcasterImpl, createBroadcaster } from './broadcaster-impl.js'
export type { BroadcasterDeps } from './broadcaster-impl.js'
export type { JobEventSubscription, StreamItem, StreamEndReason, BroadcasterOptions } from './types.js'
export {
  ndjsonLine,
  sseFrame,
  sseRetry,
  sseHeartbeat,
  wsMessage,
  pumpSubscription,
  SSE_EVENT_NAME,
  SSE_RESYNC_NAME,
} from './framing.js'
export type { PumpOptions, PumpResult, WsMessage } from './framing.js'
