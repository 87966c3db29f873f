/**
 * Types for the broadcaster module.
 */

import type { JobEvent, JobId } from '../../core/types.js'

/** One item of a subscription stream */
export type StreamItem =
  | { type: 'event'; event: JobEvent }
  | { type: 'resync_required'; jobId: JobId; lastSequence: number }

/** Why a subscription stream ended */
export type StreamEndReason = 'terminal' | 'resync' | 'cancelled'

/**
 * Pull-based live feed of one job's events, starting after `sinceSequence`.
 *
 * Single consumer: iterate it once with `for await`.
 */
export interface JobEventSubscription extends AsyncIterable<StreamItem> {
  readonly id: string
  readonly jobId: JobId
  /** Sequence of the last event delivered to the consumer */
  readonly lastSequence: number
  /** Set once the stream has ended */
  readonly endReason: StreamEndReason | null
  /** Stop the stream; a pending pull resolves as done */
  cancel(): void
}

export interface BroadcasterOptions {
  /** Live events a subscriber may have queued before it is dropped */
  subscriberBufferSize: number
  /** Events read from the store per catch-up query */
  replayPageSize: number
}
