/**
 * Broadcaster — fans durable job events out to live subscriptions.
 */

import type { BaseService } from '../../core/di.js'
import type { JobEvent, JobId } from '../../core/types.js'
import type { JobEventSubscription } from './types.js'

export interface Broadcaster extends BaseService {
  /**
   * Deliver an event that has already been committed to the store.
   * Never blocks; a slow subscriber is dropped rather than waited for.
   */
  publish(event: JobEvent): void

  /**
   * Open a catch-up-then-live feed of events with sequence > sinceSequence.
   * An unknown job surfaces as NotFoundError on the first pull.
   */
  subscribe(jobId: JobId, sinceSequence?: number): JobEventSubscription

  /** Open subscriptions, for one job or overall */
  subscriberCount(jobId?: JobId): number

  /** End every open subscription */
  closeAll(): void
}
