/**
 * BroadcasterImpl — per-job subscription registry fed from the event bus.
 *
 * Architecture constraints:
 *  - Listens to `job:event` on the TypedEventBus; emitters publish only after
 *    the event is durable
 *  - publish() is synchronous and O(subscribers of the job)
 *  - A subscriber whose buffer overflows is dropped and told to resync;
 *    nobody else is affected
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { EngineEvents } from '../../core/event-bus.types.js'
import type { JobEvent, JobId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { IdGenerator } from '../collaborators/types.js'
import type { Broadcaster } from './broadcaster.js'
import { JobEventSubscriptionImpl } from './subscription.js'
import type { SubscriptionHooks, SubscriptionStore } from './subscription.js'
import type { BroadcasterOptions, JobEventSubscription } from './types.js'

export interface BroadcasterDeps {
  eventBus: TypedEventBus
  store: SubscriptionStore
  ids: IdGenerator
  options: BroadcasterOptions
  logger?: Logger
}

export class BroadcasterImpl implements Broadcaster {
  private readonly _eventBus: TypedEventBus
  private readonly _store: SubscriptionStore
  private readonly _ids: IdGenerator
  private readonly _options: BroadcasterOptions
  private readonly _logger: Logger
  private readonly _subscriptions = new Map<JobId, Map<string, JobEventSubscriptionImpl>>()
  private readonly _hooks: SubscriptionHooks
  private _listening = false

  private readonly _onJobEvent = ({ event }: EngineEvents['job:event']): void => {
    this.publish(event)
  }

  constructor(deps: BroadcasterDeps) {
    this._eventBus = deps.eventBus
    this._store = deps.store
    this._ids = deps.ids
    this._options = deps.options
    this._logger = deps.logger ?? createLogger('broadcaster')
    this._hooks = {
      onClose: (subscription) => {
        this._detach(subscription)
      },
      onOverflow: (subscription) => {
        this._logger.warn(
          { jobId: subscription.jobId, subscriptionId: subscription.id, lastSequence: subscription.lastSequence },
          'Subscriber buffer overflowed; requesting resync',
        )
        this._detach(subscription)
        this._eventBus.emit('subscriber:overflow', {
          jobId: subscription.jobId,
          subscriptionId: subscription.id,
          lastSequence: subscription.lastSequence,
        })
      },
    }
  }

  async initialize(): Promise<void> {
    if (this._listening) return
    this._eventBus.on('job:event', this._onJobEvent)
    this._listening = true
  }

  async shutdown(): Promise<void> {
    if (this._listening) {
      this._eventBus.off('job:event', this._onJobEvent)
      this._listening = false
    }
    this.closeAll()
  }

  publish(event: JobEvent): void {
    const subscribers = this._subscriptions.get(event.jobId)
    if (subscribers === undefined) return
    // Copy: a push may detach the subscriber on overflow
    for (const subscription of [...subscribers.values()]) {
      subscription.push(event)
    }
  }

  subscribe(jobId: JobId, sinceSequence = 0): JobEventSubscription {
    const subscription = new JobEventSubscriptionImpl({
      id: this._ids.next('sub'),
      jobId,
      sinceSequence: Math.max(0, Math.floor(sinceSequence)),
      bufferSize: this._options.subscriberBufferSize,
      pageSize: this._options.replayPageSize,
      store: this._store,
      hooks: this._hooks,
    })

    let subscribers = this._subscriptions.get(jobId)
    if (subscribers === undefined) {
      subscribers = new Map()
      this._subscriptions.set(jobId, subscribers)
    }
    subscribers.set(subscription.id, subscription)
    this._logger.debug({ jobId, subscriptionId: subscription.id, sinceSequence }, 'Subscriber attached')
    return subscription
  }

  subscriberCount(jobId?: JobId): number {
    if (jobId !== undefined) return this._subscriptions.get(jobId)?.size ?? 0
    let total = 0
    for (const subscribers of this._subscriptions.values()) total += subscribers.size
    return total
  }

  closeAll(): void {
    for (const subscribers of [...this._subscriptions.values()]) {
      for (const subscription of [...subscribers.values()]) {
        subscription.cancel()
      }
    }
  }

  private _detach(subscription: JobEventSubscriptionImpl): void {
    const subscribers = this._subscriptions.get(subscription.jobId)
    if (subscribers === undefined) return
    subscribers.delete(subscription.id)
    if (subscribers.size === 0) this._subscriptions.delete(subscription.jobId)
  }
}

export function createBroadcaster(deps: BroadcasterDeps): Broadcaster {
  return new BroadcasterImpl(deps)
}
