/**
 * Catch-up-then-live subscription over one job's event log.
 *
 * The live listener is attached before the first store read, so an event
 * appended during replay is either read from the store or found in the live
 * buffer. Delivery skips anything at or below `lastSequence` and goes back
 * to the store whenever the live buffer skips ahead.
 */

import { isTerminalEventType, isTerminalStatus } from '../../core/types.js'
import type { JobEvent, JobId } from '../../core/types.js'
import type { JobStore } from '../job-store/job-store.js'
import type { JobEventSubscription, StreamEndReason, StreamItem } from './types.js'

export type SubscriptionStore = Pick<JobStore, 'getJob' | 'listEvents'>

export interface SubscriptionHooks {
  /** Called once when the stream ends, for any reason */
  onClose(subscription: JobEventSubscriptionImpl): void
  /** Called when the live buffer overflows */
  onOverflow(subscription: JobEventSubscriptionImpl): void
}

export interface SubscriptionInit {
  id: string
  jobId: JobId
  sinceSequence: number
  bufferSize: number
  pageSize: number
  store: SubscriptionStore
  hooks: SubscriptionHooks
}

type Phase = 'catchup' | 'live'

export class JobEventSubscriptionImpl implements JobEventSubscription {
  readonly id: string
  readonly jobId: JobId

  private _lastSequence: number
  private _endReason: StreamEndReason | null = null
  private _phase: Phase = 'catchup'
  private _verified = false
  private _overflowed = false
  private readonly _outbox: JobEvent[] = []
  private readonly _live: JobEvent[] = []
  private _wake: (() => void) | null = null

  private readonly _bufferSize: number
  private readonly _pageSize: number
  private readonly _store: SubscriptionStore
  private readonly _hooks: SubscriptionHooks

  constructor(init: SubscriptionInit) {
    this.id = init.id
    this.jobId = init.jobId
    this._lastSequence = init.sinceSequence
    this._bufferSize = init.bufferSize
    this._pageSize = init.pageSize
    this._store = init.store
    this._hooks = init.hooks
  }

  get lastSequence(): number {
    return this._lastSequence
  }

  get endReason(): StreamEndReason | null {
    return this._endReason
  }

  get closed(): boolean {
    return this._endReason !== null
  }

  /** Number of live events waiting to be pulled */
  get buffered(): number {
    return this._live.length
  }

  /**
   * Live delivery from the broadcaster. Never blocks; drops the live feed
   * when the buffer is full.
   */
  push(event: JobEvent): void {
    if (this.closed || this._overflowed) return
    if (this._live.length >= this._bufferSize) {
      this._overflowed = true
      this._live.length = 0
      this._hooks.onOverflow(this)
      this._notify()
      return
    }
    this._live.push(event)
    this._notify()
  }

  cancel(): void {
    this._finish('cancelled')
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamItem> {
    return {
      next: () => this._next(),
      return: async (): Promise<IteratorResult<StreamItem>> => {
        this.cancel()
        return { done: true, value: undefined }
      },
    }
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async _next(): Promise<IteratorResult<StreamItem>> {
    if (!this._verified) {
      try {
        this._store.getJob(this.jobId)
      } catch (err) {
        this._finish('cancelled')
        throw err
      }
      this._verified = true
    }

    for (;;) {
      if (this.closed) return { done: true, value: undefined }

      const ready = this._outbox.shift()
      if (ready !== undefined) {
        if (ready.sequence <= this._lastSequence) {
          // A subscriber that started past the end still ends with the job
          if (isTerminalEventType(ready.eventType)) this._finish('terminal')
          continue
        }
        if (ready.sequence > this._lastSequence + 1) {
          // Gap between what was read and what was delivered: read it again
          this._outbox.length = 0
          this._phase = 'catchup'
          continue
        }
        return { done: false, value: this._deliver(ready) }
      }

      if (this._overflowed) {
        const item: StreamItem = { type: 'resync_required', jobId: this.jobId, lastSequence: this._lastSequence }
        this._finish('resync')
        return { done: false, value: item }
      }

      if (this._phase === 'catchup') {
        const page = this._store.listEvents(this.jobId, this._lastSequence, this._pageSize)
        if (page.length > 0) {
          this._outbox.push(...page)
          continue
        }
        this._phase = 'live'
        if (isTerminalStatus(this._store.getJob(this.jobId).status)) {
          // The terminal event is committed with the status; one last read picks it up
          const rest = this._store.listEvents(this.jobId, this._lastSequence)
          if (rest.length === 0) {
            this._finish('terminal')
            return { done: true, value: undefined }
          }
          this._outbox.push(...rest)
        }
        continue
      }

      const live = this._live.shift()
      if (live !== undefined) {
        this._outbox.push(live)
        continue
      }

      await new Promise<void>((resolve) => {
        this._wake = resolve
      })
    }
  }

  private _deliver(event: JobEvent): StreamItem {
    this._lastSequence = event.sequence
    if (isTerminalEventType(event.eventType)) {
      this._finish('terminal')
    }
    return { type: 'event', event }
  }

  private _finish(reason: StreamEndReason): void {
    if (this._endReason !== null) return
    this._endReason = reason
    this._outbox.length = 0
    this._live.length = 0
    this._hooks.onClose(this)
    this._notify()
  }

  private _notify(): void {
    const wake = this._wake
    this._wake = null
    wake?.()
  }
}
