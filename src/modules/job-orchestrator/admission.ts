/**
 * AdmissionQueue — bounded FIFO promise pool.
 *
 * At most `limit` tasks run at once; the rest wait in submission order.
 * Closing the queue stops admission but lets running tasks finish.
 */

export type AdmissionTask<K> = (key: K) => Promise<void>

export class AdmissionQueue<K> {
  private readonly _waiting: K[] = []
  private readonly _running = new Map<K, Promise<void>>()
  private readonly _idleWaiters: (() => void)[] = []
  private _closed = false

  constructor(
    private readonly _limit: number,
    private readonly _task: AdmissionTask<K>,
    private readonly _onError: (key: K, err: unknown) => void,
  ) {}

  /**
   * Queue `key` unless it is already waiting or running.
   * @returns its 1-based queue position, or 0 when it started immediately or was already known
   */
  enqueue(key: K): number {
    if (this._closed || this.has(key)) return 0
    this._waiting.push(key)
    const position = this._waiting.length
    this._pump()
    return this._waiting.includes(key) ? position : 0
  }

  /** Remove a waiting key. Running tasks are not affected. */
  remove(key: K): boolean {
    const index = this._waiting.indexOf(key)
    if (index === -1) return false
    this._waiting.splice(index, 1)
    this._settleIdle()
    return true
  }

  has(key: K): boolean {
    return this._running.has(key) || this._waiting.includes(key)
  }

  isRunning(key: K): boolean {
    return this._running.has(key)
  }

  get running(): K[] {
    return [...this._running.keys()]
  }

  get waiting(): K[] {
    return [...this._waiting]
  }

  get closed(): boolean {
    return this._closed
  }

  /** Stop admitting; waiting keys are dropped and returned */
  close(): K[] {
    this._closed = true
    const dropped = this._waiting.splice(0)
    this._settleIdle()
    return dropped
  }

  /** Resolves once nothing is running or waiting */
  whenIdle(): Promise<void> {
    if (this._running.size === 0 && this._waiting.length === 0) return Promise.resolve()
    return new Promise((resolve) => {
      this._idleWaiters.push(resolve)
    })
  }

  private _pump(): void {
    while (!this._closed && this._running.size < this._limit) {
      const key = this._waiting.shift()
      if (key === undefined) break
      const p = this._task(key)
        .catch((err: unknown) => {
          this._onError(key, err)
        })
        .finally(() => {
          this._running.delete(key)
          this._pump()
          this._settleIdle()
        })
      this._running.set(key, p)
    }
  }

  private _settleIdle(): void {
    if (this._running.size > 0 || this._waiting.length > 0) return
    for (const resolve of this._idleWaiters.splice(0)) resolve()
  }
}
