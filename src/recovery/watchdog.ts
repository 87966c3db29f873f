/**
 * StaleJobWatchdog — periodic sweep for `processing` jobs nobody is driving.
 *
 * A job whose driver died keeps `processing` with an `updated_at` that stops
 * moving. Every `intervalMs` the watchdog hands jobs quiet for longer than
 * `staleThresholdMs` to crash recovery. Jobs driven by this process are
 * skipped by recovery itself.
 */

import type { BaseService } from '../core/di.js'
import type { Clock } from '../modules/collaborators/types.js'
import { createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'
import type { CrashRecoveryManager, RecoveryResult } from './crash-recovery.js'

export interface StaleJobWatchdog extends BaseService {
  /** Run one sweep now */
  sweep(): RecoveryResult
  readonly running: boolean
}

export interface IntervalWatchdogOptions {
  recovery: Pick<CrashRecoveryManager, 'recoverStale'>
  clock: Clock
  staleThresholdMs: number
  intervalMs: number
  logger?: Logger
}

export class IntervalWatchdog implements StaleJobWatchdog {
  private readonly _recovery: Pick<CrashRecoveryManager, 'recoverStale'>
  private readonly _clock: Clock
  private readonly _staleThresholdMs: number
  private readonly _intervalMs: number
  private readonly _logger: Logger
  private _timer: ReturnType<typeof setInterval> | null = null

  constructor(options: IntervalWatchdogOptions) {
    this._recovery = options.recovery
    this._clock = options.clock
    this._staleThresholdMs = options.staleThresholdMs
    this._intervalMs = options.intervalMs
    this._logger = options.logger ?? createLogger('watchdog')
  }

  get running(): boolean {
    return this._timer !== null
  }

  async initialize(): Promise<void> {
    if (this._timer !== null) return
    this._timer = setInterval(() => {
      try {
        this.sweep()
      } catch (err) {
        this._logger.error({ err }, 'Watchdog sweep failed')
      }
    }, this._intervalMs)
    this._timer.unref()
    this._logger.debug({ intervalMs: this._intervalMs, staleThresholdMs: this._staleThresholdMs }, 'Watchdog started')
  }

  async shutdown(): Promise<void> {
    if (this._timer !== null) {
      clearInterval(this._timer)
      this._timer = null
    }
  }

  sweep(): RecoveryResult {
    const cutoff = new Date(this._clock.now().getTime() - this._staleThresholdMs)
    return this._recovery.recoverStale(cutoff)
  }
}
