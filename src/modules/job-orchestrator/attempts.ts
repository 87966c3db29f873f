/**
 * Attempt bookkeeping derived from a job's event log.
 */

import type { JobEvent } from '../../core/types.js'

/** Failed attempts already recorded for `passNumber` */
export function countFailedAttempts(events: readonly JobEvent[], passNumber: number): number {
  return events.filter((event) => event.eventType === 'pass_failed' && event.passNumber === passNumber).length
}

/** Backoff before attempt `attempt + 1`: base * 2^(attempt-1) */
export function backoffDelay(baseMs: number, attempt: number): number {
  return baseMs * 2 ** Math.max(0, attempt - 1)
}
