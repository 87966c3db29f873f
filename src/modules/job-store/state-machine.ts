/**
 * Job state machine.
 *
 *   pending ──start──▶ processing ──advance──▶ processing
 *      │                   │
 *      │                   ├──complete──▶ completed
 *      │                   ├──fail──────▶ failed
 *      └──────cancel───────┴──cancel────▶ cancelled
 *
 * `applyTransition` is pure: it validates a transition against the job's
 * current status and pass and returns the job as it would look afterwards.
 * The store persists the result with a compare-and-set.
 */

import { InvalidTransitionError } from '../../core/errors.js'
import type { Job, JobStatus, StructuredValue } from '../../core/types.js'

export type JobTransition =
  | { type: 'start' }
  | { type: 'advance'; passNumber: number }
  | { type: 'complete'; result: StructuredValue | null }
  | { type: 'fail'; errorMessage: string }
  | { type: 'cancel'; reason?: string }

export type JobTransitionType = JobTransition['type']

const ALLOWED_FROM: Record<JobTransitionType, readonly JobStatus[]> = {
  start: ['pending'],
  advance: ['processing'],
  complete: ['processing'],
  fail: ['processing'],
  cancel: ['pending', 'processing'],
}

export function canApply(status: JobStatus, type: JobTransitionType): boolean {
  return ALLOWED_FROM[type].includes(status)
}

/**
 * @throws {InvalidTransitionError} when the transition is not legal for `job`
 */
export function applyTransition(job: Job, transition: JobTransition, now: string): Job {
  const reject = (reason: string): never => {
    throw new InvalidTransitionError(job.status, transition.type, reason, { jobId: job.id })
  }

  if (!canApply(job.status, transition.type)) {
    reject(`allowed only from ${ALLOWED_FROM[transition.type].join(' or ')}`)
  }

  switch (transition.type) {
    case 'start':
      return { ...job, status: 'processing', updatedAt: now }

    case 'advance': {
      const expected = job.currentPass + 1
      if (transition.passNumber !== expected) {
        reject(`expected pass ${String(expected)}, got ${String(transition.passNumber)}`)
      }
      if (transition.passNumber >= job.totalPasses) {
        reject(`pass ${String(transition.passNumber)} is the final pass; use complete`)
      }
      return { ...job, currentPass: transition.passNumber, updatedAt: now }
    }

    case 'complete':
      if (job.currentPass + 1 !== job.totalPasses) {
        reject(`pass ${String(job.currentPass + 1)} of ${String(job.totalPasses)} is not the final pass`)
      }
      return {
        ...job,
        status: 'completed',
        currentPass: job.totalPasses,
        completedAt: now,
        errorMessage: null,
        result: transition.result,
        updatedAt: now,
      }

    case 'fail':
      if (transition.errorMessage.trim() === '') {
        reject('error message must not be empty')
      }
      return {
        ...job,
        status: 'failed',
        completedAt: now,
        errorMessage: transition.errorMessage,
        updatedAt: now,
      }

    case 'cancel':
      return { ...job, status: 'cancelled', completedAt: now, updatedAt: now }
  }
}
