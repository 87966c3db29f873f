/**
 * Job signal queue query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export type JobSignal = 'cancel'

export interface JobSignalRow {
  id: number
  job_id: string
  signal: JobSignal
  reason: string | null
  created_at: string
  processed_at: string | null
}

export function insertJobSignal(
  db: BetterSqlite3Database,
  jobId: string,
  signal: JobSignal,
  reason: string | null,
  createdAt: string,
): void {
  db.prepare('INSERT INTO job_signals (job_id, signal, reason, created_at) VALUES (?, ?, ?, ?)').run(
    jobId,
    signal,
    reason,
    createdAt,
  )
}

/** Oldest unprocessed signal of the given kind for a job */
export function getPendingJobSignal(
  db: BetterSqlite3Database,
  jobId: string,
  signal: JobSignal,
): JobSignalRow | undefined {
  return db
    .prepare(
      'SELECT * FROM job_signals WHERE job_id = ? AND signal = ? AND processed_at IS NULL ORDER BY id ASC LIMIT 1',
    )
    .get(jobId, signal) as JobSignalRow | undefined
}

export function markJobSignalsProcessed(
  db: BetterSqlite3Database,
  jobId: string,
  signal: JobSignal,
  processedAt: string,
): number {
  return db
    .prepare('UPDATE job_signals SET processed_at = ? WHERE job_id = ? AND signal = ? AND processed_at IS NULL')
    .run(processedAt, jobId, signal).changes
}
