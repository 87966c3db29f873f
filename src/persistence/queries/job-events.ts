/**
 * Job event log query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface JobEventRow {
  id: string
  job_id: string
  sequence: number
  event_type: string
  pass_number: number | null
  message: string
  details_json: string
  created_at: string
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertJobEvent(db: BetterSqlite3Database, row: JobEventRow): void {
  db.prepare(`
    INSERT INTO job_events (id, job_id, sequence, event_type, pass_number, message, details_json, created_at)
    VALUES (@id, @job_id, @sequence, @event_type, @pass_number, @message, @details_json, @created_at)
  `).run(row)
}

/** Highest sequence recorded for a job, or 0 when the log is empty */
export function getMaxSequence(db: BetterSqlite3Database, jobId: string): number {
  const row = db
    .prepare('SELECT COALESCE(MAX(sequence), 0) AS max_sequence FROM job_events WHERE job_id = ?')
    .get(jobId) as { max_sequence: number }
  return row.max_sequence
}

/**
 * Events with sequence greater than `sinceSequence`, ascending.
 */
export function listJobEventRows(
  db: BetterSqlite3Database,
  jobId: string,
  sinceSequence: number,
  limit?: number,
): JobEventRow[] {
  if (limit !== undefined) {
    return db
      .prepare('SELECT * FROM job_events WHERE job_id = ? AND sequence > ? ORDER BY sequence ASC LIMIT ?')
      .all(jobId, sinceSequence, limit) as JobEventRow[]
  }
  return db
    .prepare('SELECT * FROM job_events WHERE job_id = ? AND sequence > ? ORDER BY sequence ASC')
    .all(jobId, sinceSequence) as JobEventRow[]
}

export function getLastJobEventRow(db: BetterSqlite3Database, jobId: string): JobEventRow | undefined {
  return db
    .prepare('SELECT * FROM job_events WHERE job_id = ? ORDER BY sequence DESC LIMIT 1')
    .get(jobId) as JobEventRow | undefined
}
