/**
 * Job query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface JobRow {
  id: string
  file_id: string
  file_name: string
  user_id: string | null
  status: string
  current_pass: number
  total_passes: number
  model: string
  created_at: string
  updated_at: string
  completed_at: string | null
  error_message: string | null
  result_json: string | null
  metadata_json: string
}

export type CreateJobRowInput = Omit<JobRow, 'completed_at' | 'error_message' | 'result_json'>

export interface JobStateRowUpdate {
  status: string
  current_pass: number
  completed_at: string | null
  error_message: string | null
  result_json: string | null
  updated_at: string
}

export interface JobRowFilter {
  statuses?: string[]
  user_id?: string
  created_after?: string
  created_before?: string
  limit?: number
  offset?: number
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertJob(db: BetterSqlite3Database, input: CreateJobRowInput): void {
  db.prepare(`
    INSERT INTO jobs (
      id, file_id, file_name, user_id, status, current_pass, total_passes, model,
      created_at, updated_at, metadata_json
    ) VALUES (
      @id, @file_id, @file_name, @user_id, @status, @current_pass, @total_passes, @model,
      @created_at, @updated_at, @metadata_json
    )
  `).run(input)
}

export function getJobRow(db: BetterSqlite3Database, jobId: string): JobRow | undefined {
  return db.prepare('SELECT * FROM jobs WHERE id = ?').get(jobId) as JobRow | undefined
}

/**
 * List jobs newest first. Jobs created in the same instant come back in
 * reverse insertion order.
 */
export function listJobRows(db: BetterSqlite3Database, filter: JobRowFilter = {}): JobRow[] {
  const clauses: string[] = []
  const params: (string | number)[] = []

  if (filter.statuses !== undefined && filter.statuses.length > 0) {
    clauses.push(`status IN (${filter.statuses.map(() => '?').join(', ')})`)
    params.push(...filter.statuses)
  }
  if (filter.user_id !== undefined) {
    clauses.push('user_id = ?')
    params.push(filter.user_id)
  }
  if (filter.created_after !== undefined) {
    clauses.push('created_at >= ?')
    params.push(filter.created_after)
  }
  if (filter.created_before !== undefined) {
    clauses.push('created_at <= ?')
    params.push(filter.created_before)
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
  let sql = `SELECT * FROM jobs ${where} ORDER BY created_at DESC, rowid DESC`
  if (filter.limit !== undefined || filter.offset !== undefined) {
    sql += ' LIMIT ? OFFSET ?'
    params.push(filter.limit ?? -1, filter.offset ?? 0)
  }

  return db.prepare(sql).all(...params) as JobRow[]
}

/**
 * Compare-and-set update of a job's state columns. Only applies when the
 * row still has the status and pass the caller read.
 *
 * @returns true when the row was updated
 */
export function updateJobStateRow(
  db: BetterSqlite3Database,
  jobId: string,
  expected: { status: string; current_pass: number },
  update: JobStateRowUpdate,
): boolean {
  const result = db
    .prepare(`
      UPDATE jobs
      SET status = @status,
          current_pass = @current_pass,
          completed_at = @completed_at,
          error_message = @error_message,
          result_json = @result_json,
          updated_at = @updated_at
      WHERE id = @id AND status = @expected_status AND current_pass = @expected_pass
    `)
    .run({
      ...update,
      id: jobId,
      expected_status: expected.status,
      expected_pass: expected.current_pass,
    })
  return result.changes === 1
}

export function touchJob(db: BetterSqlite3Database, jobId: string, updatedAt: string): void {
  db.prepare('UPDATE jobs SET updated_at = ? WHERE id = ?').run(updatedAt, jobId)
}

/**
 * Processing jobs whose last write is older than `olderThan`.
 */
export function findStaleJobRows(db: BetterSqlite3Database, olderThan: string): JobRow[] {
  return db
    .prepare(
      "SELECT * FROM jobs WHERE status = 'processing' AND updated_at < ? ORDER BY updated_at ASC, rowid ASC",
    )
    .all(olderThan) as JobRow[]
}

/**
 * Oldest pending or processing job for a file, if any.
 */
export function getActiveJobRowForFile(db: BetterSqlite3Database, fileId: string): JobRow | undefined {
  return db
    .prepare(
      "SELECT * FROM jobs WHERE file_id = ? AND status IN ('pending', 'processing') ORDER BY created_at ASC, rowid ASC LIMIT 1",
    )
    .get(fileId) as JobRow | undefined
}
