/**
 * Version snapshot query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface VersionRow {
  file_id: string
  pass_number: number
  content: string
  created_at: string
}

export interface VersionSupersessionRow {
  id: number
  file_id: string
  pass_number: number
  previous_content: string
  previous_created_at: string
  replaced_at: string
  reason: string
  job_id: string | null
}

export type CreateVersionSupersessionInput = Omit<VersionSupersessionRow, 'id'>

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertVersion(db: BetterSqlite3Database, row: VersionRow): void {
  db.prepare(
    'INSERT INTO versions (file_id, pass_number, content, created_at) VALUES (@file_id, @pass_number, @content, @created_at)',
  ).run(row)
}

export function getVersionRow(
  db: BetterSqlite3Database,
  fileId: string,
  passNumber: number,
): VersionRow | undefined {
  return db
    .prepare('SELECT * FROM versions WHERE file_id = ? AND pass_number = ?')
    .get(fileId, passNumber) as VersionRow | undefined
}

export function updateVersionContent(db: BetterSqlite3Database, row: VersionRow): void {
  db.prepare(
    'UPDATE versions SET content = @content, created_at = @created_at WHERE file_id = @file_id AND pass_number = @pass_number',
  ).run(row)
}

export function listPassNumbers(db: BetterSqlite3Database, fileId: string): number[] {
  const rows = db
    .prepare('SELECT pass_number FROM versions WHERE file_id = ? ORDER BY pass_number ASC')
    .all(fileId) as { pass_number: number }[]
  return rows.map((row) => row.pass_number)
}

export function insertVersionSupersession(
  db: BetterSqlite3Database,
  input: CreateVersionSupersessionInput,
): void {
  db.prepare(`
    INSERT INTO version_supersessions (
      file_id, pass_number, previous_content, previous_created_at, replaced_at, reason, job_id
    ) VALUES (
      @file_id, @pass_number, @previous_content, @previous_created_at, @replaced_at, @reason, @job_id
    )
  `).run(input)
}

export function listVersionSupersessionRows(
  db: BetterSqlite3Database,
  fileId: string,
): VersionSupersessionRow[] {
  return db
    .prepare('SELECT * FROM version_supersessions WHERE file_id = ? ORDER BY id ASC')
    .all(fileId) as VersionSupersessionRow[]
}
