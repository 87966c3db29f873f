/**
 * Tests for the migration runner.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../migrations/index.js'

function tableNames(db: BetterSqlite3Database): string[] {
  return (
    db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name").all() as { name: string }[]
  ).map((row) => row.name)
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    db.pragma('foreign_keys = ON')
  })

  afterEach(() => {
    db.close()
  })

  it('records every migration in order', () => {
    runMigrations(db)
    const rows = db.prepare('SELECT version, name FROM schema_migrations ORDER BY version').all()
    expect(rows).toEqual([
      { version: 1, name: '001-initial-schema' },
      { version: 2, name: '002-version-store' },
      { version: 3, name: '003-job-signals' },
    ])
  })

  it('creates the job, event, version and signal tables', () => {
    runMigrations(db)
    expect(tableNames(db)).toEqual([
      'job_events',
      'job_signals',
      'jobs',
      'schema_migrations',
      'version_supersessions',
      'versions',
    ])
  })

  it('is idempotent', () => {
    runMigrations(db)
    expect(() => runMigrations(db)).not.toThrow()
    const count = db.prepare('SELECT COUNT(*) AS n FROM schema_migrations').get() as { n: number }
    expect(count.n).toBe(3)
  })

  it('rejects a duplicate event sequence for the same job', () => {
    runMigrations(db)
    db.prepare(
      `INSERT INTO jobs (id, file_id, file_name, status, current_pass, total_passes, model, created_at, updated_at, metadata_json)
       VALUES ('job_1', 'doc', 'doc.md', 'processing', 0, 1, 'm', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z', '{}')`,
    ).run()
    const insert = db.prepare(
      `INSERT INTO job_events (id, job_id, sequence, event_type, pass_number, message, details_json, created_at)
       VALUES (?, 'job_1', 1, 'job_started', NULL, 'Job started', '{}', '2024-01-01T00:00:00.000Z')`,
    )
    insert.run('evt_1')
    expect(() => insert.run('evt_2')).toThrow(/UNIQUE/)
  })
})
