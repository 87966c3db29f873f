/**
 * Migration 003: job_signals table.
 *
 * DB-based signal queue used by `redraft cancel` to reach a job driven by
 * another process. The orchestrator polls it at pass boundaries.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const jobSignalsMigration: Migration = {
  version: 3,
  name: '003-job-signals',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS job_signals (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id       TEXT NOT NULL REFERENCES jobs(id),
        signal       TEXT NOT NULL CHECK(signal IN ('cancel')),
        reason       TEXT,
        created_at   TEXT NOT NULL,
        processed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_job_signals_unprocessed
        ON job_signals(job_id, processed_at)
        WHERE processed_at IS NULL;
    `)
  },
}
