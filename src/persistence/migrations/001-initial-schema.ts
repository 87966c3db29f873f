/**
 * Migration 001: jobs and job_events tables.
 *
 * Timestamps are ISO-8601 strings supplied by the engine clock so that
 * ordering and filtering behave the same in tests and in production.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const initialSchemaMigration: Migration = {
  version: 1,
  name: '001-initial-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id            TEXT PRIMARY KEY,
        file_id       TEXT NOT NULL,
        file_name     TEXT NOT NULL,
        user_id       TEXT,
        status        TEXT NOT NULL CHECK(status IN ('pending', 'processing', 'completed', 'failed', 'cancelled')),
        current_pass  INTEGER NOT NULL DEFAULT 0 CHECK(current_pass >= 0),
        total_passes  INTEGER NOT NULL CHECK(total_passes >= 1),
        model         TEXT NOT NULL,
        created_at    TEXT NOT NULL,
        updated_at    TEXT NOT NULL,
        completed_at  TEXT,
        error_message TEXT,
        result_json   TEXT,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        CHECK(current_pass <= total_passes)
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_jobs_user_id ON jobs(user_id);
      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status, updated_at);

      CREATE TABLE IF NOT EXISTS job_events (
        id           TEXT PRIMARY KEY,
        job_id       TEXT NOT NULL REFERENCES jobs(id),
        sequence     INTEGER NOT NULL CHECK(sequence >= 1),
        event_type   TEXT NOT NULL CHECK(event_type IN (
          'job_started', 'pass_started', 'pass_completed', 'pass_failed',
          'job_completed', 'job_failed', 'job_cancelled'
        )),
        pass_number  INTEGER,
        message      TEXT NOT NULL,
        details_json TEXT NOT NULL DEFAULT '{}',
        created_at   TEXT NOT NULL,
        UNIQUE(job_id, sequence)
      );
    `)
  },
}
