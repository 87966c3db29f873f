/**
 * Migration 002: content snapshots and their supersession audit trail.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const versionStoreMigration: Migration = {
  version: 2,
  name: '002-version-store',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS versions (
        file_id     TEXT NOT NULL,
        pass_number INTEGER NOT NULL CHECK(pass_number >= 0),
        content     TEXT NOT NULL,
        created_at  TEXT NOT NULL,
        PRIMARY KEY (file_id, pass_number)
      );

      CREATE TABLE IF NOT EXISTS version_supersessions (
        id                  INTEGER PRIMARY KEY AUTOINCREMENT,
        file_id             TEXT NOT NULL,
        pass_number         INTEGER NOT NULL,
        previous_content    TEXT NOT NULL,
        previous_created_at TEXT NOT NULL,
        replaced_at         TEXT NOT NULL,
        reason              TEXT NOT NULL,
        job_id              TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_version_supersessions_file
        ON version_supersessions(file_id, pass_number);
    `)
  },
}
