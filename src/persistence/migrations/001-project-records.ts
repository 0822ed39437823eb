/**
 * Migration 001: project history.
 *
 * One row per completed project plus its item and phase outcomes. Rows are
 * append-only: triggers reject UPDATE and DELETE on all three tables.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const projectRecordsMigration: Migration = {
  version: 1,
  name: '001-project-records',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS project_records (
        id                    TEXT PRIMARY KEY,
        project_name          TEXT    NOT NULL,
        completed_at          TEXT    NOT NULL,
        duration_ms           INTEGER NOT NULL,
        verification_attempts INTEGER NOT NULL,
        diverged              INTEGER NOT NULL CHECK(diverged IN (0, 1)),
        created_at            TEXT    NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_project_records_completed ON project_records(completed_at);

      CREATE TABLE IF NOT EXISTS project_items (
        record_id          TEXT    NOT NULL REFERENCES project_records(id),
        item_id            TEXT    NOT NULL,
        category           TEXT    NOT NULL CHECK(category IN ('simple','medium','complex')),
        complexity_score   INTEGER NOT NULL,
        estimated_resource INTEGER NOT NULL,
        actual_resource    REAL,
        required_split     INTEGER NOT NULL CHECK(required_split IN (0, 1)),
        commit_count       INTEGER NOT NULL,
        PRIMARY KEY (record_id, item_id)
      );

      CREATE TABLE IF NOT EXISTS project_phases (
        record_id   TEXT    NOT NULL REFERENCES project_records(id),
        seq         INTEGER NOT NULL,
        phase       TEXT    NOT NULL,
        duration_ms INTEGER NOT NULL,
        budget_ms   INTEGER NOT NULL,
        PRIMARY KEY (record_id, seq)
      );
    `)

    for (const table of ['project_records', 'project_items', 'project_phases']) {
      db.exec(`
        CREATE TRIGGER IF NOT EXISTS ${table}_no_update BEFORE UPDATE ON ${table}
        BEGIN SELECT RAISE(ABORT, '${table} is append-only'); END;
        CREATE TRIGGER IF NOT EXISTS ${table}_no_delete BEFORE DELETE ON ${table}
        BEGIN SELECT RAISE(ABORT, '${table} is append-only'); END;
      `)
    }
  },
}
