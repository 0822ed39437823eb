/**
 * Tests for the migration runner.
 *
 * Validates:
 *  - schema_migrations table is created on first run
 *  - the project history tables and index are created
 *  - history rows are append-only
 *  - running migrations twice is idempotent
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  return db
}

function objectNames(db: BetterSqlite3Database, type: 'table' | 'index' | 'trigger'): unknown[] {
  return db
    .prepare('SELECT name FROM sqlite_master WHERE type = ? ORDER BY name')
    .all(type)
}

function insertRecord(db: BetterSqlite3Database, id: string): void {
  db.prepare(
    `INSERT INTO project_records (id, project_name, completed_at, duration_ms, verification_attempts, diverged)
     VALUES (?, 'todo-api', '2026-01-02T00:00:00.000Z', 1000, 1, 0)`
  ).run(id)
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('creates the schema_migrations table', () => {
    runMigrations(db)
    expect(objectNames(db, 'table')).toContainEqual({ name: 'schema_migrations' })
  })

  it('records migration version 1 after first run', () => {
    runMigrations(db)
    const row: unknown = db.prepare('SELECT version, name FROM schema_migrations WHERE version = 1').get()
    expect(row).toEqual({ version: 1, name: '001-project-records' })
  })

  it('creates the project history tables', () => {
    runMigrations(db)
    const tables = objectNames(db, 'table')
    for (const name of ['project_records', 'project_items', 'project_phases']) {
      expect(tables, `Expected table "${name}" to exist`).toContainEqual({ name })
    }
  })

  it('creates the completion index', () => {
    runMigrations(db)
    expect(objectNames(db, 'index')).toContainEqual({ name: 'idx_project_records_completed' })
  })

  it('creates update and delete guards for every history table', () => {
    runMigrations(db)
    expect(objectNames(db, 'trigger')).toEqual([
      { name: 'project_items_no_delete' },
      { name: 'project_items_no_update' },
      { name: 'project_phases_no_delete' },
      { name: 'project_phases_no_update' },
      { name: 'project_records_no_delete' },
      { name: 'project_records_no_update' },
    ])
  })

  it('rejects updates and deletes of a stored record', () => {
    runMigrations(db)
    insertRecord(db, 'todo-api@1')
    expect(() => db.prepare("UPDATE project_records SET project_name = 'other'").run()).toThrow(
      'project_records is append-only'
    )
    expect(() => db.prepare('DELETE FROM project_records').run()).toThrow('project_records is append-only')
  })

  it('rejects an item outside the known categories', () => {
    runMigrations(db)
    insertRecord(db, 'todo-api@1')
    expect(() =>
      db
        .prepare(
          `INSERT INTO project_items
             (record_id, item_id, category, complexity_score, estimated_resource, actual_resource, required_split, commit_count)
           VALUES ('todo-api@1', '1', 'huge', 10, 10, NULL, 0, 1)`
        )
        .run()
    ).toThrow()
  })

  it('is idempotent: re-running does not throw', () => {
    runMigrations(db)
    expect(() => runMigrations(db)).not.toThrow()
  })

  it('does not re-apply already-applied migrations', () => {
    runMigrations(db)
    runMigrations(db)
    expect(db.prepare('SELECT version FROM schema_migrations').all()).toEqual([{ version: 1 }])
  })
})
