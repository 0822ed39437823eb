/**
 * Project history query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import type { ItemOutcome, PhaseOutcome, ProjectRecord } from '../../core/types.js'
import {
  CountRowSchema,
  ProjectItemRowSchema,
  ProjectPhaseRowSchema,
  ProjectRecordRowSchema,
} from '../schemas/project-records.js'

/**
 * Append `record` with its items and phases in one transaction.
 * Returns false when a record with the same id is already stored.
 */
export function insertProjectRecord(db: BetterSqlite3Database, record: ProjectRecord): boolean {
  const insertRecord = db.prepare(`
    INSERT OR IGNORE INTO project_records
      (id, project_name, completed_at, duration_ms, verification_attempts, diverged)
    VALUES (?, ?, ?, ?, ?, ?)
  `)
  const insertItem = db.prepare(`
    INSERT INTO project_items
      (record_id, item_id, category, complexity_score, estimated_resource, actual_resource, required_split, commit_count)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `)
  const insertPhase = db.prepare(`
    INSERT INTO project_phases (record_id, seq, phase, duration_ms, budget_ms)
    VALUES (?, ?, ?, ?, ?)
  `)

  const insert = db.transaction((r: ProjectRecord): boolean => {
    const result = insertRecord.run(
      r.id,
      r.projectName,
      r.completedAt,
      Math.round(r.durationMs),
      r.verificationAttempts,
      r.diverged ? 1 : 0
    )
    if (result.changes === 0) return false

    for (const item of r.items) {
      insertItem.run(
        r.id,
        item.itemId,
        item.category,
        item.complexityScore,
        item.estimatedResource,
        item.actualResource,
        item.requiredSplit ? 1 : 0,
        item.commitCount
      )
    }
    r.phases.forEach((phase, seq) => {
      insertPhase.run(r.id, seq, phase.phase, Math.round(phase.durationMs), Math.round(phase.budgetMs))
    })
    return true
  })

  return insert(record)
}

/** All stored records, oldest first */
export function listProjectRecords(db: BetterSqlite3Database): ProjectRecord[] {
  const records = z
    .array(ProjectRecordRowSchema)
    .parse(db.prepare('SELECT * FROM project_records ORDER BY completed_at, id').all())
  const items = z
    .array(ProjectItemRowSchema)
    .parse(db.prepare('SELECT * FROM project_items ORDER BY record_id, item_id').all())
  const phases = z
    .array(ProjectPhaseRowSchema)
    .parse(db.prepare('SELECT * FROM project_phases ORDER BY record_id, seq').all())

  const itemsByRecord = new Map<string, ItemOutcome[]>()
  for (const row of items) {
    const list = itemsByRecord.get(row.record_id) ?? []
    list.push({
      itemId: row.item_id,
      category: row.category,
      complexityScore: row.complexity_score,
      estimatedResource: row.estimated_resource,
      actualResource: row.actual_resource,
      requiredSplit: row.required_split,
      commitCount: row.commit_count,
    })
    itemsByRecord.set(row.record_id, list)
  }

  const phasesByRecord = new Map<string, PhaseOutcome[]>()
  for (const row of phases) {
    const list = phasesByRecord.get(row.record_id) ?? []
    list.push({ phase: row.phase, durationMs: row.duration_ms, budgetMs: row.budget_ms })
    phasesByRecord.set(row.record_id, list)
  }

  return records.map((row) => ({
    id: row.id,
    projectName: row.project_name,
    completedAt: row.completed_at,
    durationMs: row.duration_ms,
    verificationAttempts: row.verification_attempts,
    diverged: row.diverged,
    items: itemsByRecord.get(row.id) ?? [],
    phases: phasesByRecord.get(row.id) ?? [],
  }))
}

export function countProjectRecords(db: BetterSqlite3Database): number {
  return CountRowSchema.parse(db.prepare('SELECT COUNT(*) AS count FROM project_records').get()).count
}
