/**
 * Zod schemas for rows of the project history tables.
 *
 * Rows come back from better-sqlite3 as `unknown`; these schemas validate
 * them and map the 0/1 integer columns to booleans.
 */

import { z } from 'zod'
import { COMPLEXITY_CATEGORIES } from '../../core/types.js'
import { WorkPhaseIdSchema } from '../../modules/checkpoint/checkpoint-schema.js'

const SqlBoolean = z.union([z.literal(0), z.literal(1)]).transform((v) => v === 1)

export const ProjectRecordRowSchema = z.object({
  id: z.string(),
  project_name: z.string(),
  completed_at: z.string(),
  duration_ms: z.number().int(),
  verification_attempts: z.number().int(),
  diverged: SqlBoolean,
})
export type ProjectRecordRow = z.infer<typeof ProjectRecordRowSchema>

export const ProjectItemRowSchema = z.object({
  record_id: z.string(),
  item_id: z.string(),
  category: z.enum(COMPLEXITY_CATEGORIES),
  complexity_score: z.number().int(),
  estimated_resource: z.number().int(),
  actual_resource: z.number().nullable(),
  required_split: SqlBoolean,
  commit_count: z.number().int(),
})
export type ProjectItemRow = z.infer<typeof ProjectItemRowSchema>

export const ProjectPhaseRowSchema = z.object({
  record_id: z.string(),
  seq: z.number().int(),
  phase: WorkPhaseIdSchema,
  duration_ms: z.number().int(),
  budget_ms: z.number().int(),
})
export type ProjectPhaseRow = z.infer<typeof ProjectPhaseRowSchema>

export const CountRowSchema = z.object({ count: z.number().int() })
