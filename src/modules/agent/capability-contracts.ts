/**
 * Typed input/output contracts for every phase capability.
 *
 * Inputs are plain interfaces built by the state machine. Outputs come from
 * an external agent and are validated against the zod schemas below before
 * the machine acts on them.
 */

import { z } from 'zod'
import {
  PRIORITIES,
  WORK_ITEM_KINDS,
  type ItemId,
  type PhaseCapability,
  type Priority,
  type WorkItemKind,
  type WorkItemState,
} from '../../core/types.js'
import { WorkItemEstimateSchema } from '../checkpoint/checkpoint-schema.js'
import type { SplitRequest } from '../complexity/types.js'

// ---------------------------------------------------------------------------
// Shared shapes
// ---------------------------------------------------------------------------

export interface ProjectContext {
  name: string
  request: string
  /** Root directory of the project being built */
  projectRoot: string
}

export interface ItemBrief {
  id: ItemId
  title: string
  kind: WorkItemKind
  priority: Priority
  state: WorkItemState
}

const ArtifactList = z.array(z.string().min(1))

export const ItemDraftSchema = z.object({
  title: z.string().min(1),
  body: z.string().default(''),
  kind: z.enum(WORK_ITEM_KINDS).default('feature'),
  priority: z.enum(PRIORITIES).default('medium'),
  estimate: WorkItemEstimateSchema,
  /** Titles of other drafts this one depends on */
  dependsOn: z.array(z.string()).default([]),
})

export type ItemDraft = z.infer<typeof ItemDraftSchema>

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface CapabilityInputs {
  infra: { project: ProjectContext }
  'product-definition': { project: ProjectContext; existingItems: ItemBrief[] }
  decomposition: { project: ProjectContext; split: SplitRequest }
  architecture: { project: ProjectContext; items: ItemBrief[] }
  implementation: {
    project: ProjectContext
    item: ItemBrief
    subUnit: number
    subUnits: number
    /** Failing tests carried back from verification, when re-implementing */
    failingTests: string[]
  }
  qa: { project: ProjectContext; completedItems: ItemBrief[]; cycle: number }
  verification: { project: ProjectContext; attempt: number; quarantinedTests: string[] }
  learning: { project: ProjectContext; summary: Record<string, unknown> }
}

// ---------------------------------------------------------------------------
// Outputs
// ---------------------------------------------------------------------------

export const InfraOutputSchema = z.object({ artifacts: ArtifactList })

export const ProductDefinitionOutputSchema = z.object({
  artifacts: ArtifactList,
  items: z.array(ItemDraftSchema),
})

export const DecompositionOutputSchema = z.object({
  children: z
    .array(
      z.object({
        title: z.string().min(1),
        estimate: WorkItemEstimateSchema,
        dependsOn: z.array(z.number().int()).default([]),
      })
    ),
})

export const ArchitectureOutputSchema = z.object({ artifacts: ArtifactList })

export const ImplementationOutputSchema = z.object({
  /** Resource actually consumed by this sub-unit */
  cost: z.number().min(0),
  /** Reference to what was produced (commit, file, PR) */
  evidence: z.string().min(1),
  artifacts: ArtifactList.default([]),
})

export const QaOutputSchema = z.object({
  bugs: z.array(ItemDraftSchema.extend({ kind: z.literal('bug').default('bug') })).default([]),
})

export const VerificationOutputSchema = z.object({
  tests: z.object({
    passed: z.array(z.string()),
    failed: z.array(z.string()),
  }),
  /** Line coverage percentage */
  coverage: z.number().min(0).max(100),
  /** Items the failing tests belong to */
  failingItems: z.array(z.string()).default([]),
  /** New fix items to schedule before the next attempt */
  fixItems: z.array(ItemDraftSchema.extend({ kind: z.literal('bug').default('bug') })).default([]),
  message: z.string().default(''),
})

export const LearningOutputSchema = z.object({
  artifacts: ArtifactList.default([]),
  notes: z.string().default(''),
})

export interface CapabilityOutputs {
  infra: z.infer<typeof InfraOutputSchema>
  'product-definition': z.infer<typeof ProductDefinitionOutputSchema>
  decomposition: z.infer<typeof DecompositionOutputSchema>
  architecture: z.infer<typeof ArchitectureOutputSchema>
  implementation: z.infer<typeof ImplementationOutputSchema>
  qa: z.infer<typeof QaOutputSchema>
  verification: z.infer<typeof VerificationOutputSchema>
  learning: z.infer<typeof LearningOutputSchema>
}

/** Output schema per capability; input may omit defaulted fields */
export const CAPABILITY_OUTPUT_SCHEMAS: {
  [K in PhaseCapability]: z.ZodType<CapabilityOutputs[K], z.ZodTypeDef, unknown>
} = {
  infra: InfraOutputSchema,
  'product-definition': ProductDefinitionOutputSchema,
  decomposition: DecompositionOutputSchema,
  architecture: ArchitectureOutputSchema,
  implementation: ImplementationOutputSchema,
  qa: QaOutputSchema,
  verification: VerificationOutputSchema,
  learning: LearningOutputSchema,
}
