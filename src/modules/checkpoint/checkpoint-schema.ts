/**
 * Zod schema for the persisted checkpoint document.
 *
 * The checkpoint is the single durable record of an in-progress run. Types
 * are inferred from the schema so the document on disk and the in-memory
 * model cannot drift apart.
 */

import { z } from 'zod'
import {
  PHASE_SEQUENCE,
  PHASE_STATUSES,
  PHASE_CAPABILITIES,
  WORK_ITEM_KINDS,
  PRIORITIES,
  COMPLEXITY_CATEGORIES,
  WORK_ITEM_STATES,
} from '../../core/types.js'

/** Current checkpoint document version */
export const CHECKPOINT_VERSION = 1

const IsoTimestamp = z.string().min(1)

export const PhaseIdSchema = z.enum(PHASE_SEQUENCE)
export const WorkPhaseIdSchema = z.enum([
  'phase0-infra',
  'phase1-definition',
  'phase1.5-decomposition',
  'phase2-architecture',
  'phase3-implementation',
  'phase4-qa',
  'phase5-verification',
  'phase6-learning',
])

// ---------------------------------------------------------------------------
// Work items
// ---------------------------------------------------------------------------

export const WorkItemEstimateSchema = z.object({
  files: z.number().int().min(0),
  loc: z.number().int().min(0),
  dependencies: z.number().int().min(0),
})

export const WorkItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  kind: z.enum(WORK_ITEM_KINDS),
  priority: z.enum(PRIORITIES),
  state: z.enum(WORK_ITEM_STATES),
  estimate: WorkItemEstimateSchema,
  complexityScore: z.number().int().min(0),
  complexityCategory: z.enum(COMPLEXITY_CATEGORIES),
  estimatedResource: z.number().int().min(0),
  actualResource: z.number().min(0).nullable(),
  dependsOn: z.array(z.string()),
  /** Item this one was decomposed or split from */
  parentId: z.string().nullable(),
  /** Children created by decomposition; non-empty means the item is never scheduled itself */
  decomposedInto: z.array(z.string()),
  /** Closed early by a mid-item split; the remainder lives in a continuation item */
  partial: z.boolean(),
  /** Whether this item had to be decomposed or split to fit the ceiling */
  requiredSplit: z.boolean(),
  subUnitsPlanned: z.number().int().min(0),
  subUnitsCompleted: z.number().int().min(0),
  /** Reference to the artifact the implementation produced */
  evidence: z.string().nullable(),
})

export type WorkItem = z.infer<typeof WorkItemSchema>

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const ProjectIdentitySchema = z.object({
  name: z.string().min(1),
  request: z.string(),
  startedAt: IsoTimestamp,
  lastUpdated: IsoTimestamp,
})

export const SessionSchema = z.object({
  id: z.string().min(1),
  startedAt: IsoTimestamp,
})

export const PhaseStateSchema = z.object({
  current: PhaseIdSchema,
  name: z.string(),
  startedAt: IsoTimestamp.nullable(),
  status: z.enum(PHASE_STATUSES),
})

export const WorkProgressSchema = z.object({
  totalItems: z.number().int().min(0),
  completedItems: z.array(z.string()),
  inProgressItem: z.string().nullable(),
  openItems: z.array(z.string()),
  flaggedItems: z.array(z.string()),
  /** Items taken out of scope by an approval; never scheduled or gated on */
  deferredItems: z.array(z.string()),
})

export type WorkProgress = z.infer<typeof WorkProgressSchema>

export const ResourceTrackingSchema = z.object({
  budget: z.number().int().positive(),
  /** Session-scoped; gates scheduling */
  used: z.number().min(0),
  lastUnitCost: z.number().min(0),
  thresholdExceeded: z.boolean(),
  /** Cost recorded against the item currently in progress */
  currentItemUsed: z.number().min(0),
  /** Across all sessions; informational only */
  cumulativeUsed: z.number().min(0),
})

export type ResourceTracking = z.infer<typeof ResourceTrackingSchema>

export const VerificationFailureSchema = z.object({
  attempt: z.number().int().min(1),
  message: z.string(),
  timestamp: IsoTimestamp,
  failingTests: z.array(z.string()),
  failingItems: z.array(z.string()),
})

export type VerificationFailure = z.infer<typeof VerificationFailureSchema>

export const DisclosedGapSchema = z.object({
  kind: z.literal('coverage'),
  actual: z.number(),
  target: z.number(),
  attempt: z.number().int().min(1),
  recordedAt: IsoTimestamp,
})

export type DisclosedGap = z.infer<typeof DisclosedGapSchema>

export const VerificationStateSchema = z.object({
  attemptCount: z.number().int().min(0),
  maxAttempts: z.number().int().min(1),
  /** Times the loop has been declared divergent in this project */
  divergences: z.number().int().min(0),
  lastAttemptAt: IsoTimestamp.nullable(),
  failureHistory: z.array(VerificationFailureSchema),
  quarantinedTests: z.array(z.string()),
  disclosedGaps: z.array(DisclosedGapSchema),
  /** Test outcomes of recent attempts, newest last; drives flaky detection */
  recentRuns: z.array(
    z.object({
      attempt: z.number().int().min(1),
      passed: z.array(z.string()),
      failed: z.array(z.string()),
    })
  ),
})

export type VerificationState = z.infer<typeof VerificationStateSchema>

export const AgentInvocationSchema = z.object({
  capability: z.enum(PHASE_CAPABILITIES),
  phase: PhaseIdSchema,
  itemId: z.string().optional(),
  status: z.enum(['succeeded', 'failed']),
  startedAt: IsoTimestamp,
  completedAt: IsoTimestamp.optional(),
})

export type AgentInvocation = z.infer<typeof AgentInvocationSchema>

export const APPROVAL_KINDS = ['time-budget', 'divergence'] as const
export const APPROVAL_DECISIONS = [
  'extend',
  'reduce-scope',
  'proceed',
  'narrow-scope',
  'relax-threshold',
  'manual-intervention',
] as const
export type ApprovalDecision = (typeof APPROVAL_DECISIONS)[number]

export const PendingApprovalSchema = z.object({
  kind: z.enum(APPROVAL_KINDS),
  phase: WorkPhaseIdSchema,
  requestedAt: IsoTimestamp,
  options: z.array(z.enum(APPROVAL_DECISIONS)),
  reason: z.string(),
})

export type PendingApproval = z.infer<typeof PendingApprovalSchema>

export const TimeBudgetGrantSchema = z.object({
  extensionMinutes: z.number().min(0),
  proceedAsIs: z.boolean(),
})

export type TimeBudgetGrant = z.infer<typeof TimeBudgetGrantSchema>

export const ItemStateLabelSchema = z.enum(['absent', 'open', 'completed'])

export const ReconciliationDeltaSchema = z.object({
  itemId: z.string(),
  from: ItemStateLabelSchema,
  to: ItemStateLabelSchema,
})

export type ReconciliationDelta = z.infer<typeof ReconciliationDeltaSchema>

export const ReconciliationLogSchema = z.object({
  at: IsoTimestamp,
  deltas: z.array(ReconciliationDeltaSchema),
  clearedInProgressItem: z.string().nullable(),
})

export type ReconciliationLog = z.infer<typeof ReconciliationLogSchema>

export const PhaseTimingSchema = z.object({
  phase: WorkPhaseIdSchema,
  startedAt: IsoTimestamp,
  completedAt: IsoTimestamp,
  budgetMs: z.number().min(0),
})

export type PhaseTiming = z.infer<typeof PhaseTimingSchema>

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  project: ProjectIdentitySchema,
  session: SessionSchema,
  phase: PhaseStateSchema,
  phasesCompleted: z.array(WorkPhaseIdSchema),
  phaseTimings: z.array(PhaseTimingSchema),
  workProgress: WorkProgressSchema,
  items: z.record(z.string(), WorkItemSchema),
  resourceTracking: ResourceTrackingSchema,
  verification: VerificationStateSchema,
  qaCycles: z.number().int().min(0),
  agentInvocations: z.array(AgentInvocationSchema),
  artifacts: z.array(z.string()),
  /** Artifacts grouped by the phase that produced them; drives completion predicates */
  artifactsByPhase: z.record(WorkPhaseIdSchema, z.array(z.string())),
  resumeHint: z.string(),
  pendingApproval: PendingApprovalSchema.nullable(),
  timeBudget: z.record(WorkPhaseIdSchema, TimeBudgetGrantSchema),
  lastReconciliation: ReconciliationLogSchema.nullable(),
})

export type Checkpoint = z.infer<typeof CheckpointSchema>

/** Identity supplied when a project run is first initialised */
export interface ProjectIdentity {
  name: string
  request: string
}

/**
 * Check the structural invariants the schema cannot express.
 * Returns a list of violations; empty when the document is consistent.
 */
export function checkInvariants(checkpoint: Checkpoint): string[] {
  const violations: string[] = []
  const { completedItems, openItems, inProgressItem } = checkpoint.workProgress
  const open = new Set(openItems)
  const overlap = completedItems.filter((id) => open.has(id))
  if (overlap.length > 0) {
    violations.push(`items both completed and open: ${overlap.join(', ')}`)
  }
  if (inProgressItem !== null && !open.has(inProgressItem)) {
    violations.push(`in-progress item ${inProgressItem} is not open`)
  }
  const { attemptCount, maxAttempts } = checkpoint.verification
  if (attemptCount > maxAttempts) {
    violations.push(`verification attempt ${String(attemptCount)} exceeds max ${String(maxAttempts)}`)
  }
  return violations
}
