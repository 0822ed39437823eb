/**
 * Core types for phasewright
 * Shared type definitions used across all modules
 */

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

/** Ordered phase sequence; `done` is the terminal success state */
export const PHASE_SEQUENCE = [
  'phase0-infra',
  'phase1-definition',
  'phase1.5-decomposition',
  'phase2-architecture',
  'phase3-implementation',
  'phase4-qa',
  'phase5-verification',
  'phase6-learning',
  'done',
] as const

/** Identifier of an orchestration phase */
export type PhaseId = (typeof PHASE_SEQUENCE)[number]

/** Phases that do work (every phase except the terminal `done`) */
export type WorkPhaseId = Exclude<PhaseId, 'done'>

/** Work phases in execution order */
export const WORK_PHASES = PHASE_SEQUENCE.filter((p): p is WorkPhaseId => p !== 'done')

/** Human-readable phase names */
export const PHASE_NAMES: Record<PhaseId, string> = {
  'phase0-infra': 'Infrastructure',
  'phase1-definition': 'Product definition',
  'phase1.5-decomposition': 'Decomposition',
  'phase2-architecture': 'Architecture',
  'phase3-implementation': 'Implementation',
  'phase4-qa': 'QA',
  'phase5-verification': 'Verification',
  'phase6-learning': 'Learning',
  done: 'Done',
}

export const PHASE_STATUSES = ['not-started', 'in-progress', 'complete', 'divergence'] as const

/** Status of the current phase */
export type PhaseStatus = (typeof PHASE_STATUSES)[number]

/** Return the phase after `phase`, or `done` when `phase` is the last work phase */
export function nextPhase(phase: PhaseId): PhaseId {
  const idx = PHASE_SEQUENCE.indexOf(phase)
  return PHASE_SEQUENCE[Math.min(idx + 1, PHASE_SEQUENCE.length - 1)] ?? 'done'
}

/** Compare two phases by sequence position */
export function comparePhases(a: PhaseId, b: PhaseId): number {
  return PHASE_SEQUENCE.indexOf(a) - PHASE_SEQUENCE.indexOf(b)
}

// ---------------------------------------------------------------------------
// Work items
// ---------------------------------------------------------------------------

/** Identifier of a work item, as assigned by the tracker */
export type ItemId = string

export const WORK_ITEM_KINDS = ['feature', 'bug'] as const
export type WorkItemKind = (typeof WORK_ITEM_KINDS)[number]

export const PRIORITIES = ['critical', 'high', 'medium', 'low'] as const
export type Priority = (typeof PRIORITIES)[number]

/** Higher rank is scheduled first */
export const PRIORITY_RANK: Record<Priority, number> = {
  critical: 3,
  high: 2,
  medium: 1,
  low: 0,
}

export const COMPLEXITY_CATEGORIES = ['simple', 'medium', 'complex'] as const
export type ComplexityCategory = (typeof COMPLEXITY_CATEGORIES)[number]

export const WORK_ITEM_STATES = ['open', 'closed'] as const
export type WorkItemState = (typeof WORK_ITEM_STATES)[number]

/** Estimated shape of a unit of work */
export interface WorkItemEstimate {
  files: number
  loc: number
  dependencies: number
}

// ---------------------------------------------------------------------------
// Agent capabilities
// ---------------------------------------------------------------------------

export const PHASE_CAPABILITIES = [
  'infra',
  'product-definition',
  'decomposition',
  'architecture',
  'implementation',
  'qa',
  'verification',
  'learning',
] as const

/** One polymorphic agent capability per phase */
export type PhaseCapability = (typeof PHASE_CAPABILITIES)[number]

// ---------------------------------------------------------------------------
// Threshold tuning
// ---------------------------------------------------------------------------

/** Confidence tier of a threshold recommendation */
export type ConfidenceLevel = 'high' | 'medium' | 'low'

/** Advisory suggestion to change one tunable configuration value */
export interface ThresholdRecommendation {
  /** Dot-notation config key, e.g. `complexity.simple_max` */
  parameterName: string
  oldValue: number
  newValue: number
  confidence: ConfidenceLevel
  sampleSize: number
  reasoning: string
}

/** Capability each work phase delegates to; also the phase's config key */
export const PHASE_CAPABILITY: Record<WorkPhaseId, PhaseCapability> = {
  'phase0-infra': 'infra',
  'phase1-definition': 'product-definition',
  'phase1.5-decomposition': 'decomposition',
  'phase2-architecture': 'architecture',
  'phase3-implementation': 'implementation',
  'phase4-qa': 'qa',
  'phase5-verification': 'verification',
  'phase6-learning': 'learning',
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

/** Outcome of one implemented work item, as kept in the history store */
export interface ItemOutcome {
  itemId: ItemId
  category: ComplexityCategory
  complexityScore: number
  estimatedResource: number
  actualResource: number | null
  /** Whether the item had to be decomposed or split mid-item to fit */
  requiredSplit: boolean
  /** Checkpointed sub-units the implementation took */
  commitCount: number
}

export interface PhaseOutcome {
  phase: WorkPhaseId
  durationMs: number
  budgetMs: number
}

/** One completed project, appended to the history store by the learning phase */
export interface ProjectRecord {
  id: string
  projectName: string
  completedAt: string
  durationMs: number
  verificationAttempts: number
  diverged: boolean
  items: ItemOutcome[]
  phases: PhaseOutcome[]
}
