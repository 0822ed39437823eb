/**
 * Types for the `phasewright status` command.
 */

import type { PhaseId, PhaseStatus, WorkPhaseId } from '../../core/types.js'
import type { ApprovalDecision, PendingApproval } from '../../modules/checkpoint/checkpoint-schema.js'

/**
 * Snapshot of a project run derived from its checkpoint, serialised as the
 * JSON output of `status`.
 */
export interface StatusSnapshot {
  project: string
  request: string
  sessionId: string
  lastUpdated: string
  phase: {
    current: PhaseId
    name: string
    status: PhaseStatus
    startedAt: string | null
  }
  phasesCompleted: WorkPhaseId[]
  items: {
    total: number
    open: number
    completed: number
    inProgress: string | null
    flagged: number
    deferred: number
  }
  resources: {
    used: number
    budget: number
    cumulativeUsed: number
    thresholdExceeded: boolean
  }
  verification: {
    attemptCount: number
    maxAttempts: number
    divergences: number
    quarantinedTests: string[]
  }
  qaCycles: number
  pendingApproval: {
    kind: PendingApproval['kind']
    options: ApprovalDecision[]
    reason: string
  } | null
  resumeHint: string
}
