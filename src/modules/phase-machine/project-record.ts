/**
 * Builds the history record of a completed project from its checkpoint.
 */

import type { PhaseOutcome, ProjectRecord, WorkPhaseId } from '../../core/types.js'
import type { Checkpoint } from '../checkpoint/checkpoint-schema.js'

/** Stable id: a replayed learning phase writes the same record */
export function projectRecordId(checkpoint: Checkpoint): string {
  return `${checkpoint.project.name}@${checkpoint.project.startedAt}`
}

export function buildProjectRecord(checkpoint: Checkpoint, now: Date): ProjectRecord {
  const phases = new Map<WorkPhaseId, PhaseOutcome>()
  for (const timing of checkpoint.phaseTimings) {
    const durationMs = Math.max(0, new Date(timing.completedAt).getTime() - new Date(timing.startedAt).getTime())
    const existing = phases.get(timing.phase)
    phases.set(timing.phase, {
      phase: timing.phase,
      durationMs: (existing?.durationMs ?? 0) + durationMs,
      budgetMs: timing.budgetMs,
    })
  }

  const verification = checkpoint.verification
  return {
    id: projectRecordId(checkpoint),
    projectName: checkpoint.project.name,
    completedAt: now.toISOString(),
    durationMs: Math.max(0, now.getTime() - new Date(checkpoint.project.startedAt).getTime()),
    verificationAttempts: verification.failureHistory.length + 1,
    diverged: verification.divergences > 0,
    items: Object.values(checkpoint.items).map((item) => ({
      itemId: item.id,
      category: item.complexityCategory,
      complexityScore: item.complexityScore,
      estimatedResource: item.estimatedResource,
      actualResource: item.actualResource,
      requiredSplit: item.requiredSplit,
      commitCount: item.subUnitsCompleted,
    })),
    phases: [...phases.values()],
  }
}
