/**
 * Wall-clock phase budgets. Checked between steps, never preemptively; an
 * overrun asks for approval instead of failing the phase.
 */

import { PHASE_CAPABILITY, type WorkPhaseId } from '../../core/types.js'
import type { Checkpoint } from '../checkpoint/checkpoint-schema.js'
import type { PhasesConfig } from '../config/config-schema.js'

const MINUTE_MS = 60_000

/** Budget of `phase` in milliseconds including granted extensions; 0 when the gate is disabled */
export function phaseBudgetMs(phase: WorkPhaseId, phases: PhasesConfig, checkpoint: Checkpoint): number {
  const minutes = phases[PHASE_CAPABILITY[phase]].time_budget_minutes
  if (minutes === 0) return 0
  const extension = checkpoint.timeBudget[phase]?.extensionMinutes ?? 0
  return (minutes + extension) * MINUTE_MS
}

/** Whether the current phase has overrun its budget without an approval to proceed */
export function isOverTimeBudget(checkpoint: Checkpoint, phases: PhasesConfig, now: Date): boolean {
  const phase = checkpoint.phase.current
  if (phase === 'done' || checkpoint.phase.startedAt === null) return false
  if (checkpoint.timeBudget[phase]?.proceedAsIs === true) return false
  const budget = phaseBudgetMs(phase, phases, checkpoint)
  if (budget === 0) return false
  return now.getTime() - new Date(checkpoint.phase.startedAt).getTime() > budget
}
