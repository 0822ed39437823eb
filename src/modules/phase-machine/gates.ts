/**
 * Completion predicates of every work phase, expressed as exit gates.
 *
 *   phase0-infra            infrastructure artifacts exist
 *   phase1-definition       PRD artifact exists, >= 1 item, every item scored by the current model
 *   phase1.5-decomposition  no schedulable item is complex or above the ceiling
 *   phase2-architecture     architecture artifacts exist
 *   phase3-implementation   every schedulable item is completed
 *   phase4..6               recorded complete by the machine
 */

import type { WorkPhaseId } from '../../core/types.js'
import type { GateCheck, GateContext, GateRunResult } from './types.js'
import { isScoreCurrent, needsDecomposition, schedulableItems } from './work-items.js'

function artifactsExistGate(phase: WorkPhaseId, artifact: string): GateCheck {
  return {
    name: `${phase}:${artifact}-exists`,
    check: async ({ checkpoint, inspector }) => {
      const artifacts = checkpoint.artifactsByPhase[phase] ?? []
      if (artifacts.length === 0) return false
      return (await inspector.missing(artifacts)).length === 0
    },
    errorMessage: `Artifacts of ${phase} (${artifact}) are missing. The phase must run again.`,
  }
}

const itemsCreatedGate: GateCheck = {
  name: 'phase1-definition:items-created',
  check: async ({ checkpoint }) => Object.keys(checkpoint.items).length > 0,
  errorMessage: 'Product definition created no work items.',
}

const itemsScoredGate: GateCheck = {
  name: 'phase1-definition:items-scored',
  check: async ({ checkpoint, analyzer }) =>
    Object.values(checkpoint.items).every((item) => isScoreCurrent(analyzer, item)),
  errorMessage: 'Some work items are not scored with the current complexity model.',
}

const noOversizedItemsGate: GateCheck = {
  name: 'phase1.5-decomposition:no-oversized-items',
  check: async ({ checkpoint, analyzer }) =>
    schedulableItems(checkpoint).every((item) => !needsDecomposition(analyzer, item)),
  errorMessage: 'Some open items are complex or exceed the resource ceiling and must be decomposed.',
}

const allItemsCompletedGate: GateCheck = {
  name: 'phase3-implementation:all-items-completed',
  check: async ({ checkpoint }) => schedulableItems(checkpoint).length === 0,
  errorMessage: 'Open work items remain.',
}

/** Exit gates by phase */
export const PHASE_GATES: Record<WorkPhaseId, GateCheck[]> = {
  'phase0-infra': [artifactsExistGate('phase0-infra', 'infrastructure')],
  'phase1-definition': [artifactsExistGate('phase1-definition', 'prd'), itemsCreatedGate, itemsScoredGate],
  'phase1.5-decomposition': [noOversizedItemsGate],
  'phase2-architecture': [artifactsExistGate('phase2-architecture', 'architecture')],
  'phase3-implementation': [allItemsCompletedGate],
  'phase4-qa': [],
  'phase5-verification': [],
  'phase6-learning': [],
}

/**
 * Run all gate checks sequentially, collecting all failures (no short-circuit).
 */
export async function runGates(gates: readonly GateCheck[], ctx: GateContext): Promise<GateRunResult> {
  const failures: Array<{ gate: string; error: string }> = []

  for (const gate of gates) {
    try {
      const passed = await gate.check(ctx)
      if (!passed) {
        failures.push({ gate: gate.name, error: gate.errorMessage })
      }
    } catch (err) {
      const errorMsg = err instanceof Error ? err.message : String(err)
      failures.push({ gate: gate.name, error: `Gate check threw an error: ${errorMsg}` })
    }
  }

  return { passed: failures.length === 0, failures }
}

/**
 * Whether `phase` is complete: recorded as completed and its exit gates
 * still hold against the current state.
 */
export async function isPhaseSatisfied(
  phase: WorkPhaseId,
  gates: readonly GateCheck[],
  ctx: GateContext
): Promise<boolean> {
  if (!ctx.checkpoint.phasesCompleted.includes(phase)) return false
  return (await runGates(gates, ctx)).passed
}
