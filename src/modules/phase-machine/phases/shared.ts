/**
 * Checkpoint helpers shared by the phase definitions.
 */

import type { WorkPhaseId } from '../../../core/types.js'
import { unionOrdered } from '../../../utils/helpers.js'
import type { AgentInvocation, Checkpoint } from '../../checkpoint/checkpoint-schema.js'
import { briefOf } from '../work-items.js'
import type { ItemBrief } from '../../agent/capability-contracts.js'

export function recordInvocation(checkpoint: Checkpoint, invocation: AgentInvocation): void {
  checkpoint.agentInvocations.push(invocation)
}

export function recordArtifacts(checkpoint: Checkpoint, phase: WorkPhaseId, artifacts: readonly string[]): void {
  checkpoint.artifacts = unionOrdered(checkpoint.artifacts, artifacts)
  checkpoint.artifactsByPhase[phase] = unionOrdered(checkpoint.artifactsByPhase[phase] ?? [], artifacts)
}

export function allBriefs(checkpoint: Checkpoint): ItemBrief[] {
  return Object.values(checkpoint.items).map(briefOf)
}
