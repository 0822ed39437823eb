/**
 * Phase 2: architecture for the scored and decomposed work items.
 */

import { PHASE_GATES } from '../gates.js'
import type { PhaseDefinition } from '../types.js'
import { allBriefs, recordArtifacts, recordInvocation } from './shared.js'

export function createArchitecturePhase(): PhaseDefinition {
  return {
    id: 'phase2-architecture',
    description: 'Design the architecture the implementation follows.',
    exitGates: PHASE_GATES['phase2-architecture'],
    step: async (ctx) => {
      const { output, record } = await ctx.invoke('architecture', {
        project: ctx.project,
        items: allBriefs(ctx.checkpoint),
      })
      await ctx.store.mutate((cp) => {
        recordArtifacts(cp, 'phase2-architecture', output.artifacts)
        recordInvocation(cp, record)
        return cp
      })
      return { kind: 'complete' }
    },
  }
}
