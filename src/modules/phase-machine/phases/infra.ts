/**
 * Phase 0: project infrastructure (repository layout, tooling, CI scaffolding).
 */

import { PHASE_GATES } from '../gates.js'
import type { PhaseDefinition } from '../types.js'
import { recordArtifacts, recordInvocation } from './shared.js'

export function createInfraPhase(): PhaseDefinition {
  return {
    id: 'phase0-infra',
    description: 'Set up the project infrastructure the later phases build on.',
    exitGates: PHASE_GATES['phase0-infra'],
    step: async (ctx) => {
      const { output, record } = await ctx.invoke('infra', { project: ctx.project })
      await ctx.store.mutate((cp) => {
        recordArtifacts(cp, 'phase0-infra', output.artifacts)
        recordInvocation(cp, record)
        return cp
      })
      return { kind: 'complete' }
    },
  }
}
