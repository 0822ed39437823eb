/**
 * Phase 6: learning. Appends the project's record to the history store, the
 * only write path into history.
 */

import { createLogger } from '../../../utils/logger.js'
import { PHASE_GATES } from '../gates.js'
import { buildProjectRecord } from '../project-record.js'
import type { PhaseDefinition } from '../types.js'
import { recordArtifacts, recordInvocation } from './shared.js'

const logger = createLogger('phase:learning')

export function createLearningPhase(): PhaseDefinition {
  return {
    id: 'phase6-learning',
    description: 'Record what this project taught about the thresholds.',
    exitGates: PHASE_GATES['phase6-learning'],
    step: async (ctx) => {
      const record = buildProjectRecord(ctx.checkpoint, ctx.now())
      const { output, record: invocation } = await ctx.invoke('learning', {
        project: ctx.project,
        summary: {
          items: record.items.length,
          verificationAttempts: record.verificationAttempts,
          diverged: record.diverged,
          quarantinedTests: ctx.checkpoint.verification.quarantinedTests,
          disclosedGaps: ctx.checkpoint.verification.disclosedGaps,
          deferredItems: ctx.checkpoint.workProgress.deferredItems,
        },
      })

      if (ctx.recorder !== null) {
        ctx.recorder.record(record)
        logger.info({ recordId: record.id, items: record.items.length }, 'Project record appended to history')
      } else {
        logger.warn({ recordId: record.id }, 'No history store configured; project record not kept')
      }

      await ctx.store.mutate((cp) => {
        recordArtifacts(cp, 'phase6-learning', output.artifacts)
        recordInvocation(cp, invocation)
        return cp
      })
      return { kind: 'complete' }
    },
  }
}
