/**
 * Phase 1: product definition.
 *
 * The agent writes the PRD and proposes work items. Each new item is scored,
 * created on the tracker and registered with its own checkpoint write, so a
 * rerun after a crash skips items that already exist (matched by title).
 * Dependencies arrive as titles and are resolved to ids in a final write.
 */

import { createLogger } from '../../../utils/logger.js'
import { unionOrdered } from '../../../utils/helpers.js'
import { PHASE_GATES } from '../gates.js'
import type { PhaseContext, PhaseDefinition, StepResult } from '../types.js'
import { addOpenItem, createTrackedItem, findItemByTitle, isScoreCurrent, rescoreStaleItems } from '../work-items.js'
import { allBriefs, recordArtifacts, recordInvocation } from './shared.js'

const logger = createLogger('phase:definition')

/** Re-score items whose recorded score no longer matches the scoring model */
async function rescoreItems(ctx: PhaseContext): Promise<void> {
  if (Object.values(ctx.checkpoint.items).every((item) => isScoreCurrent(ctx.analyzer, item))) return
  let rescored: string[] = []
  await ctx.store.mutate((cp) => {
    rescored = rescoreStaleItems(cp, ctx.analyzer)
    return cp
  })
  logger.info({ items: rescored }, 'Work items re-scored')
}

async function step(ctx: PhaseContext): Promise<StepResult> {
  await rescoreItems(ctx)

  const { output, record } = await ctx.invoke('product-definition', {
    project: ctx.project,
    existingItems: allBriefs(ctx.checkpoint),
  })

  const ids = new Map<string, string>()
  for (const item of Object.values(ctx.checkpoint.items)) ids.set(item.title, item.id)

  for (const draft of output.items) {
    if (ids.has(draft.title)) continue
    const item = await createTrackedItem(ctx, draft)
    await ctx.store.mutate((cp) => {
      addOpenItem(cp, item)
      return cp
    })
    ids.set(item.title, item.id)
    logger.info({ itemId: item.id, score: item.complexityScore, category: item.complexityCategory }, 'Work item created')
  }

  await ctx.store.mutate((cp) => {
    for (const draft of output.items) {
      const item = findItemByTitle(cp, draft.title)
      if (item === undefined) continue
      const resolved: string[] = []
      for (const title of draft.dependsOn) {
        const dep = ids.get(title)
        if (dep === undefined || dep === item.id) {
          logger.warn({ itemId: item.id, dependsOn: title }, 'Unknown dependency ignored')
        } else {
          resolved.push(dep)
        }
      }
      item.dependsOn = unionOrdered(item.dependsOn, resolved)
    }
    recordArtifacts(cp, 'phase1-definition', output.artifacts)
    recordInvocation(cp, record)
    return cp
  })

  return { kind: 'complete' }
}

export function createDefinitionPhase(): PhaseDefinition {
  return {
    id: 'phase1-definition',
    description: 'Write the PRD and create scored work items on the tracker.',
    exitGates: PHASE_GATES['phase1-definition'],
    step,
  }
}
