/**
 * Phase 4: QA. Bugs the agent reports become new items and send the run back
 * to implementation, at most `qa.max_cycles` times.
 */

import { createLogger } from '../../../utils/logger.js'
import type { WorkItem } from '../../checkpoint/checkpoint-schema.js'
import { PHASE_GATES } from '../gates.js'
import type { PhaseContext, PhaseDefinition, StepResult } from '../types.js'
import { addOpenItem, briefOf, createTrackedItem, findItemByTitle } from '../work-items.js'
import { recordInvocation } from './shared.js'

const logger = createLogger('phase:qa')

async function step(ctx: PhaseContext): Promise<StepResult> {
  const completed = ctx.checkpoint.workProgress.completedItems
    .map((id) => ctx.checkpoint.items[id])
    .filter((item): item is WorkItem => item !== undefined && item.decomposedInto.length === 0)

  const cycle = ctx.checkpoint.qaCycles + 1
  const { output, record } = await ctx.invoke('qa', {
    project: ctx.project,
    completedItems: completed.map(briefOf),
    cycle,
  })

  const bugs = output.bugs.filter((bug) => findItemByTitle(ctx.checkpoint, bug.title) === undefined)
  if (bugs.length > 0 && ctx.checkpoint.qaCycles >= ctx.config.qa.max_cycles) {
    logger.warn(
      { bugs: bugs.map((bug) => bug.title), maxCycles: ctx.config.qa.max_cycles },
      'QA cycle limit reached; reported bugs are left to verification'
    )
  }
  if (bugs.length === 0 || ctx.checkpoint.qaCycles >= ctx.config.qa.max_cycles) {
    await ctx.store.mutate((cp) => {
      recordInvocation(cp, record)
      return cp
    })
    return { kind: 'complete' }
  }

  const created: WorkItem[] = []
  for (const bug of bugs) created.push(await createTrackedItem(ctx, bug))

  await ctx.store.mutate((cp) => {
    for (const item of created) addOpenItem(cp, item)
    cp.qaCycles = cycle
    recordInvocation(cp, record)
    return cp
  })
  logger.info({ cycle, bugs: created.map((item) => item.id) }, 'QA reported bugs')
  return { kind: 'goto', phase: 'phase3-implementation', reason: `QA cycle ${String(cycle)} reported ${String(created.length)} bug(s)` }
}

export function createQaPhase(): PhaseDefinition {
  return {
    id: 'phase4-qa',
    description: 'Review completed work and file bugs.',
    exitGates: PHASE_GATES['phase4-qa'],
    step,
  }
}
