/**
 * Phase 1.5: decomposition of items too large to schedule.
 *
 * One oversized item per step. The agent proposes the split; the
 * ComplexityAnalyzer validates it and re-requests once. Children are created
 * on the tracker, then one write registers them and closes the parent in the
 * checkpoint, then the parent is closed on the tracker. Items that depended
 * on the parent now depend on all of its children.
 */

import { createLogger } from '../../../utils/logger.js'
import { unionOrdered, without } from '../../../utils/helpers.js'
import type { AgentInvocation, WorkItem } from '../../checkpoint/checkpoint-schema.js'
import type { Splitter } from '../../complexity/types.js'
import { PHASE_GATES } from '../gates.js'
import type { PhaseContext, PhaseDefinition, StepResult } from '../types.js'
import {
  addOpenItem,
  createTrackedItem,
  markCompleted,
  needsDecomposition,
  orderForImplementation,
  schedulableItems,
} from '../work-items.js'
import { recordInvocation } from './shared.js'

const logger = createLogger('phase:decomposition')

function decomposedEvidence(children: readonly string[]): string {
  return `Decomposed into ${children.map((id) => `#${id}`).join(', ')}`
}

/** Close on the tracker any parent the checkpoint records as decomposed but the tracker still has open */
async function closeReopenedParents(ctx: PhaseContext): Promise<void> {
  const progress = ctx.checkpoint.workProgress
  const parents = progress.openItems
    .map((id) => ctx.checkpoint.items[id])
    .filter((item): item is WorkItem => item !== undefined && item.decomposedInto.length > 0)
  for (const parent of parents) {
    await ctx.store.mutate((cp) => {
      markCompleted(cp, parent.id, decomposedEvidence(parent.decomposedInto))
      return cp
    })
    await ctx.tracker.closeItem(parent.id, decomposedEvidence(parent.decomposedInto))
  }
}

async function step(ctx: PhaseContext): Promise<StepResult> {
  await closeReopenedParents(ctx)

  const oversized = orderForImplementation(
    schedulableItems(ctx.checkpoint).filter((item) => needsDecomposition(ctx.analyzer, item))
  )
  const parent = oversized[0]
  if (parent === undefined) return { kind: 'complete' }

  const invocations: AgentInvocation[] = []
  const splitter: Splitter = async (request) => {
    const { output, record } = await ctx.invoke('decomposition', { project: ctx.project, split: request }, parent.id)
    invocations.push(record)
    return output.children
  }

  const children = await ctx.analyzer.decompose(parent.title, parent.estimate, splitter)

  const created: WorkItem[] = []
  for (const child of children) {
    const dependsOn = unionOrdered(
      parent.dependsOn,
      child.dependsOn.flatMap((index) => {
        const dep = created[index]
        return dep === undefined ? [] : [dep.id]
      })
    )
    created.push(
      await createTrackedItem(
        ctx,
        {
          title: child.title,
          kind: parent.kind,
          priority: parent.priority,
          estimate: child.estimate,
          body: `Part of #${parent.id}: ${parent.title}`,
        },
        { dependsOn, parentId: parent.id }
      )
    )
  }
  const childIds = created.map((item) => item.id)

  await ctx.store.mutate((cp) => {
    for (const item of created) addOpenItem(cp, item)
    const registered = cp.items[parent.id]
    if (registered !== undefined) {
      registered.decomposedInto = childIds
      registered.requiredSplit = true
    }
    for (const item of Object.values(cp.items)) {
      if (item.id !== parent.id && !childIds.includes(item.id) && item.dependsOn.includes(parent.id)) {
        item.dependsOn = unionOrdered(without(item.dependsOn, [parent.id]), childIds)
      }
    }
    markCompleted(cp, parent.id, decomposedEvidence(childIds))
    for (const invocation of invocations) recordInvocation(cp, invocation)
    return cp
  })
  await ctx.tracker.closeItem(parent.id, decomposedEvidence(childIds))

  logger.info({ itemId: parent.id, children: childIds }, 'Work item decomposed')
  ctx.eventBus.emit('item:decomposed', { itemId: parent.id, children: childIds, category: parent.complexityCategory })
  return { kind: 'continue' }
}

export function createDecompositionPhase(): PhaseDefinition {
  return {
    id: 'phase1.5-decomposition',
    description: 'Split complex or over-ceiling items into schedulable children.',
    exitGates: PHASE_GATES['phase1.5-decomposition'],
    step,
  }
}
