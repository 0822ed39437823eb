/**
 * Phase 3: implementation, one checkpointed sub-unit per step.
 *
 * Items are taken in dependency then priority order. Before an item starts,
 * the budget ladder fixes its number of sub-units or refuses it, which sends
 * the run back to decomposition. After every sub-unit its actual cost is
 * tracked; when the item's own usage crosses the split ratio of the ceiling
 * while work remains, the item is closed as partial and the remainder
 * becomes a new item that depends on it.
 *
 * Completion writes the checkpoint first and closes the tracker item second.
 * A crash in between leaves the item completed in the checkpoint but open on
 * the tracker; reconciliation reopens it and it is implemented again.
 */

import { ResourceCeilingExceededError } from '../../../core/errors.js'
import { createLogger } from '../../../utils/logger.js'
import type { Checkpoint, WorkItem } from '../../checkpoint/checkpoint-schema.js'
import { planItem } from '../budget-ladder.js'
import { PHASE_GATES } from '../gates.js'
import { mustSplitItem, trackResourceUsage } from '../resource-tracker.js'
import type { PhaseContext, PhaseDefinition, StepResult } from '../types.js'
import {
  addOpenItem,
  briefOf,
  createTrackedItem,
  markCompleted,
  orderForImplementation,
  remainingEstimate,
  schedulableItems,
} from '../work-items.js'
import { recordArtifacts, recordInvocation } from './shared.js'

const logger = createLogger('phase:implementation')

function currentItem(checkpoint: Checkpoint): WorkItem | undefined {
  const id = checkpoint.workProgress.inProgressItem
  return id === null ? undefined : checkpoint.items[id]
}

/** Failing tests carried back from the last failed verification attempt */
function carriedFailures(checkpoint: Checkpoint): string[] {
  if (checkpoint.verification.attemptCount === 0) return []
  const history = checkpoint.verification.failureHistory
  return history[history.length - 1]?.failingTests ?? []
}

async function startNextItem(ctx: PhaseContext): Promise<StepResult> {
  const next = orderForImplementation(schedulableItems(ctx.checkpoint))[0]
  if (next === undefined) return { kind: 'complete' }

  const { resourceTracking } = ctx.checkpoint
  if (resourceTracking.thresholdExceeded) {
    const reason = `Session resource budget nearly exhausted (${String(resourceTracking.used)} of ${String(resourceTracking.budget)}); resume in a new session`
    logger.warn({ used: resourceTracking.used, budget: resourceTracking.budget }, 'Session budget gate reached')
    return { kind: 'halt', status: 'suspended', reason }
  }

  let subUnits: number
  try {
    subUnits = planItem(next, ctx.config.budget).subUnits
  } catch (err) {
    if (err instanceof ResourceCeilingExceededError) {
      logger.warn({ itemId: next.id, ...err.context }, 'Item refused by the budget ladder')
      return { kind: 'goto', phase: 'phase1.5-decomposition', reason: err.message }
    }
    throw err
  }

  await ctx.store.mutate((cp) => {
    cp.workProgress.inProgressItem = next.id
    cp.resourceTracking.currentItemUsed = 0
    const item = cp.items[next.id]
    if (item !== undefined) {
      item.subUnitsPlanned = subUnits
      item.subUnitsCompleted = 0
    }
    cp.resumeHint = `Implement item #${next.id} "${next.title}" (sub-unit 1 of ${String(subUnits)})`
    return cp
  })
  ctx.eventBus.emit('item:started', {
    itemId: next.id,
    title: next.title,
    subUnits,
    estimatedResource: next.estimatedResource,
  })
  return { kind: 'continue' }
}

async function runSubUnit(ctx: PhaseContext, item: WorkItem): Promise<StepResult> {
  const subUnit = item.subUnitsCompleted + 1
  const { output, record } = await ctx.invoke(
    'implementation',
    {
      project: ctx.project,
      item: briefOf(item),
      subUnit,
      subUnits: item.subUnitsPlanned,
      failingTests: carriedFailures(ctx.checkpoint),
    },
    item.id
  )

  const { budget } = ctx.config
  const wasWarning = ctx.checkpoint.resourceTracking.thresholdExceeded
  const tracking = trackResourceUsage(ctx.checkpoint.resourceTracking, output.cost, budget.split_ratio)
  const finished = subUnit >= item.subUnitsPlanned
  const split = !finished && mustSplitItem(tracking.currentItemUsed, budget.ceiling, budget.split_ratio)

  const continuation = split
    ? await createTrackedItem(
        ctx,
        {
          title: `${item.title} (continued)`,
          kind: item.kind,
          priority: item.priority,
          estimate: remainingEstimate(item.estimate, subUnit, item.subUnitsPlanned),
          body: `Remainder of #${item.id} after ${String(subUnit)} of ${String(item.subUnitsPlanned)} sub-units`,
        },
        { dependsOn: [item.id], parentId: item.id, requiredSplit: true }
      )
    : null

  const evidence = continuation === null ? output.evidence : `${output.evidence} (partial; continued in #${continuation.id})`

  await ctx.store.mutate((cp) => {
    cp.resourceTracking = { ...tracking }
    recordInvocation(cp, record)
    recordArtifacts(cp, 'phase3-implementation', output.artifacts)
    const registered = cp.items[item.id]
    if (registered !== undefined) {
      registered.subUnitsCompleted = subUnit
      registered.actualResource = (registered.actualResource ?? 0) + Math.max(0, output.cost)
    }
    if (finished || continuation !== null) {
      if (registered !== undefined && continuation !== null) {
        registered.partial = true
        registered.requiredSplit = true
      }
      markCompleted(cp, item.id, evidence)
      cp.resourceTracking.currentItemUsed = 0
      if (continuation !== null) addOpenItem(cp, continuation)
      cp.resumeHint = 'Pick the next open item'
    } else {
      cp.resumeHint = `Implement item #${item.id} "${item.title}" (sub-unit ${String(subUnit + 1)} of ${String(item.subUnitsPlanned)})`
    }
    return cp
  })

  if (!wasWarning && tracking.thresholdExceeded) {
    ctx.eventBus.emit('resource:warning', { used: tracking.used, budget: tracking.budget })
  }

  if (finished || continuation !== null) {
    await ctx.tracker.closeItem(item.id, evidence)
  }

  if (continuation !== null) {
    logger.warn(
      { itemId: item.id, continuationId: continuation.id, used: tracking.currentItemUsed, ceiling: budget.ceiling },
      'Item split mid-way at the resource ceiling ratio'
    )
    ctx.eventBus.emit('item:split', { itemId: item.id, continuationId: continuation.id, used: tracking.currentItemUsed })
  } else if (finished) {
    logger.info({ itemId: item.id, actualResource: (item.actualResource ?? 0) + output.cost }, 'Item completed')
    ctx.eventBus.emit('item:completed', { itemId: item.id, actualResource: (item.actualResource ?? 0) + output.cost })
  }
  return { kind: 'continue' }
}

async function step(ctx: PhaseContext): Promise<StepResult> {
  const item = currentItem(ctx.checkpoint)
  if (item === undefined || item.state === 'closed') return startNextItem(ctx)
  return runSubUnit(ctx, item)
}

export function createImplementationPhase(): PhaseDefinition {
  return {
    id: 'phase3-implementation',
    description: 'Implement open work items within the budget ladder.',
    exitGates: PHASE_GATES['phase3-implementation'],
    step,
  }
}
