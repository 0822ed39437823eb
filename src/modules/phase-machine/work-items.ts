/**
 * Helpers for the checkpoint's work-item registry. The `mark*` and `add*`
 * functions modify the document passed to them and are meant to be called
 * inside a CheckpointStore mutation; all of them are idempotent.
 */

import { PRIORITY_RANK, type ItemId, type WorkItemEstimate } from '../../core/types.js'
import { unionOrdered, without } from '../../utils/helpers.js'
import type { ItemBrief, ItemDraft } from '../agent/capability-contracts.js'
import type { Checkpoint, WorkItem } from '../checkpoint/checkpoint-schema.js'
import type { ComplexityAnalyzer } from '../complexity/complexity-analyzer.js'
import type { ComplexityAssessment } from '../complexity/types.js'
import { itemBody, itemLabels } from '../work-tracker/labels.js'
import type { PhaseContext } from './types.js'

export type NewItem = Pick<ItemDraft, 'title' | 'kind' | 'priority' | 'estimate'> & { body?: string }

/** Fields of a freshly registered item that callers may preset */
export type ItemExtras = Partial<Pick<WorkItem, 'dependsOn' | 'parentId' | 'requiredSplit'>>

export function buildWorkItem(id: ItemId, item: NewItem, assessment: ComplexityAssessment, extras: ItemExtras = {}): WorkItem {
  return {
    id,
    title: item.title,
    kind: item.kind,
    priority: item.priority,
    state: 'open',
    estimate: { ...item.estimate },
    complexityScore: assessment.score,
    complexityCategory: assessment.category,
    estimatedResource: assessment.estimatedResource,
    actualResource: null,
    dependsOn: extras.dependsOn ?? [],
    parentId: extras.parentId ?? null,
    decomposedInto: [],
    partial: false,
    requiredSplit: extras.requiredSplit ?? false,
    subUnitsPlanned: 0,
    subUnitsCompleted: 0,
    evidence: null,
  }
}

/** Score `item`, create it on the tracker and return the record to register */
export async function createTrackedItem(ctx: PhaseContext, item: NewItem, extras: ItemExtras = {}): Promise<WorkItem> {
  const assessment = ctx.analyzer.score(item.estimate)
  const id = await ctx.tracker.createItem(
    item.title,
    itemBody(item.body ?? '', item.estimate),
    itemLabels(ctx.config.tracker.label, item.kind, item.priority)
  )
  return buildWorkItem(id, item, assessment, extras)
}

export function addOpenItem(checkpoint: Checkpoint, item: WorkItem): void {
  checkpoint.items[item.id] = item
  checkpoint.workProgress.openItems = unionOrdered(checkpoint.workProgress.openItems, [item.id])
  checkpoint.workProgress.completedItems = without(checkpoint.workProgress.completedItems, [item.id])
  checkpoint.workProgress.totalItems = Object.keys(checkpoint.items).length
}

/** Move an item to the completed set and close it in the registry */
export function markCompleted(checkpoint: Checkpoint, id: ItemId, evidence: string | null): void {
  const progress = checkpoint.workProgress
  progress.completedItems = unionOrdered(progress.completedItems, [id])
  progress.openItems = without(progress.openItems, [id])
  if (progress.inProgressItem === id) progress.inProgressItem = null
  const item = checkpoint.items[id]
  if (item !== undefined) {
    item.state = 'closed'
    if (evidence !== null) item.evidence = evidence
  }
}

/** Move an item back to the open set */
export function markOpen(checkpoint: Checkpoint, id: ItemId): void {
  const progress = checkpoint.workProgress
  progress.openItems = unionOrdered(progress.openItems, [id])
  progress.completedItems = without(progress.completedItems, [id])
  const item = checkpoint.items[id]
  if (item !== undefined) item.state = 'open'
}

export function flagItems(checkpoint: Checkpoint, ids: readonly ItemId[]): void {
  checkpoint.workProgress.flaggedItems = unionOrdered(checkpoint.workProgress.flaggedItems, ids)
}

/** Open items that may be scheduled: not deferred and not replaced by children */
export function schedulableItems(checkpoint: Checkpoint): WorkItem[] {
  const deferred = new Set(checkpoint.workProgress.deferredItems)
  const result: WorkItem[] = []
  for (const id of checkpoint.workProgress.openItems) {
    const item = checkpoint.items[id]
    if (item !== undefined && !deferred.has(id) && item.decomposedInto.length === 0) {
      result.push(item)
    }
  }
  return result
}

/** Whether a registered item is complex or above the ceiling */
export function needsDecomposition(analyzer: ComplexityAnalyzer, item: WorkItem): boolean {
  return analyzer.requiresDecomposition({ category: item.complexityCategory, estimatedResource: item.estimatedResource })
}

/** Whether the recorded score, category and resource estimate match the scoring model */
export function isScoreCurrent(analyzer: ComplexityAnalyzer, item: WorkItem): boolean {
  const current = analyzer.score(item.estimate)
  return (
    item.complexityScore === current.score &&
    item.complexityCategory === current.category &&
    item.estimatedResource === current.estimatedResource
  )
}

/** Re-score (in place) every item scored under another model; returns their ids */
export function rescoreStaleItems(checkpoint: Checkpoint, analyzer: ComplexityAnalyzer): ItemId[] {
  const stale = Object.values(checkpoint.items).filter((item) => !isScoreCurrent(analyzer, item))
  for (const item of stale) {
    const current = analyzer.score(item.estimate)
    item.complexityScore = current.score
    item.complexityCategory = current.category
    item.estimatedResource = current.estimatedResource
  }
  return stale.map((item) => item.id)
}

export function findItemByTitle(checkpoint: Checkpoint, title: string): WorkItem | undefined {
  return Object.values(checkpoint.items).find((item) => item.title === title)
}

export function briefOf(item: WorkItem): ItemBrief {
  return { id: item.id, title: item.title, kind: item.kind, priority: item.priority, state: item.state }
}

/** Numeric ids in numeric order, anything else lexically after them */
export function compareItemIds(a: ItemId, b: ItemId): number {
  const na = Number(a)
  const nb = Number(b)
  const aNumeric = Number.isInteger(na)
  const bNumeric = Number.isInteger(nb)
  if (aNumeric && bNumeric) return na - nb
  if (aNumeric) return -1
  if (bNumeric) return 1
  return a.localeCompare(b)
}

/**
 * Order items for implementation: dependencies first, then priority
 * (highest first), then id. Dependencies outside `items` count as met.
 * A dependency cycle is broken at its highest-priority member.
 */
export function orderForImplementation(items: readonly WorkItem[]): WorkItem[] {
  const byPriority = [...items].sort(
    (a, b) => PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] || compareItemIds(a.id, b.id)
  )
  const pending = new Set(byPriority.map((item) => item.id))
  const ordered: WorkItem[] = []
  while (pending.size > 0) {
    const ready = byPriority.find(
      (item) => pending.has(item.id) && item.dependsOn.every((dep) => !pending.has(dep))
    )
    const next = ready ?? byPriority.find((item) => pending.has(item.id))
    if (next === undefined) break
    ordered.push(next)
    pending.delete(next.id)
  }
  return ordered
}

/** Estimate for the part of an item that remains after `completed` of `planned` sub-units */
export function remainingEstimate(estimate: WorkItemEstimate, completed: number, planned: number): WorkItemEstimate {
  const fraction = planned > 0 ? Math.max(0, planned - completed) / planned : 1
  return {
    files: Math.max(1, Math.ceil(estimate.files * fraction)),
    loc: Math.ceil(estimate.loc * fraction),
    dependencies: estimate.dependencies,
  }
}
