/**
 * Reconciliation of the checkpoint's work progress against the live tracker.
 *
 * The tracker is ground truth. Every difference between the recorded and the
 * live state of an item is resolved in the tracker's favour and returned as
 * a delta:
 *
 *   closed on the tracker             -> completed
 *   open on the tracker               -> open
 *   created outside the orchestrator  -> adopted with the default estimate, flagged
 *   deleted from the tracker          -> dropped from the registry, flagged
 *
 * An in-progress item that is no longer open is cleared so its work is not
 * duplicated.
 */

import type { ItemId } from '../../core/types.js'
import type { Checkpoint, ReconciliationDelta, ReconciliationLog } from '../checkpoint/checkpoint-schema.js'
import type { ComplexityAnalyzer } from '../complexity/complexity-analyzer.js'
import type { ComplexityConfig } from '../config/config-schema.js'
import type { ItemSummary } from '../work-tracker/work-tracker.js'
import { parseItemLabels } from '../work-tracker/labels.js'
import {
  addOpenItem,
  buildWorkItem,
  compareItemIds,
  flagItems,
  markCompleted,
  markOpen,
} from '../phase-machine/work-items.js'
import { without } from '../../utils/helpers.js'

type ItemStateLabel = ReconciliationDelta['from']

export interface ReconcileOptions {
  analyzer: ComplexityAnalyzer
  defaultEstimate: ComplexityConfig['default_estimate']
  now: Date
}

function recordedState(checkpoint: Checkpoint, id: ItemId): ItemStateLabel {
  if (checkpoint.workProgress.completedItems.includes(id)) return 'completed'
  if (checkpoint.workProgress.openItems.includes(id)) return 'open'
  return 'absent'
}

/**
 * Rewrite `checkpoint.workProgress` (in place) to match `live` and return the
 * log of what changed. Idempotent: a second run against the same tracker
 * state yields no deltas.
 */
export function reconcileWorkProgress(
  checkpoint: Checkpoint,
  live: readonly ItemSummary[],
  options: ReconcileOptions
): ReconciliationLog {
  const liveById = new Map(live.map((item) => [item.id, item]))
  const recordedIds = [...checkpoint.workProgress.completedItems, ...checkpoint.workProgress.openItems]
  const ids = [...new Set([...recordedIds, ...liveById.keys()])].sort(compareItemIds)
  const deltas: ReconciliationDelta[] = []
  const inProgressBefore = checkpoint.workProgress.inProgressItem

  for (const id of ids) {
    const from = recordedState(checkpoint, id)
    const summary = liveById.get(id)
    const to: ItemStateLabel = summary === undefined ? 'absent' : summary.state === 'closed' ? 'completed' : 'open'
    if (from === to) continue
    deltas.push({ itemId: id, from, to })

    if (summary === undefined) {
      const progress = checkpoint.workProgress
      progress.openItems = without(progress.openItems, [id])
      progress.completedItems = without(progress.completedItems, [id])
      if (progress.inProgressItem === id) progress.inProgressItem = null
      delete checkpoint.items[id]
      flagItems(checkpoint, [id])
      continue
    }

    if (from === 'absent') {
      const { kind, priority } = parseItemLabels(summary.labels)
      const estimate = { ...options.defaultEstimate }
      const item = buildWorkItem(id, { title: summary.title, kind, priority, estimate }, options.analyzer.score(estimate))
      addOpenItem(checkpoint, item)
      flagItems(checkpoint, [id])
    }

    if (to === 'completed') {
      markCompleted(checkpoint, id, null)
    } else {
      markOpen(checkpoint, id)
    }
  }

  let clearedInProgressItem: ItemId | null = null
  if (inProgressBefore !== null && !checkpoint.workProgress.openItems.includes(inProgressBefore)) {
    clearedInProgressItem = inProgressBefore
    checkpoint.workProgress.inProgressItem = null
    checkpoint.resourceTracking.currentItemUsed = 0
  }
  checkpoint.workProgress.totalItems = Object.keys(checkpoint.items).length

  return { at: options.now.toISOString(), deltas, clearedInProgressItem }
}

/** Human-readable reconciliation log */
export function renderReconciliationLog(log: ReconciliationLog): string {
  if (log.deltas.length === 0 && log.clearedInProgressItem === null) {
    return 'Reconciliation: checkpoint matches the tracker'
  }
  const lines = [`Reconciliation at ${log.at}: ${String(log.deltas.length)} change(s), tracker taken as ground truth`]
  for (const delta of log.deltas) {
    lines.push(`  #${delta.itemId}: ${delta.from} -> ${delta.to}`)
  }
  if (log.clearedInProgressItem !== null) {
    lines.push(`  In-progress item #${log.clearedInProgressItem} cleared; it is no longer open`)
  }
  return lines.join('\n')
}
