/**
 * Encoding of work-item metadata as tracker labels and body text.
 */

import {
  PRIORITIES,
  WORK_ITEM_KINDS,
  type Priority,
  type WorkItemEstimate,
  type WorkItemKind,
} from '../../core/types.js'
import { KIND_LABEL_PREFIX, PRIORITY_LABEL_PREFIX } from './work-tracker.js'

/** Labels attached to an item the orchestrator creates */
export function itemLabels(label: string, kind: WorkItemKind, priority: Priority): string[] {
  return [label, `${KIND_LABEL_PREFIX}${kind}`, `${PRIORITY_LABEL_PREFIX}${priority}`]
}

/**
 * Read kind and priority back from tracker labels. Items created by hand
 * without them are treated as medium-priority features.
 */
export function parseItemLabels(labels: readonly string[]): { kind: WorkItemKind; priority: Priority } {
  let kind: WorkItemKind = 'feature'
  let priority: Priority = 'medium'
  for (const label of labels) {
    const k = WORK_ITEM_KINDS.find((candidate) => label === `${KIND_LABEL_PREFIX}${candidate}`)
    if (k !== undefined) kind = k
    const p = PRIORITIES.find((candidate) => label === `${PRIORITY_LABEL_PREFIX}${candidate}`)
    if (p !== undefined) priority = p
  }
  return { kind, priority }
}

/** Item body with the estimate appended in a fixed, greppable form */
export function itemBody(body: string, estimate: WorkItemEstimate): string {
  const line = `Estimate: files=${String(estimate.files)} loc=${String(estimate.loc)} dependencies=${String(estimate.dependencies)}`
  return body.trim() === '' ? line : `${body.trim()}\n\n${line}`
}
