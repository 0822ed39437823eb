/**
 * WorkItemTracker: the narrow interface the orchestrator uses to reach an
 * external issue tracker. Any backend satisfying it is substitutable.
 */

import type { ItemId, WorkItemState } from '../../core/types.js'

export interface ItemSummary {
  id: ItemId
  title: string
  state: WorkItemState
  labels: string[]
}

export interface ListItemsFilter {
  /** Defaults to all states */
  state?: WorkItemState
  /** Items must carry every listed label */
  labels?: string[]
}

export interface WorkItemTracker {
  createItem(title: string, body: string, labels: string[]): Promise<ItemId>
  /** Close an item, recording a reference to the evidence that completed it */
  closeItem(id: ItemId, evidence: string): Promise<void>
  listItems(filter?: ListItemsFilter): Promise<ItemSummary[]>
  comment(id: ItemId, body: string): Promise<void>
}

/** Label prefixes used to encode item metadata on the tracker */
export const KIND_LABEL_PREFIX = 'kind:'
export const PRIORITY_LABEL_PREFIX = 'priority:'
