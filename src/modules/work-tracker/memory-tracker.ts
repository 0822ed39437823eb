/**
 * In-process WorkItemTracker backing `tracker.kind: memory` and tests.
 *
 * Besides the tracker contract it exposes the external edits a human or an
 * agent could make on a real tracker, so reconciliation can be exercised.
 */

import { ExternalCapabilityFailureError } from '../../core/errors.js'
import type { ItemId, WorkItemState } from '../../core/types.js'
import type { ItemSummary, ListItemsFilter, WorkItemTracker } from './work-tracker.js'

export interface StoredItem extends ItemSummary {
  body: string
  comments: string[]
  evidence: string | null
}

/** Serialisable tracker contents */
export interface TrackerSnapshot {
  nextId: number
  items: StoredItem[]
}

export class InMemoryWorkItemTracker implements WorkItemTracker {
  private readonly _items = new Map<ItemId, StoredItem>()
  private _nextId = 1
  private _unavailable = false

  async createItem(title: string, body: string, labels: string[]): Promise<ItemId> {
    this._assertAvailable('createItem')
    const id = String(this._nextId++)
    this._items.set(id, { id, title, state: 'open', labels: [...labels], body, comments: [], evidence: null })
    return id
  }

  async closeItem(id: ItemId, evidence: string): Promise<void> {
    this._assertAvailable('closeItem')
    const item = this._require(id)
    item.state = 'closed'
    item.evidence = evidence
  }

  async listItems(filter: ListItemsFilter = {}): Promise<ItemSummary[]> {
    this._assertAvailable('listItems')
    const labels = filter.labels ?? []
    return [...this._items.values()]
      .filter((item) => filter.state === undefined || item.state === filter.state)
      .filter((item) => labels.every((label) => item.labels.includes(label)))
      .map(({ id, title, state, labels: itemLabels }) => ({ id, title, state, labels: [...itemLabels] }))
  }

  async comment(id: ItemId, body: string): Promise<void> {
    this._assertAvailable('comment')
    this._require(id).comments.push(body)
  }

  // ---------------------------------------------------------------------------
  // External edits
  // ---------------------------------------------------------------------------

  /** Change an item's state as if edited on the tracker directly */
  setState(id: ItemId, state: WorkItemState): void {
    this._require(id).state = state
  }

  /** Remove an item as if deleted on the tracker directly */
  remove(id: ItemId): void {
    this._items.delete(id)
  }

  /** Make every call fail until switched back */
  setUnavailable(unavailable: boolean): void {
    this._unavailable = unavailable
  }

  /** Stored item with its body, comments and evidence */
  get(id: ItemId): Readonly<StoredItem> | undefined {
    return this._items.get(id)
  }

  snapshot(): TrackerSnapshot {
    return { nextId: this._nextId, items: [...this._items.values()].map((item) => structuredClone(item)) }
  }

  restore(snapshot: TrackerSnapshot): void {
    this._items.clear()
    for (const item of snapshot.items) this._items.set(item.id, structuredClone(item))
    this._nextId = snapshot.nextId
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _assertAvailable(operation: string): void {
    if (this._unavailable) {
      throw new ExternalCapabilityFailureError(`Work tracker unavailable during ${operation}`, { operation })
    }
  }

  private _require(id: ItemId): StoredItem {
    const item = this._items.get(id)
    if (item === undefined) {
      throw new ExternalCapabilityFailureError(`Work item ${id} not found on tracker`, { id })
    }
    return item
  }
}
