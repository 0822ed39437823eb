/**
 * WorkItemTracker persisted to a JSON file, for runs without GitHub access.
 * Survives restarts, so reconciliation behaves as it would against a real
 * tracker; edits made to the file by hand are picked up on the next call.
 */

import { readFile, writeFile, rename, mkdir } from 'fs/promises'
import { dirname } from 'path'
import { z } from 'zod'
import { ExternalCapabilityFailureError } from '../../core/errors.js'
import type { ItemId } from '../../core/types.js'
import { InMemoryWorkItemTracker, type TrackerSnapshot } from './memory-tracker.js'
import type { ItemSummary, ListItemsFilter, WorkItemTracker } from './work-tracker.js'

const SnapshotSchema = z.object({
  nextId: z.number().int().min(1),
  items: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      state: z.enum(['open', 'closed']),
      labels: z.array(z.string()),
      body: z.string(),
      comments: z.array(z.string()),
      evidence: z.string().nullable(),
    })
  ),
})

export class FileWorkItemTracker implements WorkItemTracker {
  private readonly _inner = new InMemoryWorkItemTracker()

  constructor(private readonly _path: string) {}

  async createItem(title: string, body: string, labels: string[]): Promise<ItemId> {
    await this._load()
    const id = await this._inner.createItem(title, body, labels)
    await this._save()
    return id
  }

  async closeItem(id: ItemId, evidence: string): Promise<void> {
    await this._load()
    await this._inner.closeItem(id, evidence)
    await this._save()
  }

  async listItems(filter?: ListItemsFilter): Promise<ItemSummary[]> {
    await this._load()
    return this._inner.listItems(filter)
  }

  async comment(id: ItemId, body: string): Promise<void> {
    await this._load()
    await this._inner.comment(id, body)
    await this._save()
  }

  private async _load(): Promise<void> {
    let raw: string
    try {
      raw = await readFile(this._path, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        this._inner.restore({ nextId: 1, items: [] })
        return
      }
      throw new ExternalCapabilityFailureError(`Cannot read tracker file ${this._path}`, { path: this._path })
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      throw new ExternalCapabilityFailureError(`Tracker file ${this._path} is not valid JSON`, { path: this._path })
    }
    const result = SnapshotSchema.safeParse(parsed)
    if (!result.success) {
      throw new ExternalCapabilityFailureError(`Tracker file ${this._path} has an unexpected shape`, {
        path: this._path,
        issues: result.error.issues,
      })
    }
    this._inner.restore(result.data)
  }

  private async _save(): Promise<void> {
    const snapshot: TrackerSnapshot = this._inner.snapshot()
    await mkdir(dirname(this._path), { recursive: true })
    const tmpPath = `${this._path}.tmp.${String(process.pid)}`
    await writeFile(tmpPath, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8')
    await rename(tmpPath, this._path)
  }
}
