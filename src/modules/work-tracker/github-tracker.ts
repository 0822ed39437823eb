/**
 * WorkItemTracker backed by GitHub issues through the `gh` CLI.
 *
 * Authentication is whatever `gh` is logged in with; tokens never pass
 * through this process's arguments.
 */

import { z } from 'zod'
import { ExternalCapabilityFailureError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { runCommand, type CommandRunner } from '../../utils/process.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { ItemId } from '../../core/types.js'
import type { ItemSummary, ListItemsFilter, WorkItemTracker } from './work-tracker.js'

const logger = createLogger('tracker:github')

const GhIssueListSchema = z.array(
  z.object({
    number: z.number().int(),
    title: z.string(),
    state: z.string(),
    labels: z.array(z.object({ name: z.string() })),
  })
)

export interface GitHubTrackerOptions {
  /** owner/name; omitted means the repository of `cwd` */
  repo?: string
  cwd?: string
  runner?: CommandRunner
  /** Upper bound on issues fetched by listItems */
  listLimit?: number
}

export class GitHubWorkItemTracker implements WorkItemTracker {
  private readonly _repo: string | undefined
  private readonly _cwd: string | undefined
  private readonly _run: CommandRunner
  private readonly _listLimit: number

  constructor(options: GitHubTrackerOptions = {}) {
    this._repo = options.repo
    this._cwd = options.cwd
    this._run = options.runner ?? runCommand
    this._listLimit = options.listLimit ?? 1000
  }

  async createItem(title: string, body: string, labels: string[]): Promise<ItemId> {
    const args = ['issue', 'create', '--title', title, '--body', body]
    for (const label of labels) args.push('--label', label)
    const stdout = await this._gh('createItem', args)
    // gh prints the new issue URL: https://github.com/<owner>/<repo>/issues/<n>
    const match = /\/issues\/(\d+)\s*$/.exec(stdout.trim())
    if (match?.[1] === undefined) {
      throw new ExternalCapabilityFailureError('Could not read the issue number from gh output', {
        operation: 'createItem',
        output: maskSecrets(stdout),
      })
    }
    logger.debug({ id: match[1], title }, 'Issue created')
    return match[1]
  }

  async closeItem(id: ItemId, evidence: string): Promise<void> {
    await this._gh('closeItem', ['issue', 'close', id, '--comment', evidence])
  }

  async listItems(filter: ListItemsFilter = {}): Promise<ItemSummary[]> {
    const args = [
      'issue',
      'list',
      '--state',
      filter.state ?? 'all',
      '--limit',
      String(this._listLimit),
      '--json',
      'number,title,state,labels',
    ]
    for (const label of filter.labels ?? []) args.push('--label', label)
    const stdout = await this._gh('listItems', args)

    let raw: unknown
    try {
      raw = JSON.parse(stdout)
    } catch {
      throw new ExternalCapabilityFailureError('gh issue list returned invalid JSON', { operation: 'listItems' })
    }
    const parsed = GhIssueListSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ExternalCapabilityFailureError('gh issue list returned an unexpected shape', {
        operation: 'listItems',
        issues: parsed.error.issues,
      })
    }
    return parsed.data.map((issue) => ({
      id: String(issue.number),
      title: issue.title,
      state: issue.state.toUpperCase() === 'OPEN' ? 'open' : 'closed',
      labels: issue.labels.map((l) => l.name),
    }))
  }

  async comment(id: ItemId, body: string): Promise<void> {
    await this._gh('comment', ['issue', 'comment', id, '--body', body])
  }

  private async _gh(operation: string, args: string[]): Promise<string> {
    const fullArgs = this._repo !== undefined ? [...args, '--repo', this._repo] : args
    const result = await this._run('gh', fullArgs, { cwd: this._cwd })
    if (result.code !== 0) {
      throw new ExternalCapabilityFailureError(`gh ${args.slice(0, 2).join(' ')} failed: ${maskSecrets(result.stderr)}`, {
        operation,
        exitCode: result.code,
      })
    }
    return result.stdout
  }
}
