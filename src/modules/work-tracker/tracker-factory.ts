/**
 * Build the configured WorkItemTracker.
 */

import { join } from 'path'
import type { TrackerConfig } from '../config/config-schema.js'
import { FileWorkItemTracker } from './file-tracker.js'
import { GitHubWorkItemTracker } from './github-tracker.js'
import { InMemoryWorkItemTracker } from './memory-tracker.js'
import type { WorkItemTracker } from './work-tracker.js'

export const TRACKER_FILE = 'tracker.json'

export function createWorkItemTracker(config: TrackerConfig, projectRoot: string, stateDir: string): WorkItemTracker {
  switch (config.kind) {
    case 'memory':
      return new InMemoryWorkItemTracker()
    case 'file':
      return new FileWorkItemTracker(join(stateDir, TRACKER_FILE))
    case 'github':
      return new GitHubWorkItemTracker({ repo: config.repo, cwd: projectRoot })
  }
}
