export type { WorkItemTracker, ItemSummary, ListItemsFilter } from './work-tracker.js'
export { KIND_LABEL_PREFIX, PRIORITY_LABEL_PREFIX } from './work-tracker.js'
export { InMemoryWorkItemTracker } from './memory-tracker.js'
export { GitHubWorkItemTracker } from './github-tracker.js'
export type { GitHubTrackerOptions } from './github-tracker.js'
export { createWorkItemTracker } from './tracker-factory.js'
export { FileWorkItemTracker } from './file-tracker.js'
export { TRACKER_FILE } from './tracker-factory.js'
export { itemLabels, parseItemLabels, itemBody } from './labels.js'
