export { DatabaseWrapper, openDatabase, IN_MEMORY } from './database.js'
export { runMigrations } from './migrations/index.js'
export type { Migration } from './migrations/index.js'
export { insertProjectRecord, listProjectRecords, countProjectRecords } from './queries/project-records.js'
export { SqliteHistoryStore, HISTORY_DB_FILE } from './history-store.js'
