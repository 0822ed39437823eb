export { FileCheckpointStore, createCheckpointStore, createInitialCheckpoint, CHECKPOINT_FILE, LOCK_FILE } from './checkpoint-store-impl.js'
export type { CheckpointStore, CheckpointMutation, InitializeOptions } from './checkpoint-store.js'
export * from './checkpoint-schema.js'
export { CheckpointMigrator, defaultCheckpointMigrator } from './checkpoint-migrator.js'
export { acquireLock, releaseLock, inspectLock, isLockStale } from './checkpoint-lock.js'
export type { LockInfo } from './checkpoint-lock.js'
