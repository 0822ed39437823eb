/**
 * File-backed CheckpointStore.
 *
 * Layout under the state directory:
 *   checkpoint.json      current document
 *   checkpoint.json.bak  document before the most recent write
 *   checkpoint.lock      holder of the single-process lock
 *
 * Writes go to a temp file that is renamed over the document, so a crash
 * leaves either the old or the new document, never a partial one.
 */

import { mkdir, readFile, writeFile, rename, copyFile, rm } from 'fs/promises'
import { join } from 'path'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { Mutex } from '../../utils/mutex.js'
import { PHASE_NAMES } from '../../core/types.js'
import {
  CorruptStateError,
  CheckpointNotFoundError,
  CheckpointExistsError,
  IncompatibleFormatError,
} from '../../core/errors.js'
import {
  CheckpointSchema,
  CHECKPOINT_VERSION,
  checkInvariants,
  type Checkpoint,
  type ProjectIdentity,
} from './checkpoint-schema.js'
import { defaultCheckpointMigrator, type CheckpointMigrator } from './checkpoint-migrator.js'
import { acquireLock, releaseLock } from './checkpoint-lock.js'
import type { CheckpointStore, CheckpointMutation, InitializeOptions } from './checkpoint-store.js'

const logger = createLogger('checkpoint')

export const CHECKPOINT_FILE = 'checkpoint.json'
export const LOCK_FILE = 'checkpoint.lock'

export interface FileCheckpointStoreOptions {
  /** Directory holding the checkpoint (e.g. <project>/.phasewright) */
  stateDir: string
  migrator?: CheckpointMigrator
  /** Clock used for timestamps */
  now?: () => Date
}

/**
 * Build the document for a freshly started project run.
 */
export function createInitialCheckpoint(
  identity: ProjectIdentity,
  options: InitializeOptions,
  now: Date
): Checkpoint {
  const at = now.toISOString()
  return {
    version: CHECKPOINT_VERSION,
    project: { name: identity.name, request: identity.request, startedAt: at, lastUpdated: at },
    session: { id: options.sessionId, startedAt: at },
    phase: { current: 'phase0-infra', name: PHASE_NAMES['phase0-infra'], startedAt: null, status: 'not-started' },
    phasesCompleted: [],
    phaseTimings: [],
    workProgress: {
      totalItems: 0,
      completedItems: [],
      inProgressItem: null,
      openItems: [],
      flaggedItems: [],
      deferredItems: [],
    },
    items: {},
    resourceTracking: {
      budget: options.sessionBudget,
      used: 0,
      lastUnitCost: 0,
      thresholdExceeded: false,
      currentItemUsed: 0,
      cumulativeUsed: 0,
    },
    verification: {
      attemptCount: 0,
      maxAttempts: options.maxVerificationAttempts,
      divergences: 0,
      lastAttemptAt: null,
      failureHistory: [],
      quarantinedTests: [],
      disclosedGaps: [],
      recentRuns: [],
    },
    qaCycles: 0,
    agentInvocations: [],
    artifacts: [],
    artifactsByPhase: {},
    resumeHint: 'Start Phase 0 (infrastructure)',
    pendingApproval: null,
    timeBudget: {},
    lastReconciliation: null,
  }
}

export class FileCheckpointStore implements CheckpointStore {
  readonly path: string
  private readonly _stateDir: string
  private readonly _lockPath: string
  private readonly _migrator: CheckpointMigrator
  private readonly _now: () => Date
  private readonly _mutex = new Mutex()

  constructor(options: FileCheckpointStoreOptions) {
    this._stateDir = options.stateDir
    this.path = join(options.stateDir, CHECKPOINT_FILE)
    this._lockPath = join(options.stateDir, LOCK_FILE)
    this._migrator = options.migrator ?? defaultCheckpointMigrator
    this._now = options.now ?? (() => new Date())
  }

  get backupPath(): string {
    return `${this.path}.bak`
  }

  async load(): Promise<Checkpoint | null> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new CorruptStateError(`Checkpoint at ${this.path} is not valid JSON: ${message}`, {
        path: this.path,
        backup: this.backupPath,
      })
    }

    if (!isPlainObject(parsed)) {
      throw new CorruptStateError(`Checkpoint at ${this.path} is not a JSON object`, { path: this.path })
    }

    const document = await this._migrateIfNeeded(parsed)
    return this._validate(document)
  }

  async requireCheckpoint(): Promise<Checkpoint> {
    const checkpoint = await this.load()
    if (checkpoint === null) throw new CheckpointNotFoundError(this.path)
    return checkpoint
  }

  async initialize(identity: ProjectIdentity, options: InitializeOptions): Promise<Checkpoint> {
    return this._mutex.withLock(async () => {
      if ((await this.load()) !== null) {
        throw new CheckpointExistsError(this.path)
      }
      const checkpoint = createInitialCheckpoint(identity, options, this._now())
      await this._write(checkpoint)
      logger.info({ project: identity.name, path: this.path }, 'Checkpoint initialised')
      return checkpoint
    })
  }

  async mutate(fn: CheckpointMutation): Promise<Checkpoint> {
    return this._mutex.withLock(async () => {
      const current = await this.requireCheckpoint()
      const next = fn(structuredClone(current))
      next.project.lastUpdated = this._now().toISOString()
      const validated = this._validate(next)
      await this._write(validated)
      return validated
    })
  }

  async delete(): Promise<void> {
    await this._mutex.withLock(async () => {
      await rm(this.path, { force: true })
      await rm(this.backupPath, { force: true })
      logger.warn({ path: this.path }, 'Checkpoint deleted')
    })
  }

  async lock(sessionId: string): Promise<void> {
    await mkdir(this._stateDir, { recursive: true })
    await acquireLock(this._lockPath, sessionId)
  }

  async unlock(): Promise<void> {
    await releaseLock(this._lockPath)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _validate(document: unknown): Checkpoint {
    const result = CheckpointSchema.safeParse(document)
    if (!result.success) {
      throw new CorruptStateError(`Checkpoint at ${this.path} failed validation`, {
        path: this.path,
        issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      })
    }
    const violations = checkInvariants(result.data)
    if (violations.length > 0) {
      throw new CorruptStateError(`Checkpoint at ${this.path} violates invariants`, {
        path: this.path,
        violations,
      })
    }
    return result.data
  }

  private async _migrateIfNeeded(document: Record<string, unknown>): Promise<Record<string, unknown>> {
    const version = document['version']
    if (version === CHECKPOINT_VERSION) return document
    if (typeof version !== 'number' || version > CHECKPOINT_VERSION) {
      throw new IncompatibleFormatError(
        `Checkpoint at ${this.path} has version ${String(version)}; this build reads version ${String(CHECKPOINT_VERSION)}`,
        { path: this.path, version }
      )
    }
    if (!this._migrator.canMigrate(version, CHECKPOINT_VERSION)) {
      throw new IncompatibleFormatError(`No migration path from checkpoint version ${String(version)}`, {
        path: this.path,
        version,
      })
    }
    const { document: migrated, result } = await this._migrator.migrate(
      document,
      version,
      CHECKPOINT_VERSION,
      this.path
    )
    if (!result.success) {
      throw new IncompatibleFormatError(result.error ?? 'Checkpoint migration failed', { path: this.path })
    }
    logger.info({ from: version, to: CHECKPOINT_VERSION, backup: result.backupPath }, 'Checkpoint migrated')
    return migrated
  }

  private async _write(checkpoint: Checkpoint): Promise<void> {
    await mkdir(this._stateDir, { recursive: true })
    const tmpPath = `${this.path}.tmp.${String(process.pid)}.${String(Date.now())}`
    await writeFile(tmpPath, JSON.stringify(checkpoint, null, 2) + '\n', 'utf-8')
    try {
      await copyFile(this.path, this.backupPath)
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        await rm(tmpPath, { force: true })
        throw err
      }
    }
    await rename(tmpPath, this.path)
  }
}

export function createCheckpointStore(options: FileCheckpointStoreOptions): FileCheckpointStore {
  return new FileCheckpointStore(options)
}
