/**
 * CheckpointMigrator: registry and executor of checkpoint document migrations.
 *
 * Migrations are keyed as "N->M" strings (e.g. "1->2") and are applied
 * sequentially when migrating across multiple versions.
 */

import { copyFile } from 'fs/promises'

export interface MigrationResult {
  success: boolean
  fromVersion: number
  toVersion: number
  backupPath: string | null
  error?: string
}

export type MigrationFn = (document: Record<string, unknown>) => Record<string, unknown>

export class CheckpointMigrator {
  private readonly migrations: Map<string, MigrationFn> = new Map()

  /**
   * Register a migration function for the given version key.
   *
   * @param key - Migration key in format "N->M" (e.g. "1->2")
   */
  register(key: string, fn: MigrationFn): void {
    this.migrations.set(key, fn)
  }

  /** Whether every step from `fromVersion` to `toVersion` is registered */
  canMigrate(fromVersion: number, toVersion: number): boolean {
    if (fromVersion === toVersion) return true
    if (!Number.isInteger(fromVersion) || fromVersion > toVersion) return false
    for (let v = fromVersion; v < toVersion; v++) {
      if (!this.migrations.has(`${String(v)}->${String(v + 1)}`)) return false
    }
    return true
  }

  /**
   * Apply sequential migrations from fromVersion to toVersion.
   *
   * When filePath is provided, the original file is copied to
   * `${filePath}.bak.v${fromVersion}` before any step runs.
   */
  async migrate(
    document: Record<string, unknown>,
    fromVersion: number,
    toVersion: number,
    filePath?: string
  ): Promise<{ document: Record<string, unknown>; result: MigrationResult }> {
    if (fromVersion === toVersion) {
      return { document, result: { success: true, fromVersion, toVersion, backupPath: null } }
    }

    const steps: MigrationFn[] = []
    for (let v = fromVersion; v < toVersion; v++) {
      const key = `${String(v)}->${String(v + 1)}`
      const fn = this.migrations.get(key)
      if (fn === undefined) {
        return {
          document,
          result: {
            success: false,
            fromVersion,
            toVersion,
            backupPath: null,
            error: `Missing migration step "${key}"`,
          },
        }
      }
      steps.push(fn)
    }

    let backupPath: string | null = null
    if (filePath !== undefined) {
      backupPath = `${filePath}.bak.v${String(fromVersion)}`
      await copyFile(filePath, backupPath)
    }

    let current = document
    for (const step of steps) {
      current = step(current)
    }
    return { document: current, result: { success: true, fromVersion, toVersion, backupPath } }
  }
}

/** Registry used by the checkpoint store; no migrations exist for version 1 */
export const defaultCheckpointMigrator = new CheckpointMigrator()
