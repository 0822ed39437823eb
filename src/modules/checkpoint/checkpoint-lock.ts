/**
 * Process lock guarding a project's checkpoint.
 *
 * At most one orchestration process may drive a checkpoint. The lock file is
 * created exclusively; a lock whose holder process is gone is reclaimed.
 */

import { open, readFile, unlink } from 'fs/promises'
import { hostname } from 'os'
import { z } from 'zod'
import { CheckpointLockedError, CorruptStateError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('checkpoint:lock')

export const LockInfoSchema = z.object({
  pid: z.number().int().positive(),
  host: z.string(),
  sessionId: z.string(),
  acquiredAt: z.string(),
})

export type LockInfo = z.infer<typeof LockInfoSchema>

/**
 * Whether a process with the given PID is running.
 * Signal 0 checks for existence without signalling.
 */
export function isPidRunning(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: exists but belongs to another user
    return error instanceof Error && 'code' in error && error.code === 'EPERM'
  }
}

/** A lock is stale when it was taken on this host by a process that has exited */
export function isLockStale(lock: LockInfo, pidRunning: (pid: number) => boolean = isPidRunning): boolean {
  return lock.host === hostname() && !pidRunning(lock.pid)
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

async function readLock(lockPath: string): Promise<LockInfo | null> {
  let raw: string
  try {
    raw = await readFile(lockPath, 'utf-8')
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) return null
    throw error
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new CorruptStateError(`Lock file ${lockPath} contains invalid JSON. Delete it and retry.`, { lockPath })
  }
  const result = LockInfoSchema.safeParse(parsed)
  if (!result.success) {
    throw new CorruptStateError(`Lock file ${lockPath} has an invalid structure. Delete it and retry.`, {
      lockPath,
      issues: result.error.issues,
    })
  }
  return result.data
}

async function createExclusive(lockPath: string, info: LockInfo): Promise<boolean> {
  try {
    const handle = await open(lockPath, 'wx')
    try {
      await handle.writeFile(JSON.stringify(info, null, 2), 'utf-8')
    } finally {
      await handle.close()
    }
    return true
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) return false
    throw error
  }
}

/**
 * Acquire the checkpoint lock for `sessionId`.
 *
 * @throws {CheckpointLockedError} if a live process holds the lock
 */
export async function acquireLock(
  lockPath: string,
  sessionId: string,
  pidRunning: (pid: number) => boolean = isPidRunning
): Promise<LockInfo> {
  const info: LockInfo = {
    pid: process.pid,
    host: hostname(),
    sessionId,
    acquiredAt: new Date().toISOString(),
  }

  if (await createExclusive(lockPath, info)) return info

  const existing = await readLock(lockPath)
  if (existing !== null) {
    if (existing.pid === process.pid && existing.host === info.host) {
      return existing
    }
    if (!isLockStale(existing, pidRunning)) {
      throw new CheckpointLockedError(lockPath, existing)
    }
    logger.warn({ holder: existing }, 'Reclaiming stale checkpoint lock')
    await unlink(lockPath)
  }

  if (await createExclusive(lockPath, info)) return info
  const winner = await readLock(lockPath)
  throw new CheckpointLockedError(lockPath, winner ?? {})
}

/**
 * Release the lock if this process holds it. A missing lock is not an error.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  const existing = await readLock(lockPath)
  if (existing === null) return
  if (existing.pid === process.pid && existing.host === hostname()) {
    await unlink(lockPath)
  }
}

/** Current lock holder, if any */
export async function inspectLock(lockPath: string): Promise<LockInfo | null> {
  return readLock(lockPath)
}
