/**
 * General utility helpers for phasewright
 */

import { randomUUID } from 'crypto'

/**
 * Format a duration in milliseconds to a human-readable string
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000)
    const seconds = Math.floor((ms % 60000) / 1000)
    return `${String(minutes)}m ${String(seconds)}s`
  }
  const hours = Math.floor(ms / 3600000)
  const minutes = Math.floor((ms % 3600000) / 60000)
  return `${String(hours)}h ${String(minutes)}m`
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Return `values` with `additions` merged in, keeping first-seen order and no duplicates.
 * Replaying the same union twice yields the same array.
 */
export function unionOrdered<T>(values: readonly T[], additions: readonly T[]): T[] {
  const seen = new Set(values)
  const result = [...values]
  for (const value of additions) {
    if (!seen.has(value)) {
      seen.add(value)
      result.push(value)
    }
  }
  return result
}

/** Return `values` without any member of `removals`, preserving order */
export function without<T>(values: readonly T[], removals: readonly T[]): T[] {
  const drop = new Set(removals)
  return values.filter((value) => !drop.has(value))
}
