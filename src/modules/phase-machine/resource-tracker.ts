/**
 * Resource accounting for the session budget and the item in progress.
 */

import type { ResourceTracking } from '../checkpoint/checkpoint-schema.js'

/** True exactly when `used / budget` is strictly above `ratio` */
export function isApproachingLimit(used: number, budget: number, ratio: number): boolean {
  return used / budget > ratio
}

/**
 * Add the actual cost of one unit of work. `used` never decreases within a
 * session and may exceed `budget`.
 */
export function trackResourceUsage(tracking: ResourceTracking, cost: number, ratio: number): ResourceTracking {
  const amount = Number.isFinite(cost) && cost > 0 ? cost : 0
  const used = tracking.used + amount
  return {
    ...tracking,
    used,
    lastUnitCost: amount,
    thresholdExceeded: isApproachingLimit(used, tracking.budget, ratio),
    currentItemUsed: tracking.currentItemUsed + amount,
    cumulativeUsed: tracking.cumulativeUsed + amount,
  }
}

/** Start of a new session: the gating counter resets, the cumulative one does not */
export function startSession(tracking: ResourceTracking, budget: number): ResourceTracking {
  return { ...tracking, budget, used: 0, lastUnitCost: 0, thresholdExceeded: false }
}

/** Whether the item in progress has used enough of the ceiling that its remainder must be split off */
export function mustSplitItem(currentItemUsed: number, ceiling: number, ratio: number): boolean {
  return currentItemUsed > ceiling * ratio
}
