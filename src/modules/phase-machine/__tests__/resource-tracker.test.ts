/**
 * Unit tests for session resource accounting
 */

import { describe, it, expect } from 'vitest'
import type { ResourceTracking } from '../../checkpoint/checkpoint-schema.js'
import { isApproachingLimit, mustSplitItem, startSession, trackResourceUsage } from '../resource-tracker.js'

const fresh: ResourceTracking = {
  budget: 200_000,
  used: 0,
  lastUnitCost: 0,
  thresholdExceeded: false,
  currentItemUsed: 0,
  cumulativeUsed: 0,
}

describe('isApproachingLimit', () => {
  it('is strictly above the ratio', () => {
    expect(isApproachingLimit(150_000, 200_000, 0.75)).toBe(false)
    expect(isApproachingLimit(150_001, 200_000, 0.75)).toBe(true)
  })
})

describe('trackResourceUsage', () => {
  it('adds the cost to every counter', () => {
    const next = trackResourceUsage({ ...fresh, used: 100_000, currentItemUsed: 10_000, cumulativeUsed: 300_000 }, 60_000, 0.75)
    expect(next).toEqual({
      budget: 200_000,
      used: 160_000,
      lastUnitCost: 60_000,
      thresholdExceeded: true,
      currentItemUsed: 70_000,
      cumulativeUsed: 360_000,
    })
  })

  it('ignores negative and non-finite costs', () => {
    expect(trackResourceUsage(fresh, -5, 0.75).used).toBe(0)
    expect(trackResourceUsage(fresh, Number.NaN, 0.75).lastUnitCost).toBe(0)
  })

  it('lets usage pass the budget', () => {
    expect(trackResourceUsage({ ...fresh, used: 190_000 }, 30_000, 0.75).used).toBe(220_000)
  })
})

describe('startSession', () => {
  it('resets the session counters and keeps the cumulative total', () => {
    const used = trackResourceUsage(fresh, 170_000, 0.75)
    expect(startSession(used, 250_000)).toEqual({
      budget: 250_000,
      used: 0,
      lastUnitCost: 0,
      thresholdExceeded: false,
      currentItemUsed: 170_000,
      cumulativeUsed: 170_000,
    })
  })
})

describe('mustSplitItem', () => {
  it('splits once the item uses more than ratio times the ceiling', () => {
    expect(mustSplitItem(112_500, 150_000, 0.75)).toBe(false)
    expect(mustSplitItem(112_501, 150_000, 0.75)).toBe(true)
  })
})
