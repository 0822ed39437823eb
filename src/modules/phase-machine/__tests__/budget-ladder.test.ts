/**
 * Tests for the budget ladder and session resource accounting.
 */

import { describe, it, expect } from 'vitest'
import { ResourceCeilingExceededError } from '../../../core/errors.js'
import { DEFAULT_BUDGET } from '../../config/defaults.js'
import type { ResourceTracking } from '../../checkpoint/checkpoint-schema.js'
import { planItem } from '../budget-ladder.js'
import { isApproachingLimit, mustSplitItem, startSession, trackResourceUsage } from '../resource-tracker.js'

function item(estimatedResource: number, complexityCategory: 'simple' | 'medium' | 'complex' = 'medium') {
  return { id: '7', estimatedResource, complexityCategory }
}

describe('planItem', () => {
  it('schedules items below proceed_max as a single unit', () => {
    expect(planItem(item(26_500, 'simple'), DEFAULT_BUDGET)).toEqual({ subUnits: 1 })
    expect(planItem(item(99_999), DEFAULT_BUDGET)).toEqual({ subUnits: 1 })
  })

  it('splits items between proceed_max and the ceiling into checkpointed sub-units', () => {
    expect(planItem(item(100_000), DEFAULT_BUDGET)).toEqual({ subUnits: 2 })
    expect(planItem(item(120_000), DEFAULT_BUDGET)).toEqual({ subUnits: 3 })
    expect(planItem(item(150_000), DEFAULT_BUDGET)).toEqual({ subUnits: 3 })
  })

  it('caps the sub-units at max_sub_units', () => {
    expect(planItem(item(150_000), { ...DEFAULT_BUDGET, max_sub_units: 2 })).toEqual({ subUnits: 2 })
  })

  it('refuses items above the ceiling', () => {
    expect(() => planItem(item(150_001), DEFAULT_BUDGET)).toThrow(ResourceCeilingExceededError)
  })

  it('refuses complex items whatever their estimate', () => {
    expect(() => planItem(item(30_000, 'complex'), DEFAULT_BUDGET)).toThrow(
      'Work item 7 cannot be scheduled directly: estimate=30000, ceiling=150000'
    )
  })
})

describe('resource tracking', () => {
  const fresh: ResourceTracking = {
    budget: 200_000,
    used: 0,
    lastUnitCost: 0,
    thresholdExceeded: false,
    currentItemUsed: 0,
    cumulativeUsed: 0,
  }

  it('is not approaching the limit at exactly 75%', () => {
    expect(isApproachingLimit(150_000, 200_000, 0.75)).toBe(false)
    expect(isApproachingLimit(150_001, 200_000, 0.75)).toBe(true)
  })

  it('sets thresholdExceeded only once usage passes the ratio', () => {
    const atEdge = trackResourceUsage(fresh, 150_000, 0.75)
    expect(atEdge.used).toBe(150_000)
    expect(atEdge.thresholdExceeded).toBe(false)

    const past = trackResourceUsage(atEdge, 1, 0.75)
    expect(past.used).toBe(150_001)
    expect(past.thresholdExceeded).toBe(true)
  })

  it('never decreases usage and ignores invalid costs', () => {
    const first = trackResourceUsage(fresh, 10_000, 0.75)
    const negative = trackResourceUsage(first, -500, 0.75)
    const nan = trackResourceUsage(negative, Number.NaN, 0.75)
    expect(negative.used).toBe(10_000)
    expect(nan.used).toBe(10_000)
    expect(nan.lastUnitCost).toBe(0)
    expect(nan.cumulativeUsed).toBe(10_000)
  })

  it('may go over the budget', () => {
    const over = trackResourceUsage(fresh, 250_000, 0.75)
    expect(over.used).toBe(250_000)
    expect(over.thresholdExceeded).toBe(true)
  })

  it('resets session usage on a new session but keeps the cumulative total', () => {
    const used = trackResourceUsage(fresh, 180_000, 0.75)
    const next = startSession(used, 250_000)
    expect(next).toEqual({
      budget: 250_000,
      used: 0,
      lastUnitCost: 0,
      thresholdExceeded: false,
      currentItemUsed: 180_000,
      cumulativeUsed: 180_000,
    })
  })

  it('splits an item once its own usage passes the ratio of the ceiling', () => {
    expect(mustSplitItem(112_500, 150_000, 0.75)).toBe(false)
    expect(mustSplitItem(112_501, 150_000, 0.75)).toBe(true)
  })
})
