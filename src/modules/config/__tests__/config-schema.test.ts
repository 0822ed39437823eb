/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  PhasewrightConfigSchema,
  PartialPhasewrightConfigSchema,
  BudgetConfigSchema,
  VerificationConfigSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG, DEFAULT_BUDGET } from '../defaults.js'

describe('PhasewrightConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(PhasewrightConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects unknown config_format_version', () => {
    const result = PhasewrightConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '99' })
    expect(result.success).toBe(false)
  })

  it('rejects unknown top-level sections', () => {
    const result = PhasewrightConfigSchema.safeParse({ ...DEFAULT_CONFIG, providers: {} })
    expect(result.success).toBe(false)
  })
})

describe('BudgetConfigSchema', () => {
  it('requires the ceiling to be at least proceed_max', () => {
    const result = BudgetConfigSchema.safeParse({ ...DEFAULT_BUDGET, ceiling: 90_000 })
    expect(result.success).toBe(false)
  })

  it('rejects a split ratio above 1', () => {
    const result = BudgetConfigSchema.safeParse({ ...DEFAULT_BUDGET, split_ratio: 1.5 })
    expect(result.success).toBe(false)
  })
})

describe('VerificationConfigSchema', () => {
  it('requires at least one attempt', () => {
    const result = VerificationConfigSchema.safeParse({ ...DEFAULT_CONFIG.verification, max_attempts: 0 })
    expect(result.success).toBe(false)
  })
})

describe('PartialPhasewrightConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(PartialPhasewrightConfigSchema.safeParse({}).success).toBe(true)
  })

  it('accepts a single nested override', () => {
    const result = PartialPhasewrightConfigSchema.safeParse({ phases: { implementation: { time_budget_minutes: 90 } } })
    expect(result.success).toBe(true)
  })

  it('rejects a wrongly typed override', () => {
    const result = PartialPhasewrightConfigSchema.safeParse({ budget: { ceiling: 'lots' } })
    expect(result.success).toBe(false)
  })
})
