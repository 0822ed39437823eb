/**
 * Unit tests for wall-clock phase budgets
 */

import { describe, it, expect } from 'vitest'
import type { Checkpoint } from '../../checkpoint/checkpoint-schema.js'
import { createInitialCheckpoint } from '../../checkpoint/checkpoint-store-impl.js'
import { DEFAULT_PHASES } from '../../config/defaults.js'
import { isOverTimeBudget, phaseBudgetMs } from '../time-budget.js'
import { T0 } from './harness.js'

const MINUTE = 60_000

function qaStartedAt(start: Date): Checkpoint {
  const cp = createInitialCheckpoint(
    { name: 'todo-api', request: 'Build a todo API' },
    { sessionId: 'session-1', sessionBudget: 200_000, maxVerificationAttempts: 3 },
    T0
  )
  cp.phase = { current: 'phase4-qa', name: 'QA', startedAt: start.toISOString(), status: 'in-progress' }
  return cp
}

function after(minutes: number): Date {
  return new Date(T0.getTime() + minutes * MINUTE)
}

describe('phaseBudgetMs', () => {
  it('adds granted extensions to the configured budget', () => {
    const cp = qaStartedAt(T0)
    expect(phaseBudgetMs('phase4-qa', DEFAULT_PHASES, cp)).toBe(120 * MINUTE)
    cp.timeBudget['phase4-qa'] = { extensionMinutes: 30, proceedAsIs: false }
    expect(phaseBudgetMs('phase4-qa', DEFAULT_PHASES, cp)).toBe(150 * MINUTE)
  })

  it('is 0 when the gate is disabled', () => {
    const phases = { ...DEFAULT_PHASES, qa: { time_budget_minutes: 0 } }
    expect(phaseBudgetMs('phase4-qa', phases, qaStartedAt(T0))).toBe(0)
  })
})

describe('isOverTimeBudget', () => {
  it('trips only once the elapsed time exceeds the budget', () => {
    const cp = qaStartedAt(T0)
    expect(isOverTimeBudget(cp, DEFAULT_PHASES, after(120))).toBe(false)
    expect(isOverTimeBudget(cp, DEFAULT_PHASES, after(121))).toBe(true)
  })

  it('respects an extension and a proceed-as-is grant', () => {
    const cp = qaStartedAt(T0)
    cp.timeBudget['phase4-qa'] = { extensionMinutes: 30, proceedAsIs: false }
    expect(isOverTimeBudget(cp, DEFAULT_PHASES, after(140))).toBe(false)
    cp.timeBudget['phase4-qa'] = { extensionMinutes: 0, proceedAsIs: true }
    expect(isOverTimeBudget(cp, DEFAULT_PHASES, after(600))).toBe(false)
  })

  it('never trips for a phase that has not started', () => {
    const cp = qaStartedAt(T0)
    cp.phase.startedAt = null
    expect(isOverTimeBudget(cp, DEFAULT_PHASES, after(600))).toBe(false)
  })
})
