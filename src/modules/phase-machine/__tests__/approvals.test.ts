/**
 * Tests for time-budget gating and the resolution of pending approvals.
 */

import { describe, it, expect } from 'vitest'
import { ApprovalRequiredError } from '../../../core/errors.js'
import type { Checkpoint } from '../../checkpoint/checkpoint-schema.js'
import { createInitialCheckpoint } from '../../checkpoint/checkpoint-store-impl.js'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import { applyApproval, DIVERGENCE_OPTIONS, TIME_BUDGET_OPTIONS } from '../approvals.js'
import { isOverTimeBudget, phaseBudgetMs } from '../time-budget.js'
import { addOpenItem, buildWorkItem } from '../work-items.js'
import { T0 } from './harness.js'

function checkpoint(): Checkpoint {
  return createInitialCheckpoint(
    { name: 'todo-api', request: 'Build a todo API' },
    { sessionId: 'session-1', sessionBudget: 200_000, maxVerificationAttempts: 3 },
    T0
  )
}

function minutesAfterT0(minutes: number): Date {
  return new Date(T0.getTime() + minutes * 60_000)
}

function inImplementation(): Checkpoint {
  const cp = checkpoint()
  cp.phase = { current: 'phase3-implementation', name: 'Implementation', startedAt: T0.toISOString(), status: 'in-progress' }
  const assessment = { score: 200, category: 'simple' as const, estimatedResource: 26_500 }
  const estimate = { files: 1, loc: 100, dependencies: 0 }
  addOpenItem(cp, buildWorkItem('1', { title: 'Auth', kind: 'feature', priority: 'critical', estimate }, assessment))
  addOpenItem(cp, buildWorkItem('2', { title: 'Export', kind: 'feature', priority: 'medium', estimate }, assessment))
  addOpenItem(cp, buildWorkItem('3', { title: 'Themes', kind: 'feature', priority: 'low', estimate }, assessment))
  cp.workProgress.inProgressItem = '2'
  cp.pendingApproval = {
    kind: 'time-budget',
    phase: 'phase3-implementation',
    requestedAt: T0.toISOString(),
    options: TIME_BUDGET_OPTIONS,
    reason: 'Implementation exceeded its time budget of 480 minute(s)',
  }
  return cp
}

function diverged(): Checkpoint {
  const cp = checkpoint()
  cp.phase = { current: 'phase5-verification', name: 'Verification', startedAt: T0.toISOString(), status: 'divergence' }
  cp.verification.attemptCount = 3
  cp.verification.divergences = 1
  cp.verification.failureHistory.push({
    attempt: 3,
    message: '1 failing test(s): t1',
    timestamp: T0.toISOString(),
    failingTests: ['t1'],
    failingItems: ['4'],
  })
  cp.pendingApproval = {
    kind: 'divergence',
    phase: 'phase5-verification',
    requestedAt: T0.toISOString(),
    options: DIVERGENCE_OPTIONS,
    reason: 'Verification failed 3 of 3 attempts',
  }
  return cp
}

describe('time budgets', () => {
  it('computes the budget of a phase including extensions', () => {
    const cp = checkpoint()
    expect(phaseBudgetMs('phase0-infra', DEFAULT_CONFIG.phases, cp)).toBe(1_800_000)
    cp.timeBudget['phase0-infra'] = { extensionMinutes: 30, proceedAsIs: false }
    expect(phaseBudgetMs('phase0-infra', DEFAULT_CONFIG.phases, cp)).toBe(3_600_000)
  })

  it('treats a zero budget as disabled', () => {
    const phases = { ...DEFAULT_CONFIG.phases, infra: { time_budget_minutes: 0 } }
    const cp = checkpoint()
    cp.phase.startedAt = T0.toISOString()
    expect(phaseBudgetMs('phase0-infra', phases, cp)).toBe(0)
    expect(isOverTimeBudget(cp, phases, minutesAfterT0(10_000))).toBe(false)
  })

  it('is over budget only once the elapsed time exceeds it', () => {
    const cp = checkpoint()
    cp.phase.startedAt = T0.toISOString()
    expect(isOverTimeBudget(cp, DEFAULT_CONFIG.phases, minutesAfterT0(30))).toBe(false)
    expect(isOverTimeBudget(cp, DEFAULT_CONFIG.phases, minutesAfterT0(31))).toBe(true)
  })

  it('is never over budget before the phase starts or after proceed', () => {
    const cp = checkpoint()
    expect(isOverTimeBudget(cp, DEFAULT_CONFIG.phases, minutesAfterT0(600))).toBe(false)
    cp.phase.startedAt = T0.toISOString()
    cp.timeBudget['phase0-infra'] = { extensionMinutes: 0, proceedAsIs: true }
    expect(isOverTimeBudget(cp, DEFAULT_CONFIG.phases, minutesAfterT0(600))).toBe(false)
  })
})

describe('applyApproval', () => {
  it('rejects a decision when nothing is pending', () => {
    expect(() => applyApproval(checkpoint(), 'extend', DEFAULT_CONFIG, T0)).toThrow(ApprovalRequiredError)
  })

  it('rejects a decision the pending approval does not offer', () => {
    expect(() => applyApproval(inImplementation(), 'narrow-scope', DEFAULT_CONFIG, T0)).toThrow(
      '"narrow-scope" is not an option for the pending time-budget approval; choose one of: extend, reduce-scope, proceed'
    )
  })

  it('extend grants another full budget of the phase', () => {
    const cp = applyApproval(inImplementation(), 'extend', DEFAULT_CONFIG, T0)
    expect(cp.timeBudget['phase3-implementation']).toEqual({ extensionMinutes: 480, proceedAsIs: false })
    expect(cp.pendingApproval).toBeNull()
    expect(cp.resumeHint).toBe('Approved "extend" at 2026-01-05T09:00:00.000Z; continue with Implementation')
  })

  it('proceed lifts the time gate for the phase', () => {
    const cp = applyApproval(inImplementation(), 'proceed', DEFAULT_CONFIG, T0)
    expect(cp.timeBudget['phase3-implementation']).toEqual({ extensionMinutes: 0, proceedAsIs: true })
  })

  it('reduce-scope defers lower-priority items except the one in progress', () => {
    const cp = applyApproval(inImplementation(), 'reduce-scope', DEFAULT_CONFIG, T0)
    expect(cp.workProgress.deferredItems).toEqual(['3'])
    expect(cp.workProgress.openItems).toEqual(['1', '2', '3'])
  })

  it('narrow-scope defers the failing items and moves on to learning', () => {
    const cp = applyApproval(diverged(), 'narrow-scope', DEFAULT_CONFIG, T0)
    expect(cp.workProgress.deferredItems).toEqual(['4'])
    expect(cp.verification.attemptCount).toBe(0)
    expect(cp.phasesCompleted).toEqual(['phase5-verification'])
    expect(cp.phase.current).toBe('phase6-learning')
    expect(cp.phase.status).toBe('not-started')
  })

  it('relax-threshold allows one more attempt', () => {
    const cp = applyApproval(diverged(), 'relax-threshold', DEFAULT_CONFIG, T0)
    expect(cp.verification.maxAttempts).toBe(4)
    expect(cp.verification.attemptCount).toBe(4)
    expect(cp.phase.current).toBe('phase3-implementation')
  })

  it('manual-intervention restarts verification at attempt 1', () => {
    const cp = applyApproval(diverged(), 'manual-intervention', DEFAULT_CONFIG, T0)
    expect(cp.verification.attemptCount).toBe(1)
    expect(cp.phase.current).toBe('phase5-verification')
    expect(cp.pendingApproval).toBeNull()
  })
})
