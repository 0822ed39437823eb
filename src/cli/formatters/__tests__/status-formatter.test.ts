/**
 * Unit tests for the status formatter
 */

import { describe, it, expect } from 'vitest'
import { renderStatusHuman } from '../status-formatter.js'
import type { StatusSnapshot } from '../../types/status.js'

function snapshot(overrides: Partial<StatusSnapshot> = {}): StatusSnapshot {
  return {
    project: 'todo-api',
    request: 'Build a todo API',
    sessionId: 'session-1',
    lastUpdated: '2026-01-05T10:00:00.000Z',
    phase: { current: 'phase3-implementation', name: 'Implementation', status: 'in-progress', startedAt: null },
    phasesCompleted: ['phase0-infra', 'phase1-definition', 'phase1.5-decomposition', 'phase2-architecture'],
    items: { total: 12, open: 10, completed: 2, inProgress: '3', flagged: 1, deferred: 0 },
    resources: { used: 160_000, budget: 200_000, cumulativeUsed: 160_000, thresholdExceeded: true },
    verification: { attemptCount: 0, maxAttempts: 3, divergences: 0, quarantinedTests: [] },
    qaCycles: 0,
    pendingApproval: null,
    resumeHint: 'Continue item #3',
    ...overrides,
  }
}

describe('renderStatusHuman', () => {
  it('renders an in-progress run', () => {
    expect(renderStatusHuman(snapshot()).split('\n')).toEqual([
      'Project todo-api  Phase: Implementation  Status: in-progress',
      '',
      'Open  Completed  Flagged  Deferred  Total',
      '----  ---------  -------  --------  -----',
      '10    2          1        0         12',
      '',
      'In progress: #3',
      'Session resources: 160000 / 200000 (approaching limit)',
      'Verification attempts: 0 / 3',
      '',
      'Next: Continue item #3',
    ])
  })

  it('lists quarantined tests and the pending approval', () => {
    const text = renderStatusHuman(
      snapshot({
        items: { total: 2, open: 0, completed: 2, inProgress: null, flagged: 0, deferred: 0 },
        resources: { used: 20_000, budget: 200_000, cumulativeUsed: 20_000, thresholdExceeded: false },
        verification: { attemptCount: 3, maxAttempts: 3, divergences: 1, quarantinedTests: ['test_sync'] },
        pendingApproval: {
          kind: 'divergence',
          options: ['narrow-scope', 'relax-threshold', 'manual-intervention'],
          reason: 'Verification failed 3 of 3 attempts',
        },
      })
    )
    const lines = text.split('\n')
    expect(lines).not.toContain('In progress: #3')
    expect(lines.slice(6)).toEqual([
      'Session resources: 20000 / 200000',
      'Verification attempts: 3 / 3',
      'Quarantined tests: test_sync',
      '',
      'Awaiting approval (divergence): Verification failed 3 of 3 attempts',
      '  phasewright approve <narrow-scope|relax-threshold|manual-intervention>',
      '',
      'Next: Continue item #3',
    ])
  })
})
