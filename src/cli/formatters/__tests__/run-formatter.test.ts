/**
 * Unit tests for the run summary
 */

import { describe, it, expect } from 'vitest'
import { renderRunResult } from '../run-formatter.js'
import { createInitialCheckpoint } from '../../../modules/checkpoint/checkpoint-store-impl.js'
import type { Checkpoint } from '../../../modules/checkpoint/checkpoint-schema.js'

const T0 = new Date('2026-01-05T09:00:00.000Z')

function checkpoint(): Checkpoint {
  return createInitialCheckpoint(
    { name: 'todo-api', request: 'Build a todo API' },
    { sessionId: 'session-1', sessionBudget: 200_000, maxVerificationAttempts: 3 },
    T0
  )
}

describe('renderRunResult', () => {
  it('summarises a finished run', () => {
    const cp = checkpoint()
    cp.workProgress.completedItems = ['1', '2']
    expect(renderRunResult({ status: 'done', phase: 'done', reason: null, checkpoint: cp })).toBe(
      'Project todo-api complete: 2 item(s) done.'
    )
  })

  it('appends disclosed compromises', () => {
    const cp = checkpoint()
    cp.workProgress.completedItems = ['1']
    cp.workProgress.deferredItems = ['2']
    cp.verification.quarantinedTests = ['test_sync']
    cp.verification.disclosedGaps = [
      { kind: 'coverage', actual: 77, target: 80, attempt: 2, recordedAt: T0.toISOString() },
    ]
    expect(renderRunResult({ status: 'done', phase: 'done', reason: null, checkpoint: cp }).split('\n')).toEqual([
      'Project todo-api complete: 1 item(s) done.',
      '',
      'Disclosed compromises',
      '  Quarantined flaky tests: test_sync',
      '  Coverage gap: 77% against a target of 80% (attempt 2)',
      '  Deferred items: #2',
    ])
  })

  it('names the approval command while awaiting approval', () => {
    const cp = checkpoint()
    cp.pendingApproval = {
      kind: 'time-budget',
      phase: 'phase4-qa',
      requestedAt: T0.toISOString(),
      options: ['extend', 'reduce-scope', 'proceed'],
      reason: 'QA exceeded its time budget of 120 minute(s)',
    }
    expect(
      renderRunResult({
        status: 'awaiting-approval',
        phase: 'phase4-qa',
        reason: 'QA exceeded its time budget of 120 minute(s)',
        checkpoint: cp,
      })
    ).toBe(
      'Awaiting approval in QA: QA exceeded its time budget of 120 minute(s)\n  Run: phasewright approve <extend|reduce-scope|proceed>'
    )
  })

  it('explains how to continue a suspended run', () => {
    expect(
      renderRunResult({ status: 'suspended', phase: 'phase0-infra', reason: null, checkpoint: checkpoint() })
    ).toBe('Run suspended in Infrastructure: unknown reason\n  The checkpoint is intact. Run `phasewright resume` to continue.')
  })
})
