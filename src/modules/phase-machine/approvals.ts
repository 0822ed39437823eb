/**
 * Resolution of pending approvals.
 *
 * Time-budget overruns offer extend / reduce-scope / proceed; verification
 * divergence offers narrow-scope / relax-threshold / manual-intervention.
 */

import { ApprovalRequiredError } from '../../core/errors.js'
import { PHASE_CAPABILITY, PHASE_NAMES } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { unionOrdered } from '../../utils/helpers.js'
import type { ApprovalDecision, Checkpoint, PendingApproval } from '../checkpoint/checkpoint-schema.js'
import type { PhasewrightConfig } from '../config/config-schema.js'
import { schedulableItems } from './work-items.js'

const logger = createLogger('approvals')

export const TIME_BUDGET_OPTIONS: ApprovalDecision[] = ['extend', 'reduce-scope', 'proceed']
export const DIVERGENCE_OPTIONS: ApprovalDecision[] = ['narrow-scope', 'relax-threshold', 'manual-intervention']

/**
 * The pending approval of `checkpoint`, provided `decision` is one of its options.
 *
 * @throws {ApprovalRequiredError} if nothing awaits approval or the decision is not offered
 */
export function pendingApprovalFor(checkpoint: Checkpoint, decision: ApprovalDecision): PendingApproval {
  const pending = checkpoint.pendingApproval
  if (pending === null) {
    throw new ApprovalRequiredError('No decision is pending for this project', { decision })
  }
  if (!pending.options.includes(decision)) {
    throw new ApprovalRequiredError(
      `"${decision}" is not an option for the pending ${pending.kind} approval; choose one of: ${pending.options.join(', ')}`,
      { decision, options: pending.options }
    )
  }
  return pending
}

/**
 * Apply `decision` to the pending approval of `checkpoint` (modified in place).
 * `relax-threshold` only reroutes the run; the fix items for the last failure
 * are created by the caller, which has the tracker.
 *
 * @throws {ApprovalRequiredError} if nothing awaits approval or the decision is not offered
 */
export function applyApproval(
  checkpoint: Checkpoint,
  decision: ApprovalDecision,
  config: PhasewrightConfig,
  now: Date
): Checkpoint {
  const pending = pendingApprovalFor(checkpoint, decision)
  const phase = pending.phase
  const grant = checkpoint.timeBudget[phase] ?? { extensionMinutes: 0, proceedAsIs: false }
  const progress = checkpoint.workProgress
  const verification = checkpoint.verification

  switch (decision) {
    case 'extend':
      checkpoint.timeBudget[phase] = {
        ...grant,
        extensionMinutes: grant.extensionMinutes + config.phases[PHASE_CAPABILITY[phase]].time_budget_minutes,
      }
      break
    case 'proceed':
      checkpoint.timeBudget[phase] = { ...grant, proceedAsIs: true }
      break
    case 'reduce-scope': {
      checkpoint.timeBudget[phase] = { ...grant, proceedAsIs: true }
      if (phase === 'phase3-implementation') {
        const cut = schedulableItems(checkpoint)
          .filter((item) => item.id !== progress.inProgressItem)
          .filter((item) => item.priority === 'medium' || item.priority === 'low')
          .map((item) => item.id)
        progress.deferredItems = unionOrdered(progress.deferredItems, cut)
        logger.warn({ deferred: cut }, 'Scope reduced: lower-priority items deferred')
      } else if (phase === 'phase4-qa') {
        checkpoint.qaCycles = config.qa.max_cycles
      }
      break
    }
    case 'narrow-scope': {
      const lastFailure = verification.failureHistory[verification.failureHistory.length - 1]
      const failing = lastFailure?.failingItems ?? []
      progress.deferredItems = unionOrdered(progress.deferredItems, failing)
      verification.attemptCount = 0
      checkpoint.phasesCompleted = unionOrdered(checkpoint.phasesCompleted, ['phase5-verification'])
      checkpoint.phase = {
        current: 'phase6-learning',
        name: PHASE_NAMES['phase6-learning'],
        startedAt: null,
        status: 'not-started',
      }
      logger.warn({ deferred: failing }, 'Scope narrowed after divergence; failing items deferred')
      break
    }
    case 'relax-threshold':
      verification.maxAttempts += 1
      verification.attemptCount = Math.min(verification.attemptCount + 1, verification.maxAttempts)
      checkpoint.phase = {
        current: 'phase3-implementation',
        name: PHASE_NAMES['phase3-implementation'],
        startedAt: null,
        status: 'not-started',
      }
      break
    case 'manual-intervention':
      verification.attemptCount = 1
      checkpoint.phase = {
        current: 'phase5-verification',
        name: PHASE_NAMES['phase5-verification'],
        startedAt: null,
        status: 'not-started',
      }
      break
  }

  checkpoint.pendingApproval = null
  checkpoint.resumeHint = `Approved "${decision}" at ${now.toISOString()}; continue with ${PHASE_NAMES[checkpoint.phase.current]}`
  logger.info({ kind: pending.kind, phase, decision }, 'Approval applied')
  return checkpoint
}
