/**
 * Phase 5: verification, a bounded retry loop.
 *
 * The attempt number is `attemptCount`, or 1 on first entry. A pass resets
 * the counter and moves on to learning. A failure below `maxAttempts`
 * records it, schedules fix items for the failing work and returns to
 * implementation with the counter incremented. A failure at `maxAttempts`
 * declares divergence and waits for an approval; the counter never goes past
 * `maxAttempts`.
 */

import { createLogger } from '../../../utils/logger.js'
import { VerificationDivergenceError } from '../../../core/errors.js'
import type { ItemDraft } from '../../agent/capability-contracts.js'
import type { Checkpoint, WorkItem } from '../../checkpoint/checkpoint-schema.js'
import { DIVERGENCE_OPTIONS } from '../approvals.js'
import { PHASE_GATES } from '../gates.js'
import type { PhaseContext, PhaseDefinition, StepResult } from '../types.js'
import { evaluateAttempt, type AttemptEvaluation, type VerificationOutput } from '../verification-policy.js'
import { addOpenItem, createTrackedItem, findItemByTitle, flagItems } from '../work-items.js'
import { recordInvocation } from './shared.js'

const logger = createLogger('phase:verification')

interface AttemptRecord {
  evaluation: AttemptEvaluation
  output: VerificationOutput
  attempt: number
  coverageTarget: number
  at: string
}

/** Apply the bookkeeping common to every attempt */
function recordAttempt(cp: Checkpoint, { evaluation, output, attempt, coverageTarget, at }: AttemptRecord): void {
  const verification = cp.verification
  verification.lastAttemptAt = at
  verification.recentRuns = evaluation.recentRuns
  verification.quarantinedTests = evaluation.quarantined
  if (evaluation.coverage === 'gap') {
    verification.disclosedGaps.push({
      kind: 'coverage',
      actual: output.coverage,
      target: coverageTarget,
      attempt,
      recordedAt: at,
    })
  }
}

/** Fix items for a failed attempt; one per failing item when the agent proposes none */
function fixDrafts(
  ctx: PhaseContext,
  proposed: readonly ItemDraft[],
  failingItems: readonly string[],
  message: string,
  attempt: number
): ItemDraft[] {
  if (proposed.length > 0) return [...proposed]
  const estimate = ctx.config.complexity.default_estimate
  const failing = failingItems
    .map((id) => ctx.checkpoint.items[id])
    .filter((item): item is WorkItem => item !== undefined)
  const targets = failing.length > 0 ? failing.map((item) => `#${item.id} ${item.title}`) : ['verification failures']
  return targets.map((target) => ({
    title: `Fix ${target} (verification attempt ${String(attempt)})`,
    body: message,
    kind: 'bug',
    priority: 'high',
    estimate,
    dependsOn: [],
  }))
}

async function createFixItems(ctx: PhaseContext, drafts: readonly ItemDraft[]): Promise<WorkItem[]> {
  const created: WorkItem[] = []
  for (const draft of drafts) {
    if (findItemByTitle(ctx.checkpoint, draft.title) !== undefined) continue
    created.push(await createTrackedItem(ctx, draft))
  }
  return created
}

/**
 * Create on the tracker the fix items for the last recorded failure, so that
 * another attempt granted after a divergence has implementation work to do.
 * Returns the items to register; none when no failure is recorded.
 */
export async function carryForwardLastFailure(ctx: PhaseContext): Promise<WorkItem[]> {
  const history = ctx.checkpoint.verification.failureHistory
  const last = history[history.length - 1]
  if (last === undefined) return []
  const created = await createFixItems(ctx, fixDrafts(ctx, [], last.failingItems, last.message, last.attempt))
  logger.info({ attempt: last.attempt, fixItems: created.map((item) => item.id) }, 'Failures carried forward to implementation')
  return created
}

async function step(ctx: PhaseContext): Promise<StepResult> {
  const state = ctx.checkpoint.verification
  const attempt = Math.max(1, state.attemptCount)
  const { output, record } = await ctx.invoke('verification', {
    project: ctx.project,
    attempt,
    quarantinedTests: state.quarantinedTests,
  })
  const evaluation = evaluateAttempt(state, attempt, output, ctx.config.verification)
  const at = ctx.now().toISOString()
  const attemptRecord: AttemptRecord = {
    evaluation,
    output,
    attempt,
    coverageTarget: ctx.config.verification.coverage_target,
    at,
  }

  if (evaluation.newlyQuarantined.length > 0) {
    logger.warn({ attempt, tests: evaluation.newlyQuarantined }, 'Flaky tests quarantined')
  }
  if (evaluation.coverage === 'gap') {
    logger.warn(
      { attempt, coverage: output.coverage, target: ctx.config.verification.coverage_target },
      'Coverage shortfall within tolerance recorded as a disclosed gap'
    )
  }

  ctx.eventBus.emit('verification:attempt', {
    attempt,
    maxAttempts: state.maxAttempts,
    passed: evaluation.passed,
    quarantined: evaluation.quarantined,
  })

  if (evaluation.passed) {
    await ctx.store.mutate((cp) => {
      recordAttempt(cp, attemptRecord)
      cp.verification.attemptCount = 0
      recordInvocation(cp, record)
      return cp
    })
    logger.info({ attempt }, 'Verification passed')
    return { kind: 'complete' }
  }

  const failure = {
    attempt,
    message: evaluation.message,
    timestamp: at,
    failingTests: evaluation.failures,
    failingItems: output.failingItems,
  }

  if (attempt >= state.maxAttempts) {
    const checkpoint = await ctx.store.mutate((cp) => {
      recordAttempt(cp, attemptRecord)
      recordInvocation(cp, record)
      cp.verification.failureHistory.push(failure)
      cp.verification.attemptCount = state.maxAttempts
      cp.verification.divergences += 1
      flagItems(cp, output.failingItems)
      cp.phase.status = 'divergence'
      cp.pendingApproval = {
        kind: 'divergence',
        phase: 'phase5-verification',
        requestedAt: at,
        options: DIVERGENCE_OPTIONS,
        reason: `Verification failed ${String(attempt)} of ${String(state.maxAttempts)} attempts: ${evaluation.message}`,
      }
      cp.resumeHint = 'Verification diverged; approve narrow-scope, relax-threshold or manual-intervention'
      return cp
    })
    const divergence = new VerificationDivergenceError(
      checkpoint.verification.attemptCount,
      state.maxAttempts,
      failure.message
    )
    logger.error({ err: divergence.toJSON(), failure }, 'Verification diverged')
    ctx.eventBus.emit('verification:divergence', {
      attemptCount: checkpoint.verification.attemptCount,
      maxAttempts: state.maxAttempts,
    })
    ctx.eventBus.emit('approval:required', {
      kind: 'divergence',
      phase: 'phase5-verification',
      options: DIVERGENCE_OPTIONS,
    })
    return { kind: 'halt', status: 'divergence', reason: divergence.message }
  }

  const created = await createFixItems(
    ctx,
    fixDrafts(ctx, output.fixItems, output.failingItems, evaluation.message, attempt)
  )

  await ctx.store.mutate((cp) => {
    recordAttempt(cp, attemptRecord)
    recordInvocation(cp, record)
    cp.verification.failureHistory.push(failure)
    cp.verification.attemptCount = attempt + 1
    for (const item of created) addOpenItem(cp, item)
    flagItems(cp, output.failingItems)
    return cp
  })
  logger.warn(
    { attempt, maxAttempts: state.maxAttempts, fixItems: created.map((item) => item.id) },
    'Verification failed; returning to implementation'
  )
  return { kind: 'goto', phase: 'phase3-implementation', reason: failure.message }
}

export function createVerificationPhase(): PhaseDefinition {
  return {
    id: 'phase5-verification',
    description: 'Run the test suite and coverage gate with bounded retries.',
    exitGates: PHASE_GATES['phase5-verification'],
    step,
  }
}
