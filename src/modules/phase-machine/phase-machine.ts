/**
 * PhaseStateMachine: sequences the work phases over the checkpoint.
 *
 * Each iteration reloads the checkpoint, stops if an approval is pending,
 * enters the current phase if needed, applies the time-budget gate and runs
 * one step of the phase. Every step persists its own effects, so the run can
 * stop between any two iterations and resume from the last write.
 *
 * An ExternalCapabilityFailureError from the agent or the tracker suspends
 * the run without touching the checkpoint.
 */

import { ExternalCapabilityFailureError } from '../../core/errors.js'
import {
  PHASE_NAMES,
  nextPhase,
  type ItemId,
  type PhaseCapability,
  type PhaseId,
  type WorkPhaseId,
} from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { unionOrdered } from '../../utils/helpers.js'
import type { CapabilityInputs, CapabilityOutputs } from '../agent/capability-contracts.js'
import type { ApprovalDecision, Checkpoint, WorkItem } from '../checkpoint/checkpoint-schema.js'
import { TIME_BUDGET_OPTIONS, applyApproval, pendingApprovalFor } from './approvals.js'
import { runGates } from './gates.js'
import { createBuiltInPhases } from './phases/index.js'
import { carryForwardLastFailure } from './phases/verification.js'
import { isOverTimeBudget, phaseBudgetMs } from './time-budget.js'
import { addOpenItem } from './work-items.js'
import type {
  Invocation,
  PhaseContext,
  PhaseDefinition,
  PhaseMachineDeps,
  RunResult,
  StepResult,
} from './types.js'

const logger = createLogger('phase-machine')

/**
 * Phase that follows `phase` when it completes. Architecture runs once, and
 * implementation inside the verification loop goes straight back to
 * verification.
 */
export function successorOf(phase: WorkPhaseId, checkpoint: Checkpoint): PhaseId {
  if (phase === 'phase1.5-decomposition' && checkpoint.phasesCompleted.includes('phase2-architecture')) {
    return 'phase3-implementation'
  }
  if (phase === 'phase3-implementation' && checkpoint.verification.attemptCount > 0) {
    return 'phase5-verification'
  }
  return nextPhase(phase)
}

export function startHint(phase: PhaseId): string {
  return phase === 'done' ? 'Project complete' : `Start ${PHASE_NAMES[phase]}`
}

export class PhaseStateMachine {
  private readonly _deps: PhaseMachineDeps
  private readonly _phases: Record<WorkPhaseId, PhaseDefinition>
  private readonly _now: () => Date

  constructor(deps: PhaseMachineDeps) {
    this._deps = deps
    this._phases = { ...createBuiltInPhases(), ...deps.phases }
    this._now = deps.now ?? (() => new Date())
  }

  /** Phase definition by id */
  getPhase(phase: WorkPhaseId): PhaseDefinition {
    return this._phases[phase]
  }

  /**
   * Run phases until the project is done or the run has to stop.
   *
   * @throws {DecompositionError} if an item cannot be decomposed below the complex threshold
   * @throws {CorruptStateError} if the checkpoint becomes unreadable
   */
  async run(): Promise<RunResult> {
    const { store, eventBus } = this._deps

    for (;;) {
      let checkpoint = await store.requireCheckpoint()
      const current = checkpoint.phase.current

      if (checkpoint.pendingApproval !== null) {
        const status = checkpoint.phase.status === 'divergence' ? 'divergence' : 'awaiting-approval'
        return { status, phase: current, reason: checkpoint.pendingApproval.reason, checkpoint }
      }
      if (current === 'done') {
        return { status: 'done', phase: 'done', reason: null, checkpoint }
      }

      try {
        if (checkpoint.phase.status === 'not-started') {
          checkpoint = await this._enter(current)
        }

        if (isOverTimeBudget(checkpoint, this._deps.config.phases, this._now())) {
          checkpoint = await this._requestTimeApproval(current, checkpoint)
          return {
            status: 'awaiting-approval',
            phase: current,
            reason: checkpoint.pendingApproval?.reason ?? null,
            checkpoint,
          }
        }

        const result = await this._phases[current].step(this._context(checkpoint))
        const halted = await this._apply(current, result)
        if (halted !== null) return halted
      } catch (err) {
        if (err instanceof ExternalCapabilityFailureError) {
          logger.error({ phase: current, error: err.message, context: err.context }, 'Run suspended')
          eventBus.emit('run:suspended', { phase: current, reason: err.message })
          const unchanged = await store.requireCheckpoint()
          return { status: 'suspended', phase: current, reason: err.message, checkpoint: unchanged }
        }
        throw err
      }
    }
  }

  /**
   * Resolve the pending approval with `decision` and continue the run.
   * Another attempt after a divergence first schedules fix items for the
   * last failure, then both land in one checkpoint write.
   *
   * @throws {ApprovalRequiredError} if nothing is pending or the decision is not offered
   */
  async approve(decision: ApprovalDecision): Promise<RunResult> {
    const { store, config } = this._deps
    const checkpoint = await store.requireCheckpoint()
    pendingApprovalFor(checkpoint, decision)

    let fixes: WorkItem[] = []
    try {
      if (decision === 'relax-threshold') {
        fixes = await carryForwardLastFailure(this._context(checkpoint))
      }
    } catch (err) {
      if (err instanceof ExternalCapabilityFailureError) {
        logger.error({ decision, error: err.message }, 'Approval not applied; tracker unavailable')
        this._deps.eventBus.emit('run:suspended', { phase: checkpoint.phase.current, reason: err.message })
        return { status: 'suspended', phase: checkpoint.phase.current, reason: err.message, checkpoint }
      }
      throw err
    }

    await store.mutate((cp) => {
      applyApproval(cp, decision, config, this._now())
      for (const item of fixes) addOpenItem(cp, item)
      return cp
    })
    return this.run()
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  private async _enter(phase: WorkPhaseId): Promise<Checkpoint> {
    const at = this._now().toISOString()
    const checkpoint = await this._deps.store.mutate((cp) => {
      cp.phase = { current: phase, name: PHASE_NAMES[phase], startedAt: at, status: 'in-progress' }
      if (phase === 'phase5-verification' && cp.verification.attemptCount === 0) {
        cp.verification.attemptCount = 1
      }
      return cp
    })
    logger.info({ phase }, 'Phase entered')
    this._deps.eventBus.emit('phase:entered', { phase })
    return checkpoint
  }

  private async _requestTimeApproval(phase: WorkPhaseId, checkpoint: Checkpoint): Promise<Checkpoint> {
    const budgetMs = phaseBudgetMs(phase, this._deps.config.phases, checkpoint)
    const reason = `${PHASE_NAMES[phase]} exceeded its time budget of ${String(Math.round(budgetMs / 60_000))} minute(s)`
    const updated = await this._deps.store.mutate((cp) => {
      cp.pendingApproval = {
        kind: 'time-budget',
        phase,
        requestedAt: this._now().toISOString(),
        options: TIME_BUDGET_OPTIONS,
        reason,
      }
      cp.resumeHint = 'Time budget exceeded; approve extend, reduce-scope or proceed'
      return cp
    })
    logger.warn({ phase, budgetMs }, 'Time budget exceeded; approval required')
    this._deps.eventBus.emit('approval:required', { kind: 'time-budget', phase, options: TIME_BUDGET_OPTIONS })
    return updated
  }

  /** Apply a step result; returns the run result when the run stops */
  private async _apply(phase: WorkPhaseId, result: StepResult): Promise<RunResult | null> {
    const { store } = this._deps
    switch (result.kind) {
      case 'continue':
        return null
      case 'halt': {
        const checkpoint = await store.requireCheckpoint()
        if (result.status === 'suspended') {
          this._deps.eventBus.emit('run:suspended', { phase, reason: result.reason })
        }
        return { status: result.status, phase, reason: result.reason, checkpoint }
      }
      case 'goto':
        logger.info({ from: phase, to: result.phase, reason: result.reason }, 'Phase transition')
        await this._leave(phase, result.phase, false)
        return null
      case 'complete': {
        const checkpoint = await store.requireCheckpoint()
        const gates = await runGates(this._phases[phase].exitGates, {
          checkpoint,
          inspector: this._deps.inspector,
          analyzer: this._deps.analyzer,
        })
        if (!gates.passed) {
          throw new ExternalCapabilityFailureError(
            `${PHASE_NAMES[phase]} finished without meeting its completion predicate: ${gates.failures.map((f) => f.error).join(' ')}`,
            { phase, failures: gates.failures }
          )
        }
        await this._leave(phase, successorOf(phase, checkpoint), true)
        return null
      }
    }
  }

  private async _leave(phase: WorkPhaseId, next: PhaseId, completed: boolean): Promise<void> {
    const now = this._now()
    let durationMs = 0
    await this._deps.store.mutate((cp) => {
      const startedAt = cp.phase.startedAt ?? now.toISOString()
      durationMs = Math.max(0, now.getTime() - new Date(startedAt).getTime())
      cp.phaseTimings.push({
        phase,
        startedAt,
        completedAt: now.toISOString(),
        budgetMs: phaseBudgetMs(phase, this._deps.config.phases, cp),
      })
      if (completed) cp.phasesCompleted = unionOrdered(cp.phasesCompleted, [phase])
      // Grants cover one visit; a re-entered phase gets its plain budget back
      delete cp.timeBudget[phase]
      cp.phase = {
        current: next,
        name: PHASE_NAMES[next],
        startedAt: null,
        status: next === 'done' ? 'complete' : 'not-started',
      }
      cp.resumeHint = startHint(next)
      return cp
    })
    if (completed) {
      logger.info({ phase, next, durationMs }, 'Phase completed')
      this._deps.eventBus.emit('phase:completed', { phase, durationMs })
    }
  }

  // ---------------------------------------------------------------------------
  // Step context
  // ---------------------------------------------------------------------------

  private _context(checkpoint: Checkpoint): PhaseContext {
    const deps = this._deps
    const now = this._now
    const phase = checkpoint.phase.current
    return {
      checkpoint,
      config: deps.config,
      store: deps.store,
      tracker: deps.tracker,
      analyzer: deps.analyzer,
      inspector: deps.inspector,
      eventBus: deps.eventBus,
      recorder: deps.recorder ?? null,
      project: { name: checkpoint.project.name, request: checkpoint.project.request, projectRoot: deps.projectRoot },
      now,
      invoke: async <K extends PhaseCapability>(
        capability: K,
        input: CapabilityInputs[K],
        itemId?: ItemId
      ): Promise<Invocation<CapabilityOutputs[K]>> => {
        const startedAt = now().toISOString()
        const output = await deps.agent.invoke(capability, input)
        return {
          output,
          record: {
            capability,
            phase,
            ...(itemId !== undefined ? { itemId } : {}),
            status: 'succeeded',
            startedAt,
            completedAt: now().toISOString(),
          },
        }
      },
    }
  }
}

export function createPhaseStateMachine(deps: PhaseMachineDeps): PhaseStateMachine {
  return new PhaseStateMachine(deps)
}
