/**
 * Orchestrator: the entry points a CLI invocation drives: start, resume,
 * approve, status and reset.
 *
 * Every invocation that runs phases holds the checkpoint lock for its
 * duration. `start` and `resume` begin a new session (fresh session budget);
 * `approve` continues the session that raised the approval.
 */

import { basename } from 'path'
import { CheckpointExistsError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createEventBus } from '../../core/event-bus.js'
import { setupGracefulShutdown } from '../../recovery/shutdown-handler.js'
import { createLogger } from '../../utils/logger.js'
import { generateId } from '../../utils/helpers.js'
import type { AgentCapability } from '../agent/agent-capability.js'
import type { ArtifactInspector } from '../agent/artifact-inspector.js'
import type { ApprovalDecision, Checkpoint, ReconciliationLog } from '../checkpoint/checkpoint-schema.js'
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js'
import { ComplexityAnalyzer } from '../complexity/complexity-analyzer.js'
import type { PhasewrightConfig } from '../config/config-schema.js'
import { PhaseStateMachine } from '../phase-machine/phase-machine.js'
import { startSession } from '../phase-machine/resource-tracker.js'
import type { RunRecorder, RunResult } from '../phase-machine/types.js'
import { ResumeController, type ResumptionPoint } from '../resume/resume-controller.js'
import type { WorkItemTracker } from '../work-tracker/work-tracker.js'

const logger = createLogger('orchestrator')

export interface OrchestratorDeps {
  projectRoot: string
  config: PhasewrightConfig
  store: CheckpointStore
  tracker: WorkItemTracker
  agent: AgentCapability
  inspector: ArtifactInspector
  eventBus?: TypedEventBus
  recorder?: RunRecorder
  /** Release the lock on SIGINT/SIGTERM while a run is active */
  handleSignals?: boolean
  now?: () => Date
}

export interface StartOptions {
  request: string
  /** Defaults to the project directory name */
  name?: string
  /** Discard an existing checkpoint instead of refusing */
  fresh?: boolean
}

/** Called once the checkpoint is reconciled, before any phase runs */
export type ReconciledListener = (point: ResumptionPoint, reconciliation: ReconciliationLog) => void

export type ResumeRunResult =
  | { kind: 'new-project' }
  | { kind: 'resumed'; point: ResumptionPoint; reconciliation: ReconciliationLog; result: RunResult }

export class Orchestrator {
  readonly eventBus: TypedEventBus
  private readonly _deps: OrchestratorDeps
  private readonly _analyzer: ComplexityAnalyzer
  private readonly _now: () => Date

  constructor(deps: OrchestratorDeps) {
    this._deps = deps
    this.eventBus = deps.eventBus ?? createEventBus()
    this._analyzer = new ComplexityAnalyzer({
      complexity: deps.config.complexity,
      ceiling: deps.config.budget.ceiling,
    })
    this._now = deps.now ?? (() => new Date())
  }

  /**
   * Initialise a new project run and execute phases.
   *
   * @throws {CheckpointExistsError} if a checkpoint exists and `fresh` is not set
   * @throws {CheckpointLockedError} if another process drives this project
   */
  async start(options: StartOptions): Promise<RunResult> {
    const { store, config, projectRoot } = this._deps
    const sessionId = generateId('session')
    return this._withLock(sessionId, async () => {
      if (options.fresh === true) {
        await store.delete()
      } else if ((await store.load()) !== null) {
        throw new CheckpointExistsError(store.path)
      }
      const name = options.name ?? basename(projectRoot)
      await store.initialize(
        { name, request: options.request },
        {
          sessionId,
          sessionBudget: config.budget.session_budget,
          maxVerificationAttempts: config.verification.max_attempts,
        }
      )
      logger.info({ name, sessionId }, 'Project run started')
      return this._machine().run()
    })
  }

  /**
   * Reconcile with the tracker and continue from the resumption point in a
   * new session.
   *
   * @throws {ReconciliationConflictError} if the tracker cannot be queried
   */
  async resume(onReconciled?: ReconciledListener): Promise<ResumeRunResult> {
    const { store, config } = this._deps
    const sessionId = generateId('session')
    return this._withLock(sessionId, async () => {
      const outcome = await this._resumeController().resume()
      if (outcome.kind === 'new-project') return outcome

      await store.mutate((cp) => {
        cp.session = { id: sessionId, startedAt: this._now().toISOString() }
        cp.resourceTracking = startSession(cp.resourceTracking, config.budget.session_budget)
        return cp
      })
      logger.info({ sessionId, point: outcome.point }, 'Resuming project run')
      onReconciled?.(outcome.point, outcome.reconciliation)
      const result = await this._machine().run()
      return { kind: 'resumed', point: outcome.point, reconciliation: outcome.reconciliation, result }
    })
  }

  /**
   * Resolve the pending approval and continue in the same session.
   *
   * @throws {ApprovalRequiredError} if nothing is pending or the decision is not offered
   */
  async approve(decision: ApprovalDecision): Promise<RunResult> {
    const current = await this._deps.store.requireCheckpoint()
    return this._withLock(current.session.id, () => this._machine().approve(decision))
  }

  /** Current checkpoint, or null when no project run exists */
  async status(): Promise<Checkpoint | null> {
    return this._deps.store.load()
  }

  /** Delete the checkpoint. Callers must have confirmed with the user. */
  async reset(): Promise<void> {
    const { store } = this._deps
    await this._withLock(generateId('session'), async () => {
      await store.delete()
    })
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const { store } = this._deps
    await store.lock(sessionId)
    const removeSignalHandlers =
      this._deps.handleSignals === true ? setupGracefulShutdown({ release: () => store.unlock() }) : null
    try {
      return await fn()
    } finally {
      removeSignalHandlers?.()
      await store.unlock()
    }
  }

  private _machine(): PhaseStateMachine {
    const { store, tracker, agent, inspector, config, projectRoot, recorder, now } = this._deps
    return new PhaseStateMachine({
      store,
      tracker,
      agent,
      analyzer: this._analyzer,
      inspector,
      config,
      eventBus: this.eventBus,
      projectRoot,
      ...(recorder !== undefined ? { recorder } : {}),
      ...(now !== undefined ? { now } : {}),
    })
  }

  private _resumeController(): ResumeController {
    const { store, tracker, inspector, config, now } = this._deps
    return new ResumeController({
      store,
      tracker,
      analyzer: this._analyzer,
      inspector,
      config,
      ...(now !== undefined ? { now } : {}),
    })
  }
}
