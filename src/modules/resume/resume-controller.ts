/**
 * ResumeController: reconciles a loaded checkpoint with the live tracker
 * and decides where the phase machine re-enters.
 *
 * The resumption phase is the earliest phase before the recorded one whose
 * completion predicate no longer holds, or the recorded phase otherwise.
 * Predicates are evaluated against the reconciled checkpoint, never cached.
 * Items scored under an older complexity configuration are re-scored during
 * reconciliation, so a threshold change alone does not rewind the run.
 */

import { ExternalCapabilityFailureError, ReconciliationConflictError } from '../../core/errors.js'
import { PHASE_NAMES, WORK_PHASES, comparePhases, type ItemId, type PhaseId, type WorkPhaseId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactInspector } from '../agent/artifact-inspector.js'
import type { Checkpoint, PendingApproval, ReconciliationLog } from '../checkpoint/checkpoint-schema.js'
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js'
import type { ComplexityAnalyzer } from '../complexity/complexity-analyzer.js'
import type { PhasewrightConfig } from '../config/config-schema.js'
import { isPhaseSatisfied, PHASE_GATES } from '../phase-machine/gates.js'
import type { GateCheck } from '../phase-machine/types.js'
import { rescoreStaleItems } from '../phase-machine/work-items.js'
import type { ItemSummary, WorkItemTracker } from '../work-tracker/work-tracker.js'
import { reconcileWorkProgress } from './reconciliation.js'

const logger = createLogger('resume')

export interface ResumptionPoint {
  phase: PhaseId
  /** Item in progress when re-entering implementation */
  itemId?: ItemId
  /** Attempt about to run when re-entering verification */
  verificationAttempt?: number
  /** Set when the run cannot continue before an approval */
  awaitingApproval?: PendingApproval['kind']
}

export type ResumeOutcome =
  | { kind: 'new-project' }
  | { kind: 'resume'; point: ResumptionPoint; reconciliation: ReconciliationLog; checkpoint: Checkpoint }

export interface ResumeControllerDeps {
  store: CheckpointStore
  tracker: WorkItemTracker
  analyzer: ComplexityAnalyzer
  inspector: ArtifactInspector
  config: PhasewrightConfig
  /** Exit gates per phase; defaults to the built-in ones */
  gates?: Record<WorkPhaseId, GateCheck[]>
  now?: () => Date
}

export class ResumeController {
  private readonly _deps: ResumeControllerDeps
  private readonly _gates: Record<WorkPhaseId, GateCheck[]>
  private readonly _now: () => Date

  constructor(deps: ResumeControllerDeps) {
    this._deps = deps
    this._gates = deps.gates ?? PHASE_GATES
    this._now = deps.now ?? (() => new Date())
  }

  /**
   * Load, reconcile and locate the resumption point.
   *
   * @throws {ReconciliationConflictError} if the tracker cannot be queried
   * @throws {CorruptStateError} if the checkpoint cannot be read
   */
  async resume(): Promise<ResumeOutcome> {
    const { store } = this._deps
    const loaded = await store.load()
    if (loaded === null) {
      logger.info('No checkpoint found; new project')
      return { kind: 'new-project' }
    }

    const reconciliation = await this.reconcile()
    const { point, checkpoint } = await this._locate(await store.requireCheckpoint())
    logger.info({ point, deltas: reconciliation.deltas.length }, 'Resumption point determined')
    return { kind: 'resume', point, reconciliation, checkpoint }
  }

  /** Query the tracker and rewrite the checkpoint's work progress to match */
  async reconcile(): Promise<ReconciliationLog> {
    const { store, tracker, config, analyzer } = this._deps
    let live: ItemSummary[]
    try {
      live = await tracker.listItems({ labels: [config.tracker.label] })
    } catch (err) {
      if (err instanceof ExternalCapabilityFailureError) {
        throw new ReconciliationConflictError(
          `Cannot reconcile the checkpoint: the work tracker could not be queried (${err.message})`,
          { cause: err.context }
        )
      }
      throw err
    }

    let log: ReconciliationLog = { at: this._now().toISOString(), deltas: [], clearedInProgressItem: null }
    let rescored: ItemId[] = []
    await store.mutate((cp) => {
      log = reconcileWorkProgress(cp, live, {
        analyzer,
        defaultEstimate: config.complexity.default_estimate,
        now: this._now(),
      })
      rescored = rescoreStaleItems(cp, analyzer)
      cp.lastReconciliation = log
      return cp
    })

    for (const delta of log.deltas) {
      logger.warn(delta, 'Checkpoint reconciled with tracker')
    }
    if (log.clearedInProgressItem !== null) {
      logger.warn({ itemId: log.clearedInProgressItem }, 'Stale in-progress item cleared')
    }
    if (rescored.length > 0) {
      logger.info({ items: rescored }, 'Work items re-scored with the current complexity model')
    }
    return log
  }

  private async _locate(checkpoint: Checkpoint): Promise<{ point: ResumptionPoint; checkpoint: Checkpoint }> {
    const recorded = checkpoint.phase.current
    if (checkpoint.pendingApproval !== null) {
      return { point: { phase: recorded, awaitingApproval: checkpoint.pendingApproval.kind }, checkpoint }
    }
    if (recorded === 'done') return { point: { phase: 'done' }, checkpoint }

    let phase: WorkPhaseId = recorded
    const ctx = { checkpoint, inspector: this._deps.inspector, analyzer: this._deps.analyzer }
    for (const candidate of WORK_PHASES) {
      if (comparePhases(candidate, recorded) >= 0) break
      if (!(await isPhaseSatisfied(candidate, this._gates[candidate], ctx))) {
        phase = candidate
        break
      }
    }

    let current = checkpoint
    if (phase !== recorded) {
      logger.warn({ recorded, resumeAt: phase }, 'Completion predicate no longer holds; resuming at an earlier phase')
      current = await this._deps.store.mutate((cp) => {
        cp.phase = { current: phase, name: PHASE_NAMES[phase], startedAt: null, status: 'not-started' }
        cp.resumeHint = `Resume ${PHASE_NAMES[phase]}: its completion predicate no longer holds`
        return cp
      })
    }

    const point: ResumptionPoint = { phase }
    const inProgress = current.workProgress.inProgressItem
    if (phase === 'phase3-implementation' && inProgress !== null) point.itemId = inProgress
    if (phase === 'phase5-verification') point.verificationAttempt = Math.max(1, current.verification.attemptCount)
    return { point, checkpoint: current }
  }
}

export function createResumeController(deps: ResumeControllerDeps): ResumeController {
  return new ResumeController(deps)
}
