/**
 * Types for the phase state machine.
 *
 * A phase is a PhaseDefinition whose `step` performs one checkpointed unit of
 * work and reports what the machine should do next. Exit gates are the
 * phase's completion predicate; the ResumeController re-evaluates them
 * instead of trusting the recorded phase.
 */

import type { ItemId, PhaseCapability, PhaseId, ProjectRecord, WorkPhaseId } from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { AgentCapability } from '../agent/agent-capability.js'
import type { ArtifactInspector } from '../agent/artifact-inspector.js'
import type { CapabilityInputs, CapabilityOutputs, ProjectContext } from '../agent/capability-contracts.js'
import type { AgentInvocation, Checkpoint } from '../checkpoint/checkpoint-schema.js'
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js'
import type { ComplexityAnalyzer } from '../complexity/complexity-analyzer.js'
import type { PhasewrightConfig } from '../config/config-schema.js'
import type { WorkItemTracker } from '../work-tracker/work-tracker.js'

// ---------------------------------------------------------------------------
// Gates
// ---------------------------------------------------------------------------

export interface GateContext {
  checkpoint: Checkpoint
  inspector: ArtifactInspector
  analyzer: ComplexityAnalyzer
}

/** One completion condition of a phase */
export interface GateCheck {
  /** Human-readable name used in error reporting */
  name: string
  check: (ctx: GateContext) => Promise<boolean>
  /** Message reported when the gate fails */
  errorMessage: string
}

export interface GateRunResult {
  passed: boolean
  failures: Array<{ gate: string; error: string }>
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export type HaltStatus = 'awaiting-approval' | 'divergence' | 'suspended'

/** What the machine does after a step */
export type StepResult =
  /** More work remains in this phase */
  | { kind: 'continue' }
  /** The phase's work is done; check exit gates and advance */
  | { kind: 'complete' }
  /** Leave the phase for another one without completing it */
  | { kind: 'goto'; phase: WorkPhaseId; reason: string }
  /** Stop the run; the checkpoint already records why */
  | { kind: 'halt'; status: HaltStatus; reason: string }

/** Result of one agent call, with the log entry to persist alongside its effects */
export interface Invocation<T> {
  output: T
  record: AgentInvocation
}

/** Writes the history record of a completed project */
export interface RunRecorder {
  record(record: ProjectRecord): void
}

export interface PhaseContext {
  /** Checkpoint as it was when the step started */
  readonly checkpoint: Checkpoint
  readonly config: PhasewrightConfig
  readonly store: CheckpointStore
  readonly tracker: WorkItemTracker
  readonly analyzer: ComplexityAnalyzer
  readonly inspector: ArtifactInspector
  readonly eventBus: TypedEventBus
  readonly recorder: RunRecorder | null
  readonly project: ProjectContext
  now(): Date
  /**
   * Invoke an agent capability. Nothing is written to the checkpoint; the
   * step persists `record` together with the call's effects.
   */
  invoke<K extends PhaseCapability>(
    capability: K,
    input: CapabilityInputs[K],
    itemId?: ItemId
  ): Promise<Invocation<CapabilityOutputs[K]>>
}

export interface PhaseDefinition {
  id: WorkPhaseId
  description: string
  /** Completion predicate; all must pass before the phase counts as complete */
  exitGates: GateCheck[]
  step: (ctx: PhaseContext) => Promise<StepResult>
}

// ---------------------------------------------------------------------------
// Machine
// ---------------------------------------------------------------------------

export interface PhaseMachineDeps {
  store: CheckpointStore
  tracker: WorkItemTracker
  agent: AgentCapability
  analyzer: ComplexityAnalyzer
  inspector: ArtifactInspector
  config: PhasewrightConfig
  eventBus: TypedEventBus
  projectRoot: string
  recorder?: RunRecorder
  now?: () => Date
  /** Replace built-in phase definitions, mainly for tests */
  phases?: Partial<Record<WorkPhaseId, PhaseDefinition>>
}

export type RunStatus = 'done' | HaltStatus

export interface RunResult {
  status: RunStatus
  phase: PhaseId
  /** Why the run stopped, when it did not finish */
  reason: string | null
  checkpoint: Checkpoint
}
