export { PhaseStateMachine, createPhaseStateMachine, successorOf, startHint } from './phase-machine.js'
export type {
  GateCheck,
  GateContext,
  GateRunResult,
  HaltStatus,
  Invocation,
  PhaseContext,
  PhaseDefinition,
  PhaseMachineDeps,
  RunRecorder,
  RunResult,
  RunStatus,
  StepResult,
} from './types.js'
export { PHASE_GATES, runGates, isPhaseSatisfied } from './gates.js'
export { applyApproval, TIME_BUDGET_OPTIONS, DIVERGENCE_OPTIONS } from './approvals.js'
export { planItem } from './budget-ladder.js'
export type { ItemPlan } from './budget-ladder.js'
export { isApproachingLimit, trackResourceUsage, startSession, mustSplitItem } from './resource-tracker.js'
export { isOverTimeBudget, phaseBudgetMs } from './time-budget.js'
export { evaluateAttempt, classifyCoverage } from './verification-policy.js'
export type { AttemptEvaluation, CoverageOutcome } from './verification-policy.js'
export { buildProjectRecord, projectRecordId } from './project-record.js'
export { renderDivergenceReport, renderDisclosures } from './reports.js'
export * from './work-items.js'
export { createBuiltInPhases } from './phases/index.js'
