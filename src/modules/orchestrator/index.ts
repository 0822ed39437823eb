export { Orchestrator } from './orchestrator.js'
export type { OrchestratorDeps, ResumeRunResult, StartOptions } from './orchestrator.js'
export { createOrchestrator, resolveStateDir, historyPathOf } from './factory.js'
export type { CreateOrchestratorOptions, OrchestratorHandle } from './factory.js'
