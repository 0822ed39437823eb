export { ResumeController, createResumeController } from './resume-controller.js'
export type { ResumeControllerDeps, ResumeOutcome, ResumptionPoint } from './resume-controller.js'
export { reconcileWorkProgress, renderReconciliationLog } from './reconciliation.js'
export type { ReconcileOptions } from './reconciliation.js'
