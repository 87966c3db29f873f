/**
 * JobOrchestrator module — barrel export.
 */

export type { JobOrchestrator } from './job-orchestrator.js'
export { JobOrchestratorImpl, createJobOrchestrator } from './job-orchestrator-impl.js'
export type { JobOrchestratorDeps } from './job-orchestrator-impl.js'
export { AdmissionQueue } from './admission.js'
export { countFailedAttempts, backoffDelay } from './attempts.js'
export type { OrchestratorOptions, OrchestratorStatus, SubmitOptions } from './types.js'
