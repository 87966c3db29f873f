/**
 * JobStore module — barrel export.
 */

export type { JobStore, AppendEventInput, CreateJobOptions, TransitionResult } from './job-store.js'
export { SqliteJobStore, createSqliteJobStore } from './job-store-impl.js'
export type { SqliteJobStoreOptions } from './job-store-impl.js'
export { applyTransition, canApply } from './state-machine.js'
export type { JobTransition, JobTransitionType } from './state-machine.js'
export { StartJobRequestSchema, JobFilterSchema } from './schemas.js'
