/**
 * Core types for Redraft
 * Shared type definitions used across all modules
 */

/** Unique identifier for a refinement job */
export type JobId = string

/** Identifier of a file in the external file source */
export type FileId = string

/**
 * Closed structured value used for every opaque payload (job metadata,
 * job result, event details). Serialises to JSON without loss.
 */
export type StructuredValue =
  | null
  | boolean
  | number
  | string
  | StructuredValue[]
  | { [key: string]: StructuredValue }

/** String-keyed map of structured values */
export type StructuredMap = { [key: string]: StructuredValue }

/** Status of a job */
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'cancelled'

/** All job statuses, in lifecycle order */
export const JOB_STATUSES: readonly JobStatus[] = [
  'pending',
  'processing',
  'completed',
  'failed',
  'cancelled',
] as const

/** Statuses from which no further transition occurs */
export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'completed',
  'failed',
  'cancelled',
])

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status)
}

/** Kind of an event in a job's log */
export type JobEventType =
  | 'job_started'
  | 'pass_started'
  | 'pass_completed'
  | 'pass_failed'
  | 'job_completed'
  | 'job_failed'
  | 'job_cancelled'

export const JOB_EVENT_TYPES: readonly JobEventType[] = [
  'job_started',
  'pass_started',
  'pass_completed',
  'pass_failed',
  'job_completed',
  'job_failed',
  'job_cancelled',
] as const

/** Event types that close a job's log */
export const TERMINAL_EVENT_TYPES: ReadonlySet<JobEventType> = new Set<JobEventType>([
  'job_completed',
  'job_failed',
  'job_cancelled',
])

export function isTerminalEventType(eventType: JobEventType): boolean {
  return TERMINAL_EVENT_TYPES.has(eventType)
}

/** One refinement run of one file */
export interface Job {
  id: JobId
  fileId: FileId
  fileName: string
  userId: string | null
  status: JobStatus
  currentPass: number
  totalPasses: number
  model: string
  createdAt: string
  updatedAt: string
  completedAt: string | null
  errorMessage: string | null
  result: StructuredValue | null
  metadata: StructuredMap
}

/** One immutable fact about a job's progress */
export interface JobEvent {
  id: string
  jobId: JobId
  sequence: number
  eventType: JobEventType
  passNumber: number | null
  message: string
  details: StructuredMap
  createdAt: string
}

/** A stored content snapshot of a file after a given pass (0 = original) */
export interface Version {
  fileId: FileId
  passNumber: number
  content: string
  createdAt: string
}

/** Request accepted by the engine when starting a job */
export interface StartJobRequest {
  fileId: FileId
  fileName: string
  totalPasses: number
  model: string
  metadata?: StructuredMap
  userId?: string | null
}

/** Filter for listing jobs; every field is optional */
export interface JobFilter {
  status?: JobStatus | JobStatus[]
  userId?: string
  /** ISO-8601 lower bound (inclusive) on createdAt */
  createdAfter?: string
  /** ISO-8601 upper bound (inclusive) on createdAt */
  createdBefore?: string
  limit?: number
  offset?: number
}
