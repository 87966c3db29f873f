/**
 * Row ⇄ domain mapping for jobs and job events.
 */

import { ValidationError } from '../../core/errors.js'
import { parseStructuredMap, parseStructuredValue } from '../../core/structured-value.js'
import { JOB_EVENT_TYPES, JOB_STATUSES } from '../../core/types.js'
import type { Job, JobEvent, JobEventType, JobStatus } from '../../core/types.js'
import type { JobEventRow } from '../../persistence/queries/job-events.js'
import type { JobRow } from '../../persistence/queries/jobs.js'

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value)
}

export function isJobEventType(value: string): value is JobEventType {
  return JOB_EVENT_TYPES.some((type) => type === value)
}

export function rowToJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) {
    throw new ValidationError(`Unknown job status "${row.status}"`, { jobId: row.id })
  }
  return {
    id: row.id,
    fileId: row.file_id,
    fileName: row.file_name,
    userId: row.user_id,
    status: row.status,
    currentPass: row.current_pass,
    totalPasses: row.total_passes,
    model: row.model,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
    errorMessage: row.error_message,
    result: parseStructuredValue(row.result_json, 'jobs.result_json'),
    metadata: parseStructuredMap(row.metadata_json, 'jobs.metadata_json'),
  }
}

export function rowToJobEvent(row: JobEventRow): JobEvent {
  if (!isJobEventType(row.event_type)) {
    throw new ValidationError(`Unknown job event type "${row.event_type}"`, { eventId: row.id })
  }
  return {
    id: row.id,
    jobId: row.job_id,
    sequence: row.sequence,
    eventType: row.event_type,
    passNumber: row.pass_number,
    message: row.message,
    details: parseStructuredMap(row.details_json, 'job_events.details_json'),
    createdAt: row.created_at,
  }
}
