/**
 * Zod schemas for job-store inputs.
 */

import { z } from 'zod'
import { StructuredMapSchema } from '../../core/structured-value.js'
import { JOB_STATUSES } from '../../core/types.js'
import type { JobStatus } from '../../core/types.js'

export const StartJobRequestSchema = z.object({
  fileId: z.string().min(1, 'fileId must not be empty'),
  fileName: z.string().min(1, 'fileName must not be empty'),
  totalPasses: z.number().int('totalPasses must be an integer').min(1, 'totalPasses must be at least 1'),
  model: z.string().min(1, 'model must not be empty'),
  metadata: StructuredMapSchema.optional(),
  userId: z.string().min(1).nullable().optional(),
})

export const JobStatusSchema = z.custom<JobStatus>(
  (value) => typeof value === 'string' && JOB_STATUSES.some((status) => status === value),
  { message: `status must be one of ${JOB_STATUSES.join(', ')}` },
)

export const JobFilterSchema = z.object({
  status: z.union([JobStatusSchema, z.array(JobStatusSchema)]).optional(),
  userId: z.string().optional(),
  createdAfter: z.string().datetime({ offset: true }).optional(),
  createdBefore: z.string().datetime({ offset: true }).optional(),
  limit: z.number().int().min(1).optional(),
  offset: z.number().int().min(0).optional(),
})
