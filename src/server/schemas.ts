/**
 * Request schemas for the HTTP and WebSocket transports.
 *
 * Query strings arrive as strings, so numeric fields are coerced here and
 * the engine sees the same types it gets from the CLI.
 */

import { z } from 'zod'
import { ValidationError } from '../core/errors.js'
import { JobStatusSchema } from '../modules/job-store/schemas.js'

export { StartJobRequestSchema } from '../modules/job-store/schemas.js'

export const ListJobsQuerySchema = z.object({
  /** Comma-separated list, e.g. `?status=pending,processing` */
  status: z
    .string()
    .optional()
    .transform((value) => (value === undefined ? undefined : value.split(',').filter((s) => s.length > 0)))
    .pipe(z.array(JobStatusSchema).optional()),
  userId: z.string().optional(),
  createdAfter: z.string().optional(),
  createdBefore: z.string().optional(),
  limit: z.coerce.number().int().min(1).optional(),
  offset: z.coerce.number().int().min(0).optional(),
})

export const EventsQuerySchema = z.object({
  since: z.coerce.number().int().min(0).default(0),
})

/** Sent by EventSource on reconnect; takes precedence over `since` */
export const EventsHeadersSchema = z.object({
  'last-event-id': z.coerce.number().int().min(0).optional(),
})

export const DiffQuerySchema = z.object({
  from: z.coerce.number().int().min(0),
  to: z.coerce.number().int().min(0),
})

export const CancelBodySchema = z
  .object({
    reason: z.string().min(1).optional(),
  })
  .strict()

export const JobParamsSchema = z.object({ id: z.string().min(1) })

export const FileParamsSchema = z.object({ fileId: z.string().min(1) })

export const AttachPayloadSchema = z
  .object({
    jobId: z.string().min(1),
    sinceSequence: z.number().int().min(0).default(0),
  })
  .strict()

export const DetachPayloadSchema = z.object({ jobId: z.string().min(1) }).strict()

/**
 * Parse `input` or throw a ValidationError naming the first offending field.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue !== undefined && issue.path.length > 0 ? ` (${issue.path.join('.')})` : ''
    throw new ValidationError(`Invalid ${what}${where}: ${issue?.message ?? 'malformed input'}`, {
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    })
  }
  return result.data
}
