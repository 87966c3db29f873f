/**
 * Zod schemas for the closed StructuredValue type.
 *
 * Every opaque payload (metadata, result, event details) is validated against
 * these schemas when it enters the engine and when it is read back from
 * SQLite, so only JSON-safe values ever reach a subscriber.
 */

import { z } from 'zod'
import type { StructuredMap, StructuredValue } from './types.js'
import { ValidationError } from './errors.js'

export const StructuredValueSchema: z.ZodType<StructuredValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(StructuredValueSchema),
    z.record(z.string(), StructuredValueSchema),
  ]),
)

export const StructuredMapSchema: z.ZodType<StructuredMap> = z.record(z.string(), StructuredValueSchema)

/**
 * Parse a JSON column into a StructuredMap.
 * @throws {ValidationError} when the stored text is not a JSON object of structured values
 */
export function parseStructuredMap(json: string, field: string): StructuredMap {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (err) {
    throw new ValidationError(`Column ${field} does not contain valid JSON`, {
      field,
      cause: err instanceof Error ? err.message : String(err),
    })
  }
  const parsed = StructuredMapSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError(`Column ${field} is not a structured map`, { field, issues: parsed.error.issues })
  }
  return parsed.data
}

/**
 * Parse a nullable JSON column into a StructuredValue.
 */
export function parseStructuredValue(json: string | null, field: string): StructuredValue | null {
  if (json === null) return null
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (err) {
    throw new ValidationError(`Column ${field} does not contain valid JSON`, {
      field,
      cause: err instanceof Error ? err.message : String(err),
    })
  }
  const parsed = StructuredValueSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ValidationError(`Column ${field} is not a structured value`, { field, issues: parsed.error.issues })
  }
  return parsed.data
}
