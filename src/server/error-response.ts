/**
 * Maps thrown errors onto JSON error bodies.
 */

import { RedraftError, httpStatusFor } from '../core/errors.js'

export interface ErrorBody {
  error: string
  message: string
  details: Record<string, unknown>
}

export interface ErrorResponse {
  status: number
  body: ErrorBody
}

/** Status codes carried by framework errors (malformed JSON, bad content type) */
function frameworkStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode
  }
  return undefined
}

export function errorResponse(err: unknown): ErrorResponse {
  if (err instanceof RedraftError) {
    return {
      status: httpStatusFor(err),
      body: { error: err.code, message: err.message, details: err.context },
    }
  }

  const status = frameworkStatus(err)
  if (status !== undefined && status >= 400 && status < 500 && err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : 'BAD_REQUEST'
    return { status, body: { error: code, message: err.message, details: {} } }
  }

  return {
    status: 500,
    body: { error: 'INTERNAL_ERROR', message: 'Internal server error', details: {} },
  }
}
