/**
 * Error definitions for Redraft
 * Provides structured error hierarchy for all engine operations
 */

/** Base error class for all Redraft errors */
export class RedraftError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message)
    this.name = 'RedraftError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RedraftError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Malformed request (e.g. total_passes < 1); nothing was created */
export class ValidationError extends RedraftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
  }
}

/** Unknown job, file or pass */
export class NotFoundError extends RedraftError {
  constructor(resource: string, id: string, context: Record<string, unknown> = {}) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', { resource, id, ...context })
    this.name = 'NotFoundError'
  }
}

/** Duplicate snapshot or a concurrent write lost a compare-and-set */
export class ConflictError extends RedraftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFLICT', context)
    this.name = 'ConflictError'
  }
}

/** A state-machine transition that is not legal from the job's current status */
export class InvalidTransitionError extends RedraftError {
  constructor(from: string, transition: string, reason: string, context: Record<string, unknown> = {}) {
    super(`Invalid transition "${transition}" from status "${from}": ${reason}`, 'INVALID_TRANSITION', {
      from,
      transition,
      ...context,
    })
    this.name = 'InvalidTransitionError'
  }
}

/** Retryable failure reported by the refinement collaborator */
export class TransientError extends RedraftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TRANSIENT_ERROR', context)
    this.name = 'TransientError'
  }
}

/** Terminal failure reported by the refinement collaborator; never retried */
export class FatalError extends RedraftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'FATAL_ERROR', context)
    this.name = 'FatalError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends RedraftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when state recovery fails */
export class RecoveryError extends RedraftError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RECOVERY_ERROR', context)
    this.name = 'RecoveryError'
  }
}

// ---------------------------------------------------------------------------
// Transport mapping
// ---------------------------------------------------------------------------

/** HTTP status used when an error crosses the HTTP boundary */
export function httpStatusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400
  if (err instanceof NotFoundError) return 404
  if (err instanceof ConflictError || err instanceof InvalidTransitionError) return 409
  if (err instanceof TransientError) return 503
  return 500
}

/** Process exit code used when an error ends a CLI command */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ValidationError || err instanceof NotFoundError) return 2
  return 1
}
