/**
 * Contracts of the collaborators the engine consumes but does not own.
 */

import type { FileId, StructuredMap } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Refinement
// ---------------------------------------------------------------------------

export interface RunPassRequest {
  fileId: FileId
  /** 1-based number of the pass being produced */
  passNumber: number
  /** Content of the previous pass */
  content: string
  model: string
  /** Job metadata, forwarded as-is */
  config: StructuredMap
  /** Aborted when the pass times out or the engine shuts down */
  signal: AbortSignal
}

/**
 * Produces the refined content of one pass.
 *
 * Throws TransientError for failures worth retrying and FatalError for
 * failures that should end the job. Any other error is treated as transient.
 */
export interface RefinementCollaborator {
  runPass(request: RunPassRequest): Promise<string>
}

// ---------------------------------------------------------------------------
// File source
// ---------------------------------------------------------------------------

export interface FileSource {
  /** @throws {NotFoundError} when the file does not exist */
  fetchOriginal(fileId: FileId): Promise<string>
}

// ---------------------------------------------------------------------------
// Clock / ids
// ---------------------------------------------------------------------------

export interface Clock {
  now(): Date
}

export interface IdGenerator {
  /** Return a new unique id, e.g. `job_3f1c…` for prefix `job` */
  next(prefix: string): string
}
