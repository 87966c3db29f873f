/**
 * DiffEngine — compares two recorded passes of a file.
 */

import type { FileId } from '../../core/types.js'
import type { Diff } from './types.js'

export interface DiffEngine {
  /**
   * @throws {ValidationError} when a pass number is not a non-negative integer
   * @throws {NotFoundError} when either snapshot is missing
   */
  computeDiff(fileId: FileId, fromPass: number, toPass: number): Diff
}
