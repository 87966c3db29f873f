/**
 * DiffEngineImpl — loads both snapshots from the VersionStore and aligns them.
 */

import { ValidationError } from '../../core/errors.js'
import type { FileId } from '../../core/types.js'
import type { VersionStore } from '../version-store/version-store.js'
import { DEFAULT_MAX_ALIGNMENT_CELLS, diffContents, splitUnits } from './alignment.js'
import type { DiffEngine } from './diff-engine.js'
import type { Diff, DiffOptions } from './types.js'

export class DiffEngineImpl implements DiffEngine {
  private readonly _versions: VersionStore
  private readonly _options: DiffOptions

  constructor(versions: VersionStore, options: Partial<DiffOptions> = {}) {
    this._versions = versions
    this._options = { maxAlignmentCells: options.maxAlignmentCells ?? DEFAULT_MAX_ALIGNMENT_CELLS }
  }

  computeDiff(fileId: FileId, fromPass: number, toPass: number): Diff {
    for (const [name, value] of [
      ['fromPass', fromPass],
      ['toPass', toPass],
    ] as const) {
      if (!Number.isInteger(value) || value < 0) {
        throw new ValidationError(`${name} must be a non-negative integer, got ${String(value)}`, { fileId, [name]: value })
      }
    }

    const from = this._versions.getVersion(fileId, fromPass)
    const to = this._versions.getVersion(fileId, toPass)
    return { fileId, fromPass, toPass, ...diffContents(from, to, this._options) }
  }
}

export function createDiffEngine(versions: VersionStore, options?: Partial<DiffOptions>): DiffEngine {
  return new DiffEngineImpl(versions, options)
}

/**
 * Rebuild the target content of `diff` from its source content.
 *
 * @throws {ValidationError} when `fromContent` is not the content the diff was computed from
 */
export function applyDiff(fromContent: string, diff: Pick<Diff, 'separator' | 'changes'>): string {
  const source = splitUnits(fromContent, diff.separator)
  const target: string[] = []
  let consumed = 0

  for (const change of diff.changes) {
    if (change.fromIndex !== null) {
      if (source[change.fromIndex] !== change.before) {
        throw new ValidationError(`Diff does not apply: unit ${String(change.fromIndex)} differs`, {
          fromIndex: change.fromIndex,
        })
      }
      consumed++
    }
    if (change.kind !== 'removed') {
      target.push(change.after ?? '')
    }
  }

  if (consumed !== source.length) {
    throw new ValidationError(`Diff does not apply: covers ${String(consumed)} of ${String(source.length)} units`)
  }
  return target.join(diff.separator)
}
