/**
 * Types for the diff-engine module.
 */

import type { FileId } from '../../core/types.js'

/** Unit a diff is expressed in */
export type DiffGranularity = 'paragraph' | 'line'

export type DiffSeparator = '\n\n' | '\n'

export type ChangeKind = 'unchanged' | 'added' | 'removed' | 'modified'

/**
 * One aligned unit. `fromIndex`/`before` are null for additions,
 * `toIndex`/`after` are null for removals.
 */
export interface DiffChange {
  kind: ChangeKind
  fromIndex: number | null
  toIndex: number | null
  before: string | null
  after: string | null
}

export interface DiffStats {
  unchanged: number
  added: number
  removed: number
  modified: number
}

/** Result of aligning two contents, independent of where they came from */
export interface ContentDiff {
  granularity: DiffGranularity
  separator: DiffSeparator
  changes: DiffChange[]
  stats: DiffStats
  /** False when the middle section exceeded the alignment budget */
  aligned: boolean
}

export interface Diff extends ContentDiff {
  fileId: FileId
  fromPass: number
  toPass: number
}

export interface DiffOptions {
  /** Upper bound on (n+1)(m+1) for the LCS table */
  maxAlignmentCells: number
}
