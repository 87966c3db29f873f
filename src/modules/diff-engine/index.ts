/**
 * DiffEngine module — barrel export.
 */

export type { DiffEngine } from './diff-engine.js'
export { DiffEngineImpl, createDiffEngine, applyDiff } from './diff-engine-impl.js'
export { diffContents, chooseGranularity, splitUnits, DEFAULT_MAX_ALIGNMENT_CELLS } from './alignment.js'
export type {
  ChangeKind,
  ContentDiff,
  Diff,
  DiffChange,
  DiffGranularity,
  DiffOptions,
  DiffSeparator,
  DiffStats,
} from './types.js'
