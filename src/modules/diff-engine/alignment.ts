/**
 * Unit alignment: common prefix/suffix trimming followed by an LCS table
 * over the remaining middle section.
 */

import type { ChangeKind, ContentDiff, DiffChange, DiffGranularity, DiffOptions, DiffSeparator, DiffStats } from './types.js'

export const DEFAULT_MAX_ALIGNMENT_CELLS = 4_000_000

type Step = { op: 'match'; from: number; to: number } | { op: 'remove'; from: number } | { op: 'add'; to: number }

export function chooseGranularity(from: string, to: string): { granularity: DiffGranularity; separator: DiffSeparator } {
  if (from.includes('\n\n') || to.includes('\n\n')) {
    return { granularity: 'paragraph', separator: '\n\n' }
  }
  return { granularity: 'line', separator: '\n' }
}

/** Split into units; empty content has no units so `join` restores it exactly */
export function splitUnits(content: string, separator: DiffSeparator): string[] {
  return content === '' ? [] : content.split(separator)
}

/**
 * LCS steps for a[aStart..aEnd) against b[bStart..bEnd).
 *
 * The table holds suffix lengths so the traceback walks forward: a match is
 * taken whenever the units are equal, otherwise removal wins ties.
 */
function lcsSteps(a: string[], aStart: number, aEnd: number, b: string[], bStart: number, bEnd: number): Step[] {
  const n = aEnd - aStart
  const m = bEnd - bStart
  const width = m + 1
  const table = new Uint32Array((n + 1) * width)

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      table[i * width + j] =
        a[aStart + i] === b[bStart + j]
          ? (table[(i + 1) * width + j + 1] ?? 0) + 1
          : Math.max(table[(i + 1) * width + j] ?? 0, table[i * width + j + 1] ?? 0)
    }
  }

  const steps: Step[] = []
  let i = 0
  let j = 0
  while (i < n && j < m) {
    if (a[aStart + i] === b[bStart + j]) {
      steps.push({ op: 'match', from: aStart + i, to: bStart + j })
      i++
      j++
    } else if ((table[(i + 1) * width + j] ?? 0) >= (table[i * width + j + 1] ?? 0)) {
      steps.push({ op: 'remove', from: aStart + i })
      i++
    } else {
      steps.push({ op: 'add', to: bStart + j })
      j++
    }
  }
  for (; i < n; i++) steps.push({ op: 'remove', from: aStart + i })
  for (; j < m; j++) steps.push({ op: 'add', to: bStart + j })
  return steps
}

/** Pair removed and added runs in order; leftovers stay removed/added */
function flushRun(removed: number[], added: number[], a: string[], b: string[], out: DiffChange[]): void {
  const paired = Math.min(removed.length, added.length)
  for (let k = 0; k < paired; k++) {
    const from = removed[k] ?? 0
    const to = added[k] ?? 0
    out.push({ kind: 'modified', fromIndex: from, toIndex: to, before: a[from] ?? '', after: b[to] ?? '' })
  }
  for (const from of removed.slice(paired)) {
    out.push({ kind: 'removed', fromIndex: from, toIndex: null, before: a[from] ?? '', after: null })
  }
  for (const to of added.slice(paired)) {
    out.push({ kind: 'added', fromIndex: null, toIndex: to, before: null, after: b[to] ?? '' })
  }
  removed.length = 0
  added.length = 0
}

function unchanged(a: string[], from: number, to: number): DiffChange {
  const unit = a[from] ?? ''
  return { kind: 'unchanged', fromIndex: from, toIndex: to, before: unit, after: unit }
}

export function countChanges(changes: DiffChange[]): DiffStats {
  const stats: Record<ChangeKind, number> = { unchanged: 0, added: 0, removed: 0, modified: 0 }
  for (const change of changes) stats[change.kind]++
  return stats
}

/**
 * Align two contents. Pure and deterministic.
 */
export function diffContents(from: string, to: string, options: DiffOptions): ContentDiff {
  const { granularity, separator } = chooseGranularity(from, to)
  const a = splitUnits(from, separator)
  const b = splitUnits(to, separator)

  let prefix = 0
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++

  let suffix = 0
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++
  }

  const aEnd = a.length - suffix
  const bEnd = b.length - suffix
  const cells = (aEnd - prefix + 1) * (bEnd - prefix + 1)
  const aligned = cells <= options.maxAlignmentCells

  const changes: DiffChange[] = []
  for (let k = 0; k < prefix; k++) changes.push(unchanged(a, k, k))

  const removed: number[] = []
  const added: number[] = []
  if (aligned) {
    for (const step of lcsSteps(a, prefix, aEnd, b, prefix, bEnd)) {
      if (step.op === 'match') {
        flushRun(removed, added, a, b, changes)
        changes.push(unchanged(a, step.from, step.to))
      } else if (step.op === 'remove') {
        removed.push(step.from)
      } else {
        added.push(step.to)
      }
    }
  } else {
    for (let k = prefix; k < aEnd; k++) removed.push(k)
    for (let k = prefix; k < bEnd; k++) added.push(k)
  }
  flushRun(removed, added, a, b, changes)

  for (let k = 0; k < suffix; k++) changes.push(unchanged(a, aEnd + k, bEnd + k))

  return { granularity, separator, changes, stats: countChanges(changes), aligned }
}
