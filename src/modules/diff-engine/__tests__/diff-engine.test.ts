import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openInMemoryDatabase } from '../../../persistence/database.js'
import { NotFoundError, ValidationError } from '../../../core/errors.js'
import { ManualClock } from '../../collaborators/clock.js'
import { SqliteVersionStore } from '../../version-store/version-store-impl.js'
import { diffContents, chooseGranularity, splitUnits } from '../alignment.js'
import { DiffEngineImpl, applyDiff } from '../diff-engine-impl.js'

const OPTIONS = { maxAlignmentCells: 4_000_000 }

describe('splitUnits / chooseGranularity', () => {
  it('treats empty content as zero units', () => {
    expect(splitUnits('', '\n')).toEqual([])
    expect(splitUnits('\n', '\n')).toEqual(['', ''])
  })

  it('uses paragraphs when either side has a blank line', () => {
    expect(chooseGranularity('a\nb', 'a\n\nb')).toEqual({ granularity: 'paragraph', separator: '\n\n' })
    expect(chooseGranularity('a\nb', 'a\nc')).toEqual({ granularity: 'line', separator: '\n' })
  })
})

describe('diffContents', () => {
  it('reports identical content as all unchanged', () => {
    const diff = diffContents('a\nb\nc', 'a\nb\nc', OPTIONS)
    expect(diff.changes.every((c) => c.kind === 'unchanged')).toBe(true)
    expect(diff.stats).toEqual({ unchanged: 3, added: 0, removed: 0, modified: 0 })
  })

  it('pairs a replaced line into a modified record', () => {
    const diff = diffContents('a\nb\nc', 'a\nx\nc', OPTIONS)
    expect(diff.granularity).toBe('line')
    expect(diff.changes).toEqual([
      { kind: 'unchanged', fromIndex: 0, toIndex: 0, before: 'a', after: 'a' },
      { kind: 'modified', fromIndex: 1, toIndex: 1, before: 'b', after: 'x' },
      { kind: 'unchanged', fromIndex: 2, toIndex: 2, before: 'c', after: 'c' },
    ])
    expect(diff.stats).toEqual({ unchanged: 2, added: 0, removed: 0, modified: 1 })
  })

  it('diffs by paragraph and reports an appended paragraph', () => {
    const diff = diffContents('Intro\n\nBody', 'Intro\n\nBody\n\nOutro', OPTIONS)
    expect(diff.granularity).toBe('paragraph')
    expect(diff.changes[2]).toEqual({ kind: 'added', fromIndex: null, toIndex: 2, before: null, after: 'Outro' })
    expect(diff.stats).toEqual({ unchanged: 2, added: 1, removed: 0, modified: 0 })
  })

  it('reports everything added from empty and everything removed to empty', () => {
    expect(diffContents('', 'a\nb', OPTIONS).stats).toEqual({ unchanged: 0, added: 2, removed: 0, modified: 0 })
    expect(diffContents('a\nb', '', OPTIONS).stats).toEqual({ unchanged: 0, added: 0, removed: 2, modified: 0 })
    expect(diffContents('', '', OPTIONS).changes).toEqual([])
  })

  it('aligns moved units around the longest common subsequence', () => {
    const diff = diffContents('a\nb\nc\nd', 'a\nc\nx\nd', OPTIONS)
    expect(diff.changes.map((c) => [c.kind, c.fromIndex, c.toIndex])).toEqual([
      ['unchanged', 0, 0],
      ['removed', 1, null],
      ['unchanged', 2, 1],
      ['added', null, 2],
      ['unchanged', 3, 3],
    ])
  })

  it('falls back to unaligned pairing above the cell budget', () => {
    const diff = diffContents('a\nb\nc', 'a\nx\ny\nc', { maxAlignmentCells: 1 })
    expect(diff.aligned).toBe(false)
    expect(diff.changes.map((c) => [c.kind, c.fromIndex, c.toIndex])).toEqual([
      ['unchanged', 0, 0],
      ['modified', 1, 1],
      ['added', null, 2],
      ['unchanged', 2, 3],
    ])
  })

  it('is deterministic', () => {
    const from = 'one\ntwo\nthree\nfour\nfive'
    const to = 'zero\ntwo\nfour\nthree\nfive\nsix'
    expect(diffContents(from, to, OPTIONS)).toEqual(diffContents(from, to, OPTIONS))
  })
})

describe('applyDiff', () => {
  const cases: [string, string][] = [
    ['a\nb\nc', 'a\nx\nc'],
    ['a\n', 'a\nb\n'],
    ['Intro\n\nBody', 'Body\n\nIntro\n\nOutro'],
    ['', 'only'],
    ['gone\nforever', ''],
    ['one\ntwo\nthree\nfour\nfive', 'zero\ntwo\nfour\nthree\nfive\nsix'],
  ]

  it.each(cases)('rebuilds the target of %j -> %j', (from, to) => {
    expect(applyDiff(from, diffContents(from, to, OPTIONS))).toBe(to)
  })

  it('rebuilds the target when alignment is skipped', () => {
    const from = 'a\nb\nc\nd'
    const to = 'a\nd\nc\nb\ne'
    expect(applyDiff(from, diffContents(from, to, { maxAlignmentCells: 1 }))).toBe(to)
  })

  it('rejects a source the diff was not computed from', () => {
    const diff = diffContents('a\nb', 'a\nc', OPTIONS)
    expect(() => applyDiff('a\nz', diff)).toThrow(ValidationError)
    expect(() => applyDiff('a\nb\nextra', diff)).toThrow('Diff does not apply: covers 2 of 3 units')
  })
})

describe('DiffEngineImpl', () => {
  let db: BetterSqlite3Database
  let engine: DiffEngineImpl
  let versions: SqliteVersionStore

  beforeEach(() => {
    db = openInMemoryDatabase()
    versions = new SqliteVersionStore({ db, clock: new ManualClock() })
    engine = new DiffEngineImpl(versions)
    versions.putVersion('file-a', 0, 'Draft intro\n\nBody')
    versions.putVersion('file-a', 1, 'Polished intro\n\nBody')
  })

  afterEach(() => {
    db.close()
  })

  it('diffs two stored passes', () => {
    const diff = engine.computeDiff('file-a', 0, 1)
    expect(diff.fileId).toBe('file-a')
    expect(diff.fromPass).toBe(0)
    expect(diff.toPass).toBe(1)
    expect(diff.changes[0]).toEqual({
      kind: 'modified',
      fromIndex: 0,
      toIndex: 0,
      before: 'Draft intro',
      after: 'Polished intro',
    })
  })

  it('reports the same pass as unchanged', () => {
    expect(engine.computeDiff('file-a', 1, 1).stats).toEqual({ unchanged: 2, added: 0, removed: 0, modified: 0 })
  })

  it('raises NotFoundError for a missing pass', () => {
    expect(() => engine.computeDiff('file-a', 0, 2)).toThrow(NotFoundError)
  })

  it('raises ValidationError for a negative pass', () => {
    expect(() => engine.computeDiff('file-a', -1, 1)).toThrow('fromPass must be a non-negative integer, got -1')
  })
})
