import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openInMemoryDatabase } from '../../../persistence/database.js'
import { ConflictError, NotFoundError, ValidationError } from '../../../core/errors.js'
import { ManualClock } from '../../collaborators/clock.js'
import { SqliteVersionStore } from '../version-store-impl.js'

describe('SqliteVersionStore', () => {
  let db: BetterSqlite3Database
  let store: SqliteVersionStore

  beforeEach(() => {
    db = openInMemoryDatabase()
    store = new SqliteVersionStore({ db, clock: new ManualClock('2024-05-01T08:00:00.000Z', 60_000) })
  })

  afterEach(() => {
    db.close()
  })

  it('stores and reads back a snapshot', () => {
    const version = store.putVersion('file-a', 0, 'original text')
    expect(version).toEqual({
      fileId: 'file-a',
      passNumber: 0,
      content: 'original text',
      createdAt: '2024-05-01T08:00:00.000Z',
    })
    expect(store.getVersion('file-a', 0)).toBe('original text')
    expect(store.hasVersion('file-a', 0)).toBe(true)
    expect(store.hasVersion('file-a', 1)).toBe(false)
  })

  it('keeps empty content distinct from a missing snapshot', () => {
    store.putVersion('file-a', 0, '')
    expect(store.getVersion('file-a', 0)).toBe('')
  })

  it('rejects a second snapshot for the same pass', () => {
    store.putVersion('file-a', 1, 'first')
    expect(() => store.putVersion('file-a', 1, 'second')).toThrow(ConflictError)
    expect(store.getVersion('file-a', 1)).toBe('first')
  })

  it('raises NotFoundError for a missing snapshot', () => {
    expect(() => store.getVersion('file-a', 3)).toThrow('Version not found: file-a@3')
  })

  it('rejects negative and fractional pass numbers', () => {
    expect(() => store.putVersion('file-a', -1, 'x')).toThrow(ValidationError)
    expect(() => store.getVersion('file-a', 1.5)).toThrow(ValidationError)
  })

  it('lists passes ascending per file', () => {
    store.putVersion('file-a', 2, 'c')
    store.putVersion('file-a', 0, 'a')
    store.putVersion('file-b', 1, 'x')
    store.putVersion('file-a', 1, 'b')
    expect(store.listPasses('file-a')).toEqual([0, 1, 2])
    expect(store.listPasses('file-z')).toEqual([])
  })

  it('replaceVersion supersedes with an audit row', () => {
    store.putVersion('file-a', 1, 'draft') // 08:00
    const replaced = store.replaceVersion('file-a', 1, 'final', { reason: 'interrupted attempt', jobId: 'job_7' }) // 08:01

    expect(replaced.content).toBe('final')
    expect(replaced.createdAt).toBe('2024-05-01T08:01:00.000Z')
    expect(store.getVersion('file-a', 1)).toBe('final')
    expect(store.listSupersessions('file-a')).toEqual([
      {
        fileId: 'file-a',
        passNumber: 1,
        previousContent: 'draft',
        previousCreatedAt: '2024-05-01T08:00:00.000Z',
        replacedAt: '2024-05-01T08:01:00.000Z',
        reason: 'interrupted attempt',
        jobId: 'job_7',
      },
    ])
  })

  it('replaceVersion requires an existing snapshot', () => {
    expect(() => store.replaceVersion('file-a', 0, 'x', { reason: 'r' })).toThrow(NotFoundError)
  })
})
