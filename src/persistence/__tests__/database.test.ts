import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DatabaseWrapper, createDatabaseService, openInMemoryDatabase } from '../database.js'

describe('DatabaseWrapper', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'redraft-db-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('creates missing parent directories and enables WAL', () => {
    const wrapper = new DatabaseWrapper(join(dir, 'nested', 'state.db'))
    wrapper.open()
    try {
      expect(wrapper.db.pragma('journal_mode', { simple: true })).toBe('wal')
      expect(wrapper.db.pragma('foreign_keys', { simple: true })).toBe(1)
    } finally {
      wrapper.close()
    }
  })

  it('opens and closes idempotently', () => {
    const wrapper = new DatabaseWrapper(':memory:')
    wrapper.open()
    wrapper.open()
    expect(wrapper.isOpen).toBe(true)
    wrapper.close()
    wrapper.close()
    expect(wrapper.isOpen).toBe(false)
    expect(() => wrapper.db).toThrow('DatabaseWrapper: database is not open. Call open() first.')
  })
})

describe('DatabaseService', () => {
  it('migrates on initialize and closes on shutdown', async () => {
    const service = createDatabaseService(':memory:')
    await service.initialize()
    await service.initialize()

    const row = service.db.prepare('SELECT COUNT(*) AS n FROM schema_migrations').get() as { n: number }
    expect(row.n).toBe(3)

    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })
})

describe('openInMemoryDatabase', () => {
  it('returns a migrated connection', () => {
    const db = openInMemoryDatabase()
    try {
      expect(db.prepare('SELECT COUNT(*) AS n FROM jobs').get()).toEqual({ n: 0 })
    } finally {
      db.close()
    }
  })
})
