/**
 * Unit tests for config-schema.ts
 *
 * Validates that:
 *  - RedraftConfigSchema accepts the defaults
 *  - RedraftConfigSchema rejects invalid configs with clear paths
 *  - PartialRedraftConfigSchema accepts partial configs
 */

import { describe, it, expect } from 'vitest'
import {
  RedraftConfigSchema,
  PartialRedraftConfigSchema,
  OrchestratorSettingsSchema,
  LogLevelSchema,
} from '../config-schema.js'
import type { RedraftConfig } from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

function makeValidConfig(overrides: Partial<RedraftConfig> = {}): RedraftConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
  }
}

describe('RedraftConfigSchema', () => {
  it('accepts the built-in defaults', () => {
    expect(RedraftConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects a missing section', () => {
    const { diff: _diff, ...rest } = makeValidConfig()
    const result = RedraftConfigSchema.safeParse(rest)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['diff'])
    }
  })

  it('rejects a zero concurrency limit', () => {
    const result = RedraftConfigSchema.safeParse(
      makeValidConfig({ orchestrator: { ...DEFAULT_CONFIG.orchestrator, max_concurrent_jobs: 0 } }),
    )
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['orchestrator', 'max_concurrent_jobs'])
    }
  })

  it('rejects an unknown top-level key', () => {
    expect(RedraftConfigSchema.safeParse({ ...DEFAULT_CONFIG, providers: {} }).success).toBe(false)
  })

  it('rejects a port outside 0..65535', () => {
    expect(
      RedraftConfigSchema.safeParse(makeValidConfig({ server: { host: '0.0.0.0', port: 70000 } })).success,
    ).toBe(false)
  })
})

describe('OrchestratorSettingsSchema', () => {
  it('requires integer attempts', () => {
    expect(OrchestratorSettingsSchema.safeParse({ ...DEFAULT_CONFIG.orchestrator, max_attempts_per_pass: 2.5 }).success).toBe(
      false,
    )
  })
})

describe('LogLevelSchema', () => {
  it('accepts pino levels only', () => {
    expect(LogLevelSchema.safeParse('silent').success).toBe(true)
    expect(LogLevelSchema.safeParse('verbose').success).toBe(false)
  })
})

describe('PartialRedraftConfigSchema', () => {
  it('accepts a single nested key', () => {
    expect(PartialRedraftConfigSchema.parse({ broadcast: { replay_page_size: 50 } })).toEqual({
      broadcast: { replay_page_size: 50 },
    })
  })

  it('accepts an empty document', () => {
    expect(PartialRedraftConfigSchema.safeParse({}).success).toBe(true)
  })

  it('rejects a wrong type inside a section', () => {
    expect(PartialRedraftConfigSchema.safeParse({ refiner: { args: 'not-a-list' } }).success).toBe(false)
  })
})
