/**
 * Opening an engine for one CLI command.
 *
 * Commands that only read or signal jobs open the engine without startup
 * recovery, so they never take over jobs a running server is driving.
 */

import type { RedraftEngine, RedraftEngineOptions } from '../../core/engine.js'
import { createRedraftEngine } from '../../core/engine-impl.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialRedraftConfig } from '../../modules/config/config-schema.js'
import { createLogger } from '../../utils/logger.js'

/**
 * - `inspect`: read, list, diff and cancel
 * - `drive`: run jobs this command starts (start, retry, recover)
 * - `serve`: long-running; recovers on start and runs the watchdog
 */
export type EngineMode = 'inspect' | 'drive' | 'serve'

export type EngineOpener = (mode: EngineMode) => Promise<RedraftEngine>

export interface EngineOpenerOptions {
  /** Directory holding config.yaml (default: <cwd>/.redraft) */
  projectConfigDir?: string
  cliOverrides?: PartialRedraftConfig
  /** Extra engine options, e.g. a refiner or file source */
  engineOverrides?: Partial<Omit<RedraftEngineOptions, 'config'>>
}

export function createEngineOpener(options: EngineOpenerOptions = {}): EngineOpener {
  return async (mode) => {
    const configSystem = createConfigSystem({
      projectConfigDir: options.projectConfigDir,
      cliOverrides: options.cliOverrides,
    })
    await configSystem.load()
    const config = configSystem.getConfig()

    return createRedraftEngine({
      config,
      logger: createLogger('redraft', { level: config.global.log_level, destination: 'stderr' }),
      recoverOnStart: mode === 'serve',
      enableWatchdog: mode === 'serve',
      handleSignals: mode === 'drive',
      ...options.engineOverrides,
    })
  }
}

/** Run `fn` against a freshly opened engine and always shut it down */
export async function withEngine<T>(
  open: EngineOpener,
  mode: EngineMode,
  fn: (engine: RedraftEngine) => Promise<T>,
): Promise<T> {
  const engine = await open(mode)
  try {
    return await fn(engine)
  } finally {
    await engine.shutdown()
  }
}
