/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PartialRedraftConfig, RedraftConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .redraft/ directory (default: <cwd>/.redraft) */
  projectConfigDir?: string
  /**
   * Values that override every other layer.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialRedraftConfig
  /** Environment to read REDRAFT_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated Redraft configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): RedraftConfig

  /**
   * Return a single value by dot-notation key (e.g. "orchestrator.max_concurrent_jobs").
   */
  get(key: string): unknown

  /** Directory holding config.yaml; relative paths in the config resolve against its parent */
  readonly projectConfigDir: string

  readonly isLoaded: boolean
}
