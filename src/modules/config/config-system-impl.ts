/**
 * ConfigSystem implementation — loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → project config      (./.redraft/config.yaml)
 *     → environment vars    (REDRAFT_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 *
 * Relative `global.database_path` and `files.root_dir` values resolve against
 * the project directory (the parent of `.redraft/`).
 */

import { readFile, access } from 'node:fs/promises'
import { dirname, isAbsolute, join, resolve } from 'node:path'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import { PartialRedraftConfigSchema, RedraftConfigSchema } from './config-schema.js'
import type { PartialRedraftConfig, RedraftConfig } from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of REDRAFT_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  REDRAFT_LOG_LEVEL: 'global.log_level',
  REDRAFT_DATABASE_PATH: 'global.database_path',
  REDRAFT_MAX_CONCURRENT_JOBS: 'orchestrator.max_concurrent_jobs',
  REDRAFT_MAX_ATTEMPTS_PER_PASS: 'orchestrator.max_attempts_per_pass',
  REDRAFT_RETRY_BACKOFF_MS: 'orchestrator.retry_backoff_ms',
  REDRAFT_PASS_TIMEOUT_MS: 'orchestrator.pass_timeout_ms',
  REDRAFT_SUBSCRIBER_BUFFER_SIZE: 'broadcast.subscriber_buffer_size',
  REDRAFT_HEARTBEAT_INTERVAL_MS: 'broadcast.heartbeat_interval_ms',
  REDRAFT_REFINER_COMMAND: 'refiner.command',
  REDRAFT_FILES_ROOT: 'files.root_dir',
  REDRAFT_SERVER_HOST: 'server.host',
  REDRAFT_SERVER_PORT: 'server.port',
}

function coerceEnvValue(raw: string): string | number | boolean {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid values are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialRedraftConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue

    const [section, key] = configPath.split('.')
    if (section === undefined || key === undefined) continue
    const existing = overrides[section]
    const target: Record<string, unknown> = isPlainObject(existing) ? existing : {}
    target[key] = coerceEnvValue(rawValue)
    overrides[section] = target
  }

  const parsed = PartialRedraftConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: RedraftConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _cliOverrides: PartialRedraftConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.redraft')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigDir(): string {
    return this._projectConfigDir
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Apply project config if present
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
    }

    // 3. Apply environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 4. Apply CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    // 5. Validate the merged config
    const result = RedraftConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    const projectRoot = dirname(this._projectConfigDir)
    const config = result.data
    this._config = {
      ...config,
      global: { ...config.global, database_path: resolveProjectPath(projectRoot, config.global.database_path) },
      files: { ...config.files, root_dir: resolveProjectPath(projectRoot, config.files.root_dir) },
    }
    logger.debug({ projectConfigDir: this._projectConfigDir }, 'Configuration loaded successfully')
  }

  getConfig(): RedraftConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialRedraftConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialRedraftConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

function resolveProjectPath(projectRoot: string, value: string): string {
  if (value === ':memory:' || isAbsolute(value)) return value
  return resolve(projectRoot, value)
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
