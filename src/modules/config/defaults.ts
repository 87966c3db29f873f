/**
 * Built-in default configuration for Redraft.
 *
 * These values are the lowest-priority layer in the config hierarchy.
 * They are always present and provide safe, working defaults.
 */

import type { RedraftConfig } from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: RedraftConfig['global'] = {
  log_level: 'info',
  database_path: '.redraft/redraft.db',
}

export const DEFAULT_CONFIG: RedraftConfig = {
  global: DEFAULT_GLOBAL_SETTINGS,
  orchestrator: {
    max_concurrent_jobs: 4,
    max_attempts_per_pass: 3,
    retry_backoff_ms: 1000,
    pass_timeout_ms: 5 * 60 * 1000,
  },
  broadcast: {
    subscriber_buffer_size: 256,
    replay_page_size: 500,
    heartbeat_interval_ms: 25_000,
  },
  recovery: {
    stale_job_threshold_ms: 10 * 60 * 1000,
    watchdog_interval_ms: 60_000,
  },
  diff: {
    max_alignment_cells: 4_000_000,
  },
  refiner: {
    command: 'cat',
    args: [],
    fatal_exit_codes: [2],
  },
  files: {
    root_dir: '.',
  },
  server: {
    host: '127.0.0.1',
    port: 4870,
  },
}
