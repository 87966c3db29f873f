/**
 * Zod validation schemas for the Redraft configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings (logging, database)
 *  - orchestrator limits and retry policy
 *  - broadcast buffering
 *  - crash recovery / watchdog
 *  - diff, refiner, files and server settings
 *  - full config document
 */

import { z } from 'zod'

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevel = z.infer<typeof LogLevelSchema>

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** SQLite file; relative paths resolve against the project directory */
    database_path: z.string().min(1),
  })
  .strict()

export const OrchestratorSettingsSchema = z
  .object({
    max_concurrent_jobs: z.number().int().min(1).max(256),
    max_attempts_per_pass: z.number().int().min(1).max(20),
    retry_backoff_ms: z.number().int().min(0),
    pass_timeout_ms: z.number().int().min(1),
  })
  .strict()

export const BroadcastSettingsSchema = z
  .object({
    subscriber_buffer_size: z.number().int().min(1),
    replay_page_size: z.number().int().min(1),
    heartbeat_interval_ms: z.number().int().min(0),
  })
  .strict()

export const RecoverySettingsSchema = z
  .object({
    stale_job_threshold_ms: z.number().int().min(1),
    /** 0 disables the watchdog */
    watchdog_interval_ms: z.number().int().min(0),
  })
  .strict()

export const DiffSettingsSchema = z
  .object({
    max_alignment_cells: z.number().int().min(1),
  })
  .strict()

export const RefinerSettingsSchema = z
  .object({
    /** Executable run once per pass; content on stdin, refined content on stdout */
    command: z.string().min(1),
    args: z.array(z.string()),
    /** Exit codes that fail the job instead of being retried */
    fatal_exit_codes: z.array(z.number().int()),
  })
  .strict()

export const FilesSettingsSchema = z
  .object({
    root_dir: z.string().min(1),
  })
  .strict()

export const ServerSettingsSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  })
  .strict()

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const RedraftConfigSchema = z
  .object({
    global: GlobalSettingsSchema,
    orchestrator: OrchestratorSettingsSchema,
    broadcast: BroadcastSettingsSchema,
    recovery: RecoverySettingsSchema,
    diff: DiffSettingsSchema,
    refiner: RefinerSettingsSchema,
    files: FilesSettingsSchema,
    server: ServerSettingsSchema,
  })
  .strict()

export type RedraftConfig = z.infer<typeof RedraftConfigSchema>

/** Shape accepted from config files, env vars and CLI flags */
export const PartialRedraftConfigSchema = z
  .object({
    global: GlobalSettingsSchema.partial().optional(),
    orchestrator: OrchestratorSettingsSchema.partial().optional(),
    broadcast: BroadcastSettingsSchema.partial().optional(),
    recovery: RecoverySettingsSchema.partial().optional(),
    diff: DiffSettingsSchema.partial().optional(),
    refiner: RefinerSettingsSchema.partial().optional(),
    files: FilesSettingsSchema.partial().optional(),
    server: ServerSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialRedraftConfig = z.infer<typeof PartialRedraftConfigSchema>
