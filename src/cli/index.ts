#!/usr/bin/env node
/**
 * Redraft CLI - Main entry point
 * Provides the `redraft` command-line interface
 */

import { Command, Option } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { realpathSync } from 'node:fs'
import { z } from 'zod'
import type { PartialRedraftConfig } from '../modules/config/config-schema.js'
import { LogLevelSchema } from '../modules/config/config-schema.js'
import { createLogger } from '../utils/logger.js'
import { registerCancelCommand } from './commands/cancel.js'
import { registerDiffCommand } from './commands/diff.js'
import { registerListCommand } from './commands/list.js'
import { registerRecoverCommand } from './commands/recover.js'
import { registerRetryCommand } from './commands/retry.js'
import { registerServeCommand } from './commands/serve.js'
import { registerStartCommand } from './commands/start.js'
import { registerStatusCommand } from './commands/status.js'
import { registerWatchCommand } from './commands/watch.js'
import { createEngineOpener } from './utils/engine-session.js'
import type { EngineOpener, EngineOpenerOptions } from './utils/engine-session.js'

const logger = createLogger('cli', { destination: 'stderr' })

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package version relative to this file (run from dist/ or src/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let raw: string
    try {
      raw = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = PackageJsonSchema.safeParse(JSON.parse(raw))
    if (pkg.success && pkg.data.name === 'redraft') {
      return pkg.data.version ?? '0.0.0'
    }
  }
  return '0.0.0'
}

interface GlobalOptions {
  configDir?: string
  database?: string
  filesRoot?: string
  logLevel?: string
}

/** Map global flags onto the highest-priority config layer */
export function globalOptionsToOpener(opts: GlobalOptions): EngineOpenerOptions {
  const overrides: PartialRedraftConfig = {}
  const parsedLevel = LogLevelSchema.safeParse(opts.logLevel)
  const logLevel = parsedLevel.success ? parsedLevel.data : undefined
  if (opts.database !== undefined || logLevel !== undefined) {
    overrides.global = { database_path: opts.database, log_level: logLevel }
  }
  if (opts.filesRoot !== undefined) {
    overrides.files = { root_dir: opts.filesRoot }
  }
  return { projectConfigDir: opts.configDir, cliOverrides: overrides }
}

/**
 * Create and configure the CLI program.
 *
 * @param open - Engine factory; defaults to one built from the global flags
 */
export async function createProgram(open?: EngineOpener): Promise<Command> {
  const version = await getPackageVersion()
  const program = new Command()

  program
    .name('redraft')
    .description('Redraft - multi-pass document refinement jobs')
    .version(version, '-v, --version', 'Output the current version')
    .option('--config-dir <dir>', 'Directory holding config.yaml (default: ./.redraft)')
    .option('--database <path>', 'SQLite database file')
    .option('--files-root <dir>', 'Directory file ids resolve against')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LogLevelSchema.options))

  const opener: EngineOpener =
    open ?? ((mode) => createEngineOpener(globalOptionsToOpener(program.opts<GlobalOptions>()))(mode))

  registerStartCommand(program, version, opener)
  registerStatusCommand(program, version, opener)
  registerListCommand(program, version, opener)
  registerWatchCommand(program, version, opener)
  registerDiffCommand(program, version, opener)
  registerCancelCommand(program, version, opener)
  registerRetryCommand(program, version, opener)
  registerRecoverCommand(program, version, opener)
  registerServeCommand(program, version, opener)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Run only when executed directly, not when imported by tests
// (npm links the bin, so compare real paths)
if (process.argv[1] !== undefined && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  void main()
}
