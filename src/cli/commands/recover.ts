/**
 * `redraft recover` command
 *
 * Takes over jobs a dead process left `processing` or `pending` and drives
 * them to a terminal state here. Do not run it while a server is serving
 * the same database; the server recovers on its own.
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderRecoveryHuman } from '../formatters/job-formatter.js'
import { EXIT_SUCCESS, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('recover-cmd', { destination: 'stderr' })

export interface RecoverActionOptions {
  /** Return once jobs are handed over instead of waiting for them */
  wait?: boolean
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

export async function runRecoverAction(options: RecoverActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'recover', version: options.version ?? '0.0.0' }
  try {
    return await withEngine(options.open, 'drive', async (engine) => {
      const result = engine.recover()
      writeOutput(ctx, result, renderRecoveryHuman(result))
      if (options.wait ?? true) {
        await engine.whenIdle()
      }
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportCommandError(err, logger, 'recover')
  }
}

export function registerRecoverCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('recover')
    .description('Resume or fail jobs left behind by a crashed process')
    .option('--no-wait', 'Exit without driving the recovered jobs; they stay processing')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { wait: boolean; outputFormat: string }) => {
      process.exitCode = await runRecoverAction({
        wait: opts.wait,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        open,
      })
    })
}
