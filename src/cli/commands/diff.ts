/**
 * `redraft diff` command
 *
 * Compares two stored pass snapshots of a file. Pass 0 is the original.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - A pass has no snapshot
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderDiffHuman } from '../formatters/job-formatter.js'
import { EXIT_SUCCESS, intOption, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('diff-cmd', { destination: 'stderr' })

export interface DiffActionOptions {
  fileId: string
  fromPass: number
  toPass: number
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

export async function runDiffAction(options: DiffActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'diff', version: options.version ?? '0.0.0' }
  try {
    return await withEngine(options.open, 'inspect', async (engine) => {
      const diff = engine.diff({ fileId: options.fileId, fromPass: options.fromPass, toPass: options.toPass })
      writeOutput(ctx, diff, renderDiffHuman(diff))
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportCommandError(err, logger, 'diff')
  }
}

export function registerDiffCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('diff <fileId>')
    .description('Show what changed between two passes of a file')
    .requiredOption('--from <pass>', 'Earlier pass (0 = original)', intOption(0))
    .requiredOption('--to <pass>', 'Later pass', intOption(0))
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (fileId: string, opts: { from: number; to: number; outputFormat: string }) => {
      process.exitCode = await runDiffAction({
        fileId,
        fromPass: opts.from,
        toPass: opts.to,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        open,
      })
    })
}
