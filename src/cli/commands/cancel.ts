/**
 * `redraft cancel` command
 *
 * Cancels a job. A pending job is cancelled at once; a job another process
 * is driving gets a cancel signal it honours at the next pass boundary.
 *
 * Usage:
 *   redraft cancel <jobId>
 *   redraft cancel <jobId> --reason "wrong file"
 *   redraft cancel <jobId> --output-format json
 *
 * Exit codes:
 *   0 - Cancelled, or cancellation requested
 *   1 - Job already completed or failed, or a system error
 *   2 - Job not found
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('cancel-cmd', { destination: 'stderr' })

export interface CancelActionOptions {
  jobId: string
  reason?: string
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

export async function runCancelAction(options: CancelActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'cancel', version: options.version ?? '0.0.0' }
  try {
    return await withEngine(options.open, 'inspect', async (engine) => {
      const job = engine.cancel(options.jobId, options.reason)
      const requested = job.status !== 'cancelled'
      const human = requested
        ? `Cancellation requested for job ${job.id}; it stops at the next pass boundary.`
        : `Job ${job.id} cancelled.`
      writeOutput(ctx, { job, requested }, human)
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportCommandError(err, logger, 'cancel')
  }
}

export function registerCancelCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('cancel <jobId>')
    .description('Cancel a pending or running job')
    .option('--reason <text>', 'Recorded on the cancellation event')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (jobId: string, opts: { reason?: string; outputFormat: string }) => {
      process.exitCode = await runCancelAction({
        jobId,
        reason: opts.reason,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        open,
      })
    })
}
