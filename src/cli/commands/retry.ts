/**
 * `redraft retry` command
 *
 * Starts a new job with the file, passes and model of a failed or cancelled
 * one, then drives it like `redraft start`.
 *
 * Exit codes:
 *   0 - The new job completed
 *   1 - The new job failed, the original job cannot be retried, or a system error
 *   2 - Job not found
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderJobHuman } from '../formatters/job-formatter.js'
import { EXIT_ERROR, EXIT_SUCCESS, followJob, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('retry-cmd', { destination: 'stderr' })

export interface RetryActionOptions {
  jobId: string
  follow?: boolean
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

export async function runRetryAction(options: RetryActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'retry', version: options.version ?? '0.0.0' }
  try {
    return await withEngine(options.open, 'drive', async (engine) => {
      const job = engine.retryJob(options.jobId)
      writeOutput(ctx, { job, retryOf: options.jobId }, `Started job ${job.id} (retry of ${options.jobId})`)

      if (options.follow ?? true) {
        await followJob(engine, job.id, 0, ctx)
      }
      await engine.whenIdle()

      const finished = engine.getJob(job.id)
      writeOutput(ctx, { job: finished }, renderJobHuman(finished))
      return finished.status === 'completed' ? EXIT_SUCCESS : EXIT_ERROR
    })
  } catch (err) {
    return reportCommandError(err, logger, 'retry')
  }
}

export function registerRetryCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('retry <jobId>')
    .description('Re-run a failed or cancelled job as a new job')
    .option('--no-follow', 'Do not print events while the job runs')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (jobId: string, opts: { follow: boolean; outputFormat: string }) => {
      process.exitCode = await runRetryAction({
        jobId,
        follow: opts.follow,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        open,
      })
    })
}
