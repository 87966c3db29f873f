/**
 * `redraft status` command
 *
 * Shows one job, optionally with its event log.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Job not found
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { renderEventLine, renderJobHuman } from '../formatters/job-formatter.js'
import { EXIT_SUCCESS, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('status-cmd', { destination: 'stderr' })

export interface StatusActionOptions {
  jobId: string
  showEvents: boolean
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'status', version: options.version ?? '0.0.0' }
  try {
    return await withEngine(options.open, 'inspect', async (engine) => {
      const job = engine.getJob(options.jobId)
      if (!options.showEvents) {
        writeOutput(ctx, { job }, renderJobHuman(job))
        return EXIT_SUCCESS
      }
      const events = engine.listEvents(job.id)
      const human = [renderJobHuman(job), '', ...events.map(renderEventLine)].join('\n')
      writeOutput(ctx, { job, events }, human)
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportCommandError(err, logger, 'status')
  }
}

export function registerStatusCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('status <jobId>')
    .description('Show a job')
    .option('--events', 'Include the event log', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (jobId: string, opts: { events: boolean; outputFormat: string }) => {
      process.exitCode = await runStatusAction({
        jobId,
        showEvents: opts.events,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        open,
      })
    })
}
