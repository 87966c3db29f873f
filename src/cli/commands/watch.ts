/**
 * `redraft watch` command
 *
 * Follows a job's event log from the database until the job is terminal.
 * Works for jobs driven by any process, so it polls the log instead of
 * subscribing to in-process events. JSON output is one line per event.
 *
 * Exit codes:
 *   0 - Job reached a terminal state
 *   1 - System error
 *   2 - Job not found, or a bad --since
 */

import type { Command } from 'commander'
import { isTerminalEventType, isTerminalStatus } from '../../core/types.js'
import type { JobEvent } from '../../core/types.js'
import { sleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { renderEventLine } from '../formatters/job-formatter.js'
import { EXIT_SUCCESS, intOption, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('watch-cmd', { destination: 'stderr' })

export const DEFAULT_POLL_INTERVAL_MS = 500

export interface WatchActionOptions {
  jobId: string
  sinceSequence: number
  pollIntervalMs?: number
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
  /** Stops the watch early; used on SIGINT */
  signal?: AbortSignal
}

export async function runWatchAction(options: WatchActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'watch', version: options.version ?? '0.0.0' }
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS

  try {
    return await withEngine(options.open, 'inspect', async (engine) => {
      engine.getJob(options.jobId)
      let since = options.sinceSequence

      while (options.signal?.aborted !== true) {
        const events: JobEvent[] = engine.listEvents(options.jobId, since)
        for (const event of events) {
          writeOutput(ctx, { type: 'event', event }, renderEventLine(event))
          since = event.sequence
          if (isTerminalEventType(event.eventType)) return EXIT_SUCCESS
        }
        if (events.length === 0 && isTerminalStatus(engine.getJob(options.jobId).status)) {
          return EXIT_SUCCESS
        }
        await sleep(pollIntervalMs, options.signal)
      }
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportCommandError(err, logger, 'watch')
  }
}

export function registerWatchCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('watch <jobId>')
    .description('Print the events of a job until it finishes')
    .option('--since <sequence>', 'Start after this event sequence', intOption(0), 0)
    .option('--poll-interval <ms>', 'How often to check for new events', intOption(10), DEFAULT_POLL_INTERVAL_MS)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (jobId: string, opts: { since: number; pollInterval: number; outputFormat: string }) => {
      const controller = new AbortController()
      const onSigint = (): void => {
        controller.abort()
      }
      process.once('SIGINT', onSigint)
      try {
        process.exitCode = await runWatchAction({
          jobId,
          sinceSequence: opts.since,
          pollIntervalMs: opts.pollInterval,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
          open,
          signal: controller.signal,
        })
      } finally {
        process.removeListener('SIGINT', onSigint)
      }
    })
}
