/**
 * `redraft list` command
 *
 * Lists jobs, newest first.
 */

import type { Command } from 'commander'
import type { JobFilter, JobStatus } from '../../core/types.js'
import { JobStatusSchema } from '../../modules/job-store/schemas.js'
import { ValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, intOption, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { formatJobTable, parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('list-cmd', { destination: 'stderr' })

export interface ListActionOptions {
  /** Comma-separated statuses */
  status?: string
  userId?: string
  limit?: number
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

function parseStatuses(raw: string): JobStatus[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      const parsed = JobStatusSchema.safeParse(s)
      if (!parsed.success) throw new ValidationError(`Unknown status "${s}"`)
      return parsed.data
    })
}

export async function runListAction(options: ListActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'list', version: options.version ?? '0.0.0' }
  try {
    const filter: JobFilter = {
      status: options.status === undefined ? undefined : parseStatuses(options.status),
      userId: options.userId,
      limit: options.limit,
    }
    return await withEngine(options.open, 'inspect', async (engine) => {
      const jobs = engine.listJobs(filter)
      writeOutput(ctx, { jobs }, jobs.length === 0 ? 'No jobs found.' : formatJobTable(jobs))
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportCommandError(err, logger, 'list')
  }
}

export function registerListCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('list')
    .description('List jobs, newest first')
    .option('--status <statuses>', 'Comma-separated statuses, e.g. pending,processing')
    .option('--user <userId>', 'Only jobs owned by this user')
    .option('--limit <n>', 'Maximum number of jobs', intOption(1))
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { status?: string; user?: string; limit?: number; outputFormat: string }) => {
      process.exitCode = await runListAction({
        status: opts.status,
        userId: opts.user,
        limit: opts.limit,
        outputFormat: parseOutputFormat(opts.outputFormat),
        version,
        open,
      })
    })
}
