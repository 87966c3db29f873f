/**
 * `redraft start` command
 *
 * Creates a refinement job for one file and drives it to a terminal state in
 * this process, printing its events as they happen.
 *
 * Usage:
 *   redraft start <fileId> --passes 3 --model default
 *   redraft start <fileId> --passes 2 --model default --output-format json
 *
 * Exit codes:
 *   0 - Job completed
 *   1 - Job failed or was cancelled, or a system error
 *   2 - Usage error (malformed request)
 */

import { basename } from 'node:path'
import type { Command } from 'commander'
import { ValidationError } from '../../core/errors.js'
import type { StructuredMap } from '../../core/types.js'
import { StructuredMapSchema } from '../../core/structured-value.js'
import { createLogger } from '../../utils/logger.js'
import { renderJobHuman } from '../formatters/job-formatter.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  followJob,
  intOption,
  reportCommandError,
  writeOutput,
} from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { withEngine } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('start-cmd', { destination: 'stderr' })

export interface StartActionOptions {
  fileId: string
  /** Defaults to the last path segment of fileId */
  fileName?: string
  passes: number
  model: string
  userId?: string
  /** JSON object stored on the job */
  metadataJson?: string
  /** Print events while the job runs (default true) */
  follow?: boolean
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
}

function parseMetadata(raw: string | undefined): StructuredMap | undefined {
  if (raw === undefined) return undefined
  let value: unknown
  try {
    value = JSON.parse(raw)
  } catch (err) {
    throw new ValidationError(`--metadata is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  const parsed = StructuredMapSchema.safeParse(value)
  if (!parsed.success) {
    throw new ValidationError('--metadata must be a JSON object')
  }
  return parsed.data
}

export async function runStartAction(options: StartActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'start', version: options.version ?? '0.0.0' }

  try {
    const metadata = parseMetadata(options.metadataJson)
    return await withEngine(options.open, 'drive', async (engine) => {
      const job = engine.startJob({
        fileId: options.fileId,
        fileName: options.fileName ?? basename(options.fileId),
        totalPasses: options.passes,
        model: options.model,
        userId: options.userId,
        metadata,
      })
      writeOutput(ctx, { job }, `Started job ${job.id} (${String(job.totalPasses)} pass(es))`)

      if (options.follow ?? true) {
        await followJob(engine, job.id, 0, ctx)
      }
      await engine.whenIdle()

      const finished = engine.getJob(job.id)
      writeOutput(ctx, { job: finished }, renderJobHuman(finished))
      return finished.status === 'completed' ? EXIT_SUCCESS : EXIT_ERROR
    })
  } catch (err) {
    return reportCommandError(err, logger, 'start')
  }
}

export function registerStartCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('start <fileId>')
    .description('Refine a file through several passes')
    .requiredOption('-p, --passes <n>', 'Number of refinement passes', intOption(1))
    .requiredOption('-m, --model <model>', 'Model handed to the refiner')
    .option('--file-name <name>', 'Display name (default: last path segment of fileId)')
    .option('--user <userId>', 'Owner recorded on the job')
    .option('--metadata <json>', 'JSON object stored on the job')
    .option('--no-follow', 'Do not print events while the job runs')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        fileId: string,
        opts: {
          passes: number
          model: string
          fileName?: string
          user?: string
          metadata?: string
          follow: boolean
          outputFormat: string
        },
      ) => {
        process.exitCode = await runStartAction({
          fileId,
          fileName: opts.fileName,
          passes: opts.passes,
          model: opts.model,
          userId: opts.user,
          metadataJson: opts.metadata,
          follow: opts.follow,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
          open,
        })
      },
    )
}
