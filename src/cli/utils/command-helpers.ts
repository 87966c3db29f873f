/**
 * Shared pieces of the command implementations.
 */

import { InvalidArgumentError } from 'commander'
import type { RedraftEngine } from '../../core/engine.js'
import { RedraftError, exitCodeFor } from '../../core/errors.js'
import type { JobId } from '../../core/types.js'
import { pumpSubscription } from '../../modules/broadcaster/framing.js'
import type { PumpResult } from '../../modules/broadcaster/framing.js'
import { errorMessage } from '../../utils/helpers.js'
import type { Logger } from '../../utils/logger.js'
import { renderStreamItem } from '../formatters/job-formatter.js'
import { jsonLine } from './formatting.js'
import type { OutputFormat } from './formatting.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

/** Commander argument parser for integers with a lower bound */
export function intOption(min: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${String(min)}, got "${value}".`)
    }
    return parsed
  }
}

/**
 * Print a command failure to stderr and return its exit code. Unexpected
 * errors are logged with their stack.
 */
export function reportCommandError(err: unknown, logger: Logger, command: string): number {
  process.stderr.write(`Error: ${errorMessage(err)}\n`)
  if (!(err instanceof RedraftError)) {
    logger.error({ err }, `${command} failed`)
  }
  return exitCodeFor(err)
}

export interface OutputContext {
  outputFormat: OutputFormat
  command: string
  version: string
}

/** Write either a JSON line or the human rendering */
export function writeOutput(ctx: OutputContext, data: unknown, human: string): void {
  if (ctx.outputFormat === 'json') {
    process.stdout.write(jsonLine(ctx.command, data, ctx.version))
  } else {
    process.stdout.write(human + '\n')
  }
}

/**
 * Print a job's events as they happen until the job is terminal. Only sees
 * live events for jobs this process drives.
 */
export function followJob(
  engine: RedraftEngine,
  jobId: JobId,
  sinceSequence: number,
  ctx: OutputContext,
): Promise<PumpResult> {
  const subscription = engine.attach({ jobId, sinceSequence })
  return pumpSubscription(subscription, (item) => {
    writeOutput(ctx, item, renderStreamItem(item))
  })
}
