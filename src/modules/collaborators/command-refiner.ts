/**
 * CommandRefiner — runs one refinement pass through an external command.
 *
 * The previous pass content goes to the command's stdin and the refined
 * content is read from its stdout. Pass context travels in environment
 * variables:
 *
 *   REDRAFT_FILE_ID, REDRAFT_PASS, REDRAFT_MODEL, REDRAFT_CONFIG (JSON)
 *
 * Exit code 0 is success. An exit code listed in `fatalExitCodes` raises
 * FatalError; any other failure raises TransientError so the pass is retried.
 */

import { spawn } from 'node:child_process'
import { FatalError, TransientError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { RefinementCollaborator, RunPassRequest } from './types.js'

/** Longest stderr tail carried in an error message */
const STDERR_TAIL_CHARS = 500

export interface CommandRefinerOptions {
  command: string
  args: string[]
  fatalExitCodes: number[]
  cwd?: string
  logger?: Logger
}

export class CommandRefiner implements RefinementCollaborator {
  private readonly _command: string
  private readonly _args: string[]
  private readonly _fatalExitCodes: ReadonlySet<number>
  private readonly _cwd: string | undefined
  private readonly _logger: Logger

  constructor(options: CommandRefinerOptions) {
    this._command = options.command
    this._args = options.args
    this._fatalExitCodes = new Set(options.fatalExitCodes)
    this._cwd = options.cwd
    this._logger = options.logger ?? createLogger('command-refiner')
  }

  runPass(request: RunPassRequest): Promise<string> {
    const { fileId, passNumber, signal } = request
    if (signal.aborted) {
      return Promise.reject(abortError(signal, passNumber))
    }

    return new Promise<string>((resolve, reject) => {
      let stdout = ''
      let stderr = ''
      let settled = false

      const settle = (fn: () => void): void => {
        if (settled) return
        settled = true
        signal.removeEventListener('abort', onAbort)
        fn()
      }

      const proc = spawn(this._command, this._args, {
        cwd: this._cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
        env: {
          ...process.env,
          REDRAFT_FILE_ID: fileId,
          REDRAFT_PASS: String(passNumber),
          REDRAFT_MODEL: request.model,
          REDRAFT_CONFIG: JSON.stringify(request.config),
        },
      })

      const onAbort = (): void => {
        proc.kill('SIGTERM')
        settle(() => reject(abortError(signal, passNumber)))
      }
      signal.addEventListener('abort', onAbort, { once: true })

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8')
      })
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf-8')
      })

      proc.on('error', (err: Error) => {
        this._logger.error({ command: this._command, err }, 'Failed to start refiner command')
        settle(() =>
          reject(
            new FatalError(`Failed to start refiner command "${this._command}": ${err.message}`, {
              command: this._command,
            }),
          ),
        )
      })

      proc.on('close', (code: number | null) => {
        if (code === 0) {
          settle(() => resolve(stdout))
          return
        }

        const tail = stderr.trim().slice(-STDERR_TAIL_CHARS)
        const detail = tail === '' ? '' : `: ${tail}`
        const context = { command: this._command, fileId, passNumber, exitCode: code }
        this._logger.warn(context, 'Refiner command failed')

        if (code !== null && this._fatalExitCodes.has(code)) {
          settle(() => reject(new FatalError(`Refiner exited with code ${String(code)}${detail}`, context)))
        } else if (code === null) {
          settle(() => reject(new TransientError(`Refiner was terminated by a signal${detail}`, context)))
        } else {
          settle(() => reject(new TransientError(`Refiner exited with code ${String(code)}${detail}`, context)))
        }
      })

      if (proc.stdin !== null) {
        proc.stdin.on('error', (err: Error) => {
          // The command may exit without reading its input; its exit code decides the outcome
          this._logger.debug({ err }, 'Refiner stdin closed early')
        })
        proc.stdin.end(request.content, 'utf-8')
      }
    })
  }
}

function abortError(signal: AbortSignal, passNumber: number): Error {
  const reason: unknown = signal.reason
  if (reason instanceof Error) return reason
  return new TransientError(`Pass ${String(passNumber)} aborted`, { passNumber })
}
