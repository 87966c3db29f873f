/**
 * `redraft serve` command
 *
 * Runs the engine with the HTTP API and the WebSocket gateway until SIGINT
 * or SIGTERM. Startup recovery and the stale-job watchdog are on.
 */

import type { Command } from 'commander'
import { startServer } from '../../server/index.js'
import type { RunningServer } from '../../server/index.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, intOption, reportCommandError, writeOutput } from '../utils/command-helpers.js'
import type { EngineOpener } from '../utils/engine-session.js'
import { parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'

const logger = createLogger('serve-cmd', { destination: 'stderr' })

export interface ServeActionOptions {
  /** Override `server.host` */
  host?: string
  /** Override `server.port` */
  port?: number
  outputFormat: OutputFormat
  version?: string
  open: EngineOpener
  /** Aborting stops the server */
  signal: AbortSignal
}

function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true })
  })
}

export async function runServeAction(options: ServeActionOptions): Promise<number> {
  const ctx = { outputFormat: options.outputFormat, command: 'serve', version: options.version ?? '0.0.0' }
  try {
    const engine = await options.open('serve')
    const { config } = engine
    let server: RunningServer
    try {
      server = await startServer({
        engine,
        host: options.host ?? config.server.host,
        port: options.port ?? config.server.port,
        heartbeatIntervalMs: config.broadcast.heartbeat_interval_ms,
        logger: childLogger(logger, { module: 'server' }),
      })
    } catch (err) {
      await engine.shutdown()
      throw err
    }
    writeOutput(ctx, { address: server.address }, `Listening on ${server.address}`)

    await whenAborted(options.signal)

    // Close the listener first; shutdown ends the open SSE streams it waits on
    const closing = server.close()
    await engine.shutdown()
    await closing
    writeOutput(ctx, { stopped: true }, 'Server stopped.')
    return EXIT_SUCCESS
  } catch (err) {
    return reportCommandError(err, logger, 'serve')
  }
}

export function registerServeCommand(program: Command, version: string, open: EngineOpener): void {
  program
    .command('serve')
    .description('Serve the HTTP API and WebSocket gateway')
    .option('--host <host>', 'Interface to bind (default: server.host)')
    .option('--port <port>', 'Port to listen on (default: server.port)', intOption(0))
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { host?: string; port?: number; outputFormat: string }) => {
      const controller = new AbortController()
      const stop = (): void => {
        controller.abort()
      }
      process.once('SIGINT', stop)
      process.once('SIGTERM', stop)
      try {
        process.exitCode = await runServeAction({
          host: opts.host,
          port: opts.port,
          outputFormat: parseOutputFormat(opts.outputFormat),
          version,
          open,
          signal: controller.signal,
        })
      } finally {
        process.removeListener('SIGINT', stop)
        process.removeListener('SIGTERM', stop)
      }
    })
}
