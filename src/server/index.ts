/**
 * Server entry: HTTP routes plus the socket.io gateway on the same port.
 */

import { Server } from 'socket.io'
import type { RedraftEngine } from '../core/engine.js'
import { childLogger, createLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'
import { buildServerApp } from './app.js'
import { SocketGateway } from './socket-gateway.js'
import type { ClientToServerEvents, ServerToClientEvents } from './socket-gateway.js'

export { buildServerApp } from './app.js'
export type { ServerAppOptions } from './app.js'
export { SocketGateway, fromSocket } from './socket-gateway.js'
export type {
  AttachAck,
  ClientToServerEvents,
  GatewayConnection,
  GatewayMessage,
  ServerToClientEvents,
  StreamEndPayload,
} from './socket-gateway.js'
export { errorResponse } from './error-response.js'
export type { ErrorBody, ErrorResponse } from './error-response.js'
export { streamSse } from './sse.js'

export interface StartServerOptions {
  engine: RedraftEngine
  host: string
  port: number
  heartbeatIntervalMs: number
  logger?: Logger
}

export interface RunningServer {
  /** e.g. http://127.0.0.1:4870 */
  readonly address: string
  readonly gateway: SocketGateway
  /** Stop accepting connections and drop WebSocket clients */
  close(): Promise<void>
}

export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const logger = options.logger ?? createLogger('server')
  const app = buildServerApp({
    engine: options.engine,
    heartbeatIntervalMs: options.heartbeatIntervalMs,
    logger: childLogger(logger, { module: 'http' }),
  })

  const io = new Server<ClientToServerEvents, ServerToClientEvents>(app.server, { cors: { origin: '*' } })
  const gateway = new SocketGateway({
    engine: options.engine,
    heartbeatIntervalMs: options.heartbeatIntervalMs,
    logger: childLogger(logger, { module: 'socket-gateway' }),
  })
  gateway.bind(io)

  const address = await app.listen({ host: options.host, port: options.port })
  logger.info({ address }, 'Server listening')

  return {
    address,
    gateway,
    async close() {
      io.disconnectSockets(true)
      await app.close()
      logger.info('Server closed')
    },
  }
}
