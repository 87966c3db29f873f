/**
 * Redraft - Main module exports
 * Public API surface for embedding the engine
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Engine
export { createRedraftEngine } from './core/engine-impl.js'
export type { RedraftEngine, RedraftEngineOptions, AttachOptions, DiffRequest } from './core/engine.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { EngineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Utilities
export { createLogger, childLogger } from './utils/logger.js'
export type { Logger, LoggerOptions } from './utils/logger.js'
export * from './utils/helpers.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/collaborators/index.js'
export * from './modules/job-store/index.js'
export * from './modules/version-store/index.js'
export * from './modules/diff-engine/index.js'
export * from './modules/broadcaster/index.js'
export * from './modules/job-orchestrator/index.js'
export * from './recovery/index.js'

// Transports
export { buildServerApp, startServer, SocketGateway } from './server/index.js'
export type {
  ServerAppOptions,
  StartServerOptions,
  RunningServer,
  AttachAck,
  ClientToServerEvents,
  ServerToClientEvents,
  GatewayConnection,
  GatewayMessage,
  StreamEndPayload,
  ErrorBody,
} from './server/index.js'
