/**
 * Logger utility for Redraft
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
  /** CLI commands log to stderr so stdout carries only command output */
  destination?: 'stdout' | 'stderr'
}

export type Logger = pino.Logger

/** Paths whose values never reach the log output */
export const LOG_REDACT_PATHS = ['*.apiKey', '*.api_key', '*.token', '*.password', 'headers.authorization']

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Vitest sets NODE_ENV=test; keep test output quiet unless asked
  if (process.env.NODE_ENV === 'test') return 'silent'
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; only opt in for interactive development
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()
  const fd = options.destination === 'stderr' ? 2 : 1

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: LOG_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (pretty) {
    // pino-pretty is a devDependency; only used outside production
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: fd,
        },
      },
    })
  }

  return pino(baseOptions, pino.destination(fd))
}

/** Create a child logger with additional context */
export function childLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings)
}
