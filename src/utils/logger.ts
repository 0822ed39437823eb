/**
 * Logger utility for phasewright
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use): default to warn to avoid noise
  return 'warn'
}

/** Level applied by setLogLevel; overrides the environment default */
let levelOverride: string | undefined

/** Every logger created so far, so a level change reaches module-level loggers */
const created = new Set<pino.Logger>()

/**
 * Change the level of every logger, including those already created.
 * Used once the configuration (`global.log_level`) is loaded.
 */
export function setLogLevel(level: string): void {
  levelOverride = level
  for (const instance of created) instance.level = level
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep plain JSON for CLI and production use.
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? levelOverride ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
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

  const instance = pretty ? createPretty(baseOptions) : pino(baseOptions)
  if (options.level === undefined) created.add(instance)
  return instance
}

// pino-pretty is a devDependency; only used outside production.
function createPretty(baseOptions: pino.LoggerOptions): pino.Logger {
  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  })
}

/** Root application logger */
export const logger = createLogger('phasewright')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
