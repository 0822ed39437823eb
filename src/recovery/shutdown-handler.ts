/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for the
 * duration of a run.
 *
 * On signal receipt the checkpoint lock is released and the process exits.
 * The checkpoint is left at its last write; the next `resume` reconciles it.
 *
 * Returns a cleanup function that removes the listeners.
 */

import type pino from 'pino'
import { createLogger } from '../utils/logger.js'
import { EXIT_SUSPENDED } from '../core/exit-codes.js'

const defaultLogger = createLogger('shutdown-handler')

export interface ShutdownHandlerOptions {
  /** Release held resources; normally unlocks the checkpoint */
  release: () => Promise<void>
  exitCode?: number
  /** Replaces process.exit, for tests */
  exit?: (code: number) => void
  logger?: pino.Logger
}

export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const log = options.logger ?? defaultLogger
  const exit = options.exit ?? ((code: number): void => process.exit(code))
  const exitCode = options.exitCode ?? EXIT_SUSPENDED

  const shutdown = async (signal: string): Promise<void> => {
    log.warn({ signal }, 'Interrupted; releasing the checkpoint lock')
    try {
      await options.release()
    } catch (err) {
      log.error({ err }, 'Failed to release resources during shutdown')
    }
    exit(exitCode)
  }

  const sigintHandler = (): void => {
    void shutdown('SIGINT')
  }

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM')
  }

  process.on('SIGINT', sigintHandler)
  process.on('SIGTERM', sigtermHandler)

  return (): void => {
    process.removeListener('SIGINT', sigintHandler)
    process.removeListener('SIGTERM', sigtermHandler)
  }
}
