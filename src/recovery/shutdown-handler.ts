/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for the
 * foreground supervisor.
 *
 * The first signal requests a graceful shutdown (reverse-order stop of every
 * service). A second signal while that is in progress exits immediately with
 * 128 + signal number, leaving the services to the operator.
 *
 * Returns a cleanup function that removes the listeners.
 */

import type { EventEmitter } from 'node:events'
import type pino from 'pino'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ShutdownSignal = 'SIGINT' | 'SIGTERM'

export interface ShutdownHandlerOptions {
  /** Called once, on the first signal */
  onShutdown: (signal: ShutdownSignal) => void
  /** Called on a repeated signal (default: process.exit) */
  onForceExit?: (code: number) => void
  /** Where signals arrive (default: process) */
  source?: EventEmitter
  logger?: pino.Logger
}

const SIGNAL_EXIT_CODES: Record<ShutdownSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
}

// ---------------------------------------------------------------------------
// setupGracefulShutdown
// ---------------------------------------------------------------------------

/**
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const log = options.logger ?? defaultLogger
  const forceExit = options.onForceExit ?? ((code: number): void => process.exit(code))
  let requested = false

  const handle = (signal: ShutdownSignal): void => {
    if (requested) {
      log.warn({ signal }, 'Second signal received; exiting without stopping services')
      forceExit(SIGNAL_EXIT_CODES[signal])
      return
    }
    requested = true
    log.info({ signal }, 'Graceful shutdown initiated')
    options.onShutdown(signal)
  }

  const sigintHandler = (): void => handle('SIGINT')
  const sigtermHandler = (): void => handle('SIGTERM')

  const source: EventEmitter = options.source ?? process
  source.on('SIGINT', sigintHandler)
  source.on('SIGTERM', sigtermHandler)

  return (): void => {
    source.removeListener('SIGINT', sigintHandler)
    source.removeListener('SIGTERM', sigtermHandler)
  }
}
