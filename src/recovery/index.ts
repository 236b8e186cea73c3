/**
 * Public API for the recovery module.
 */

export {
  setupGracefulShutdown,
  type ShutdownHandlerOptions,
  type ShutdownSignal,
} from './shutdown-handler.js'
