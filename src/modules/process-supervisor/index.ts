/**
 * Process supervisor module: barrel exports
 */

export type { ProcessSupervisor, StartOptions } from './process-supervisor.js'
export type { ProcessHook, HookHandle } from './process-hook.js'
export {
  ProcessSupervisorImpl,
  createProcessSupervisor,
} from './process-supervisor-impl.js'
export type { ProcessSupervisorOptions } from './process-supervisor-impl.js'
export {
  CommandHook,
  createCommandHook,
  runToCompletion,
  FORCE_STOP_WAIT_MS,
} from './command-hook.js'
export { TRANSITIONS, canTransition } from './state-machine.js'
