/**
 * ProcessHook: how a supervisor actually launches and terminates a service.
 *
 * The supervisor treats hooks as opaque calls and bounds each one with its own
 * timeout; hooks should still honour the AbortSignal they are given.
 */

/** Identifies whatever a start hook launched */
export interface HookHandle {
  id: string
  pid?: number
}

export interface ProcessHook {
  /** Launch the service. Resolves once it is launched; rejects on failure. */
  start(signal: AbortSignal): Promise<HookHandle>

  /** Request graceful termination and resolve once it is confirmed. */
  stop(signal: AbortSignal): Promise<void>

  /** Terminate immediately (e.g. SIGKILL). */
  forceStop(): Promise<void>

  /** Whether the launched service is still present */
  isAlive(): boolean
}
