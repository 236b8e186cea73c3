/**
 * ProcessSupervisor interface: owns the lifecycle of one service.
 *
 * Every mutating call is serialized through a per-service lock, so at most one
 * start, stop or restart is in flight for a service at any time. `status()`
 * never waits on that lock.
 */

import type { ServiceDefinition, ServiceName, ServiceState } from '../../core/types.js'
import type { HookHandle } from './process-hook.js'

export interface StartOptions {
  /** Cancels the in-flight start hook */
  signal?: AbortSignal
}

export interface ProcessSupervisor {
  readonly name: ServiceName
  readonly definition: ServiceDefinition

  /**
   * Start the service. A no-op when already Running.
   * @throws {DependencyNotReadyError} if a dependency is not Running
   * @throws {InvalidStateTransitionError} from Unhealthy or Failed
   * @throws the hook's error (state is Stopped afterwards)
   */
  start(options?: StartOptions): Promise<void>

  /**
   * Stop the service. A no-op when already Stopped. Forces termination when
   * the stop hook does not confirm within the grace period. State is Stopped
   * afterwards even when this rejects.
   */
  stop(reason?: string): Promise<void>

  /** Current state; a pure read */
  status(): ServiceState

  /** Running → Unhealthy. Returns false (and does nothing) from any other state. */
  markUnhealthy(reason: string): Promise<boolean>

  /** Unhealthy → Failed; also from Stopped when a failed restart left the service down */
  markFailed(reason: string): Promise<void>

  /**
   * Automatic recovery: Unhealthy → Restarting → (stop hook) → Starting →
   * Running. Also relaunches a service left Stopped by an earlier failed
   * restart.
   */
  restart(options?: StartOptions): Promise<void>

  /** Failed → Stopped, terminating whatever is left of the process */
  reset(): Promise<void>

  /** Whether the hook reports the service's process as present */
  isAlive(): boolean

  /** Handle returned by the last successful start hook */
  readonly handle: HookHandle | null

  /** Message of the last hook failure, if any */
  readonly lastError: string | null

  /** When the current state was entered */
  readonly since: Date
}
