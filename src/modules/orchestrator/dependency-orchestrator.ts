/**
 * DependencyOrchestrator interface: whole-system startup and shutdown.
 *
 * Startup is all or nothing: when any service cannot start, every service
 * started by the same call is stopped again, in reverse order, before the
 * error surfaces. Shutdown is total: every supervisor is asked to stop even
 * when earlier ones fail.
 */

import type { ServiceDefinition, ServiceName } from '../../core/types.js'

export interface StartAllOptions {
  /** Aborting cancels the in-flight wait or start hook, then rolls back */
  signal?: AbortSignal
}

export interface ShutdownReport {
  /** Services whose stop completed cleanly, in stop order */
  stopped: ServiceName[]
  errors: { service: ServiceName; error: string }[]
}

export interface DependencyOrchestrator {
  /**
   * Compute the startup order for every registered service.
   * @throws {DependencyCycleError} if the dependency graph has a cycle
   */
  plan(): ServiceDefinition[]

  /**
   * Start services in plan order, waiting for each one's dependencies to be
   * Running first.
   * @throws {StartFailure} after rolling back what this call started
   */
  startAll(plan: readonly ServiceDefinition[], options?: StartAllOptions): Promise<void>

  /** Stop services in reverse plan order. Never rejects. */
  stopAll(plan: readonly ServiceDefinition[]): Promise<ShutdownReport>
}
