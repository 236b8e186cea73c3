/**
 * Monitor interface: steady-state supervision after startup.
 *
 * One independent loop per service: sleep for the service's probe interval,
 * probe, and hand failures to the RecoveryPolicy. A probe that hangs on one
 * service never delays another service's loop.
 *
 * Manual overrides (restartService / resetService) also live here because
 * they must clear the same failure history the loops consult.
 */

import type { HealthSummary, ProbeResult, ServiceName } from '../../core/types.js'

export interface Monitor {
  /**
   * Run every service's loop until `signal` aborts. Resolves only after all
   * loops have exited.
   * @throws {Error} if the monitor is already running
   */
  run(signal: AbortSignal): Promise<void>

  /** Whether run() is in progress */
  readonly isRunning: boolean

  /**
   * Manual restart: clear the failure window and alerts, leave Failed if
   * needed, then stop and start (dependencies must be Running). Once
   * `signal` has aborted the service is left stopped.
   * @throws {ServiceNotFoundError} for an undeclared service
   */
  restartService(name: ServiceName, signal?: AbortSignal): Promise<void>

  /**
   * Failed → Stopped, clearing the failure window and alerts. The service
   * stays down until restarted.
   * @throws {ServiceNotFoundError} for an undeclared service
   */
  resetService(name: ServiceName): Promise<void>

  /** Snapshot of every service's state; never blocks on a service lock */
  healthSummary(): HealthSummary

  /** Most recent probe result for a service, if it has been probed */
  lastProbe(name: ServiceName): ProbeResult | undefined
}
