/**
 * RecoveryPolicy interface: crash-loop protection.
 *
 * Owns one FailureWindow per service and decides what a probe result means:
 *  - healthy                → none (window untouched)
 *  - unhealthy/probe_error  → restart while failures in window ≤ maxAttempts,
 *                             mark_failed once they exceed it
 */

import type { ProbeResult, RecoveryAction, ServiceName } from '../../core/types.js'

export interface RecoveryDecision {
  action: RecoveryAction
  /** Failures inside the window after this evaluation */
  failures: number
}

export interface RecoveryPolicy {
  evaluate(service: ServiceName, result: ProbeResult): RecoveryDecision

  /** Clear a service's failure history (manual restart or reset) */
  reset(service: ServiceName): void

  /** Failures currently inside the service's window */
  failureCount(service: ServiceName): number

  /** Delay to wait before a restart's start call */
  backoffFor(service: ServiceName): number
}
