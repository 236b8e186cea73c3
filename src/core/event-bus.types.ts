/**
 * SupervisorEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "service:state-changed", "startup:complete")
 */

import type { ProbeResult, RecoveryAction, ServiceName, ServiceState } from './types.js'

// ---------------------------------------------------------------------------
// SupervisorEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the supervisor event bus.
 * Use `keyof SupervisorEvents` to constrain event keys.
 */
export interface SupervisorEvents {
  // -------------------------------------------------------------------------
  // Service lifecycle events
  // -------------------------------------------------------------------------

  /** A service moved between lifecycle states */
  'service:state-changed': {
    service: ServiceName
    from: ServiceState
    to: ServiceState
    reason?: string
  }

  /** A liveness probe completed */
  'service:probed': {
    service: ServiceName
    result: ProbeResult
  }

  /** The recovery policy decided what to do after a failed probe */
  'service:recovery-decision': {
    service: ServiceName
    action: RecoveryAction
    failures: number
  }

  /** A service exceeded its restart limit and entered Failed */
  'service:failed': {
    service: ServiceName
    failures: number
    message: string
  }

  /** An operator cleared a service's failure history (restart or reset) */
  'service:reset': {
    service: ServiceName
  }

  // -------------------------------------------------------------------------
  // Orchestration events
  // -------------------------------------------------------------------------

  /** A startup plan was computed */
  'plan:computed': {
    order: ServiceName[]
  }

  /** Every service in the plan reached Running */
  'startup:complete': {
    order: ServiceName[]
    durationMs: number
  }

  /** Startup aborted; services in rolledBack were stopped again */
  'startup:failed': {
    service: ServiceName
    error: string
    rolledBack: ServiceName[]
  }

  /** Reverse-order shutdown finished */
  'shutdown:complete': {
    stopped: ServiceName[]
    errors: { service: ServiceName; error: string }[]
  }
}
