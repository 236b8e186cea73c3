/**
 * Service lifecycle state machine.
 *
 *   stopped    → starting | failed (restart limit reached while down after a
 *                failed automatic restart)
 *   starting   → running | stopped (start hook failed, or explicit stop)
 *   running    → unhealthy | stopped
 *   unhealthy  → restarting | failed | stopped
 *   restarting → starting | stopped
 *   failed     → stopped (explicit reset or stop only)
 */

import type { ServiceState } from '../../core/types.js'

export const TRANSITIONS: Readonly<Record<ServiceState, readonly ServiceState[]>> = {
  stopped: ['starting', 'failed'],
  starting: ['running', 'stopped'],
  running: ['unhealthy', 'stopped'],
  unhealthy: ['restarting', 'failed', 'stopped'],
  restarting: ['starting', 'stopped'],
  failed: ['stopped'],
}

/** Whether `from → to` is a permitted transition */
export function canTransition(from: ServiceState, to: ServiceState): boolean {
  return TRANSITIONS[from].includes(to)
}
