/**
 * HealthProbe interface: one bounded liveness check.
 *
 * Results are tri-state:
 *  - healthy:     the target answered with a success status
 *  - unhealthy:   the target answered, but with a failure status
 *  - probe_error: the target could not be reached in time
 */

import type { ProbeResult, ProbeTarget } from '../../core/types.js'

export interface ProbeContext {
  /** Liveness of the service's own process, for `process` targets */
  isAlive?: () => boolean
  /** Aborts the probe early (reported as probe_error) */
  signal?: AbortSignal
}

export interface HealthProbe {
  /**
   * Run a single check bounded by `target.timeoutMs`. Never rejects.
   */
  check(target: ProbeTarget, context?: ProbeContext): Promise<ProbeResult>
}
