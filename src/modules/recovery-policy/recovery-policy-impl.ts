/**
 * RecoveryPolicyImpl: sliding-window restart limiter.
 */

import type { ProbeResult, RestartPolicy, ServiceName } from '../../core/types.js'
import { ServiceNotFoundError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { FailureWindow } from './failure-window.js'
import type { RecoveryDecision, RecoveryPolicy } from './recovery-policy.js'

const logger = createLogger('recovery-policy')

export interface RecoveryPolicyOptions {
  /** Restart parameters per service */
  policies: ReadonlyMap<ServiceName, RestartPolicy>
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number
}

export class RecoveryPolicyImpl implements RecoveryPolicy {
  private readonly _policies: ReadonlyMap<ServiceName, RestartPolicy>
  private readonly _windows = new Map<ServiceName, FailureWindow>()
  private readonly _now: () => number

  constructor(options: RecoveryPolicyOptions) {
    this._policies = options.policies
    this._now = options.now ?? Date.now
    for (const [service, policy] of this._policies) {
      this._windows.set(service, new FailureWindow(policy.windowMs))
    }
  }

  evaluate(service: ServiceName, result: ProbeResult): RecoveryDecision {
    const policy = this._policy(service)
    const window = this._window(service)

    if (result.status === 'healthy') {
      return { action: 'none', failures: window.count(this._now()) }
    }

    const failures = window.record(this._now())
    if (failures <= policy.maxAttempts) {
      logger.debug({ service, failures, maxAttempts: policy.maxAttempts }, 'Restart permitted')
      return { action: 'restart', failures }
    }

    logger.warn({ service, failures, maxAttempts: policy.maxAttempts }, 'Restart limit exceeded')
    return { action: 'mark_failed', failures }
  }

  reset(service: ServiceName): void {
    this._window(service).clear()
  }

  failureCount(service: ServiceName): number {
    return this._window(service).count(this._now())
  }

  backoffFor(service: ServiceName): number {
    return this._policy(service).backoffMs
  }

  private _policy(service: ServiceName): RestartPolicy {
    const policy = this._policies.get(service)
    if (policy === undefined) throw new ServiceNotFoundError(service)
    return policy
  }

  private _window(service: ServiceName): FailureWindow {
    const window = this._windows.get(service)
    if (window === undefined) throw new ServiceNotFoundError(service)
    return window
  }
}

export function createRecoveryPolicy(options: RecoveryPolicyOptions): RecoveryPolicy {
  return new RecoveryPolicyImpl(options)
}
