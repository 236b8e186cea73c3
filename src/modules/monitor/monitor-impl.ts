/**
 * MonitorImpl: per-service probe loops driving automatic recovery.
 *
 * Loop body, per service:
 *   1. Skip while Starting/Restarting, or Stopped (unless a failed automatic
 *      restart left it Stopped, in which case recovery continues)
 *   2. Probe; record and announce the result
 *   3. Healthy → nothing. Failed → nothing beyond recording.
 *   4. Otherwise mark Unhealthy (from Running) and ask the RecoveryPolicy:
 *        restart     → wait the backoff, then supervisor.restart()
 *        mark_failed → supervisor.markFailed() and a service:failed alert
 */

import type pino from 'pino'
import { RestartLimitExceeded, ServiceNotFoundError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  HealthSummary,
  ProbeResult,
  ServiceDefinition,
  ServiceName,
  ServiceState,
} from '../../core/types.js'
import type { HealthProbe } from '../health-probe/health-probe.js'
import type { ProcessSupervisor } from '../process-supervisor/process-supervisor.js'
import type { RecoveryPolicy } from '../recovery-policy/recovery-policy.js'
import type { ServiceRegistry } from '../registry/service-registry.js'
import { createLogger } from '../../utils/logger.js'
import { sleep, toError } from '../../utils/helpers.js'
import type { Monitor } from './monitor.js'

const baseLogger = createLogger('monitor')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface MonitorOptions {
  registry: ServiceRegistry
  supervisors: ReadonlyMap<ServiceName, ProcessSupervisor>
  probe: HealthProbe
  policy: RecoveryPolicy
  eventBus: TypedEventBus
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// MonitorImpl
// ---------------------------------------------------------------------------

export class MonitorImpl implements Monitor {
  private readonly _registry: ServiceRegistry
  private readonly _supervisors: ReadonlyMap<ServiceName, ProcessSupervisor>
  private readonly _probe: HealthProbe
  private readonly _policy: RecoveryPolicy
  private readonly _eventBus: TypedEventBus
  private readonly _log: pino.Logger

  private readonly _lastProbe = new Map<ServiceName, ProbeResult>()
  /** Services left Stopped by a failed automatic restart */
  private readonly _recovering = new Set<ServiceName>()
  /** Bumped by manual overrides so that an in-flight recovery is abandoned */
  private readonly _generation = new Map<ServiceName, number>()
  private _running = false

  constructor(options: MonitorOptions) {
    this._registry = options.registry
    this._supervisors = options.supervisors
    this._probe = options.probe
    this._policy = options.policy
    this._eventBus = options.eventBus
    this._log = options.logger ?? baseLogger
  }

  get isRunning(): boolean {
    return this._running
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this._running) {
      throw new Error('Monitor is already running')
    }
    this._running = true
    this._log.info({ services: this._registry.names }, 'Monitoring started')

    try {
      await Promise.all(this._registry.list().map((definition) => this._loop(definition, signal)))
    } finally {
      this._running = false
      this._log.info('Monitoring stopped')
    }
  }

  async restartService(name: ServiceName, signal?: AbortSignal): Promise<void> {
    const supervisor = this._supervisor(name)
    this._clearRecovery(name)
    this._log.info({ service: name }, 'Manual restart requested')

    if (supervisor.status() === 'failed') {
      await supervisor.reset()
    }
    await supervisor.stop('manual restart')
    if (signal?.aborted === true) {
      this._log.info({ service: name }, 'Shutdown requested; manual restart leaves the service stopped')
      return
    }
    await supervisor.start()
  }

  async resetService(name: ServiceName): Promise<void> {
    const supervisor = this._supervisor(name)
    this._clearRecovery(name)
    this._log.info({ service: name }, 'Manual reset requested')
    await supervisor.reset()
  }

  healthSummary(): HealthSummary {
    const services: Record<ServiceName, ServiceState> = {}
    const counts = { running: 0, unhealthy: 0, failed: 0, other: 0 }

    for (const name of this._registry.names) {
      const state = this._supervisor(name).status()
      services[name] = state
      if (state === 'running') counts.running += 1
      else if (state === 'unhealthy') counts.unhealthy += 1
      else if (state === 'failed') counts.failed += 1
      else counts.other += 1
    }

    return {
      services,
      counts,
      healthy: counts.running === this._registry.names.length,
    }
  }

  lastProbe(name: ServiceName): ProbeResult | undefined {
    return this._lastProbe.get(name)
  }

  // -------------------------------------------------------------------------
  // Loop
  // -------------------------------------------------------------------------

  private async _loop(definition: ServiceDefinition, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(definition.probeIntervalMs, signal)
      if (signal.aborted) break

      try {
        await this._tick(definition, signal)
      } catch (err) {
        this._log.error({ service: definition.name, err: toError(err) }, 'Monitor iteration failed')
      }
    }
  }

  private async _tick(definition: ServiceDefinition, signal: AbortSignal): Promise<void> {
    const name = definition.name
    const supervisor = this._supervisor(name)
    const state = supervisor.status()

    if (state === 'starting' || state === 'restarting') return
    if (state === 'stopped' && !this._recovering.has(name)) return

    const result = await this._probe.check(definition.probe, {
      isAlive: () => supervisor.isAlive(),
      signal,
    })
    if (signal.aborted) return

    this._lastProbe.set(name, result)
    this._eventBus.emit('service:probed', { service: name, result })

    if (result.status === 'healthy') return

    const current = supervisor.status()
    if (current === 'failed') {
      this._log.debug({ service: name, status: result.status }, 'Probe failed for a Failed service')
      return
    }

    if (current === 'running') {
      const marked = await supervisor.markUnhealthy(result.message ?? result.status)
      if (!marked) return
    } else if (!(current === 'unhealthy' || (current === 'stopped' && this._recovering.has(name)))) {
      return
    }

    const level = result.status === 'probe_error' ? 'warn' : 'info'
    this._log[level](
      { service: name, status: result.status, message: result.message },
      'Service failed its liveness probe',
    )

    const decision = this._policy.evaluate(name, result)
    this._eventBus.emit('service:recovery-decision', {
      service: name,
      action: decision.action,
      failures: decision.failures,
    })

    if (decision.action === 'restart') {
      await this._recover(name, signal)
    } else if (decision.action === 'mark_failed') {
      await this._fail(definition, decision.failures)
    }
  }

  /** Wait out the backoff, then restart. A failed restart leaves the service recovering. */
  private async _recover(name: ServiceName, signal: AbortSignal): Promise<void> {
    const supervisor = this._supervisor(name)
    const generation = this._generation.get(name) ?? 0

    const backoffMs = this._policy.backoffFor(name)
    if (backoffMs > 0) {
      this._log.debug({ service: name, backoffMs }, 'Waiting before restart')
      await sleep(backoffMs, signal)
    }
    if (signal.aborted || (this._generation.get(name) ?? 0) !== generation) return

    try {
      await supervisor.restart({ signal })
      this._recovering.delete(name)
      this._log.info({ service: name }, 'Service restarted')
    } catch (err) {
      if ((this._generation.get(name) ?? 0) === generation && supervisor.status() === 'stopped') {
        this._recovering.add(name)
      }
      this._log.warn({ service: name, err: toError(err) }, 'Automatic restart failed')
    }
  }

  private async _fail(definition: ServiceDefinition, failures: number): Promise<void> {
    const name = definition.name
    const { maxAttempts, windowMs } = definition.restart
    const alert = new RestartLimitExceeded(name, failures, maxAttempts, windowMs)

    await this._supervisor(name).markFailed(alert.message)
    this._recovering.delete(name)
    this._log.error({ service: name, failures, maxAttempts, windowMs }, alert.message)
    this._eventBus.emit('service:failed', { service: name, failures, message: alert.message })
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _clearRecovery(name: ServiceName): void {
    this._generation.set(name, (this._generation.get(name) ?? 0) + 1)
    this._recovering.delete(name)
    this._policy.reset(name)
    this._eventBus.emit('service:reset', { service: name })
  }

  private _supervisor(name: ServiceName): ProcessSupervisor {
    const supervisor = this._supervisors.get(name)
    if (supervisor === undefined) throw new ServiceNotFoundError(name)
    return supervisor
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createMonitor(options: MonitorOptions): Monitor {
  return new MonitorImpl(options)
}
