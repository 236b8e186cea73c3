/**
 * DependencyOrchestratorImpl: drives ProcessSupervisors through a plan.
 */

import type pino from 'pino'
import { DependencyNotReadyError, ServiceNotFoundError, StartFailure } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ServiceDefinition, ServiceName } from '../../core/types.js'
import type { ProcessSupervisor } from '../process-supervisor/process-supervisor.js'
import type { ServiceRegistry } from '../registry/service-registry.js'
import { createLogger } from '../../utils/logger.js'
import { sleep, toError } from '../../utils/helpers.js'
import { computePlan } from './dependency-planner.js'
import type {
  DependencyOrchestrator,
  ShutdownReport,
  StartAllOptions,
} from './dependency-orchestrator.js'

const baseLogger = createLogger('orchestrator')

/** How often dependency states are re-read while waiting */
export const DEPENDENCY_POLL_INTERVAL_MS = 100

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DependencyOrchestratorOptions {
  registry: ServiceRegistry
  supervisors: ReadonlyMap<ServiceName, ProcessSupervisor>
  eventBus: TypedEventBus
  /** Upper bound on waiting for one service's dependencies to be Running */
  startTimeoutMs: number
  pollIntervalMs?: number
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// DependencyOrchestratorImpl
// ---------------------------------------------------------------------------

export class DependencyOrchestratorImpl implements DependencyOrchestrator {
  private readonly _registry: ServiceRegistry
  private readonly _supervisors: ReadonlyMap<ServiceName, ProcessSupervisor>
  private readonly _eventBus: TypedEventBus
  private readonly _startTimeoutMs: number
  private readonly _pollIntervalMs: number
  private readonly _log: pino.Logger

  constructor(options: DependencyOrchestratorOptions) {
    this._registry = options.registry
    this._supervisors = options.supervisors
    this._eventBus = options.eventBus
    this._startTimeoutMs = options.startTimeoutMs
    this._pollIntervalMs = options.pollIntervalMs ?? DEPENDENCY_POLL_INTERVAL_MS
    this._log = options.logger ?? baseLogger
  }

  plan(): ServiceDefinition[] {
    const plan = computePlan(this._registry.list())
    const order = plan.map((s) => s.name)
    this._log.debug({ order }, 'Startup plan computed')
    this._eventBus.emit('plan:computed', { order })
    return plan
  }

  async startAll(plan: readonly ServiceDefinition[], options: StartAllOptions = {}): Promise<void> {
    const { signal } = options
    const startedAt = Date.now()
    const started: ServiceName[] = []

    for (const definition of plan) {
      const supervisor = this._supervisor(definition.name)
      try {
        if (signal?.aborted === true) {
          throw toError(signal.reason ?? new Error('Startup cancelled'))
        }
        await this._waitForDependencies(definition, signal)
        const wasRunning = supervisor.status() === 'running'
        this._log.info({ service: definition.name }, 'Starting service')
        await supervisor.start(signal !== undefined ? { signal } : {})
        if (!wasRunning) started.push(definition.name)
      } catch (err) {
        const error = toError(err)
        this._log.error({ service: definition.name, err: error }, 'Startup failed; rolling back')
        const rolledBack = await this._rollback(started)
        this._eventBus.emit('startup:failed', {
          service: definition.name,
          error: error.message,
          rolledBack,
        })
        throw new StartFailure(definition.name, error.message, rolledBack, error)
      }
    }

    const durationMs = Date.now() - startedAt
    const order = plan.map((s) => s.name)
    this._log.info({ order, durationMs }, 'All services running')
    this._eventBus.emit('startup:complete', { order, durationMs })
  }

  async stopAll(plan: readonly ServiceDefinition[]): Promise<ShutdownReport> {
    const report: ShutdownReport = { stopped: [], errors: [] }

    for (const definition of [...plan].reverse()) {
      const supervisor = this._supervisors.get(definition.name)
      if (supervisor === undefined) continue
      if (supervisor.status() === 'stopped') continue
      try {
        await supervisor.stop('shutdown')
        report.stopped.push(definition.name)
      } catch (err) {
        const error = toError(err)
        this._log.error({ service: definition.name, err: error }, 'Service did not stop cleanly')
        report.errors.push({ service: definition.name, error: error.message })
      }
    }

    this._log.info(
      { stopped: report.stopped.length, errors: report.errors.length },
      'Shutdown complete',
    )
    this._eventBus.emit('shutdown:complete', report)
    return report
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _supervisor(name: ServiceName): ProcessSupervisor {
    const supervisor = this._supervisors.get(name)
    if (supervisor === undefined) throw new ServiceNotFoundError(name)
    return supervisor
  }

  private _pending(definition: ServiceDefinition): ServiceName[] {
    return definition.dependsOn.filter(
      (dep) => this._supervisors.get(dep)?.status() !== 'running',
    )
  }

  /** Poll until every dependency is Running, the deadline passes, or `signal` aborts */
  private async _waitForDependencies(
    definition: ServiceDefinition,
    signal?: AbortSignal,
  ): Promise<void> {
    const deadline = Date.now() + this._startTimeoutMs
    let pending = this._pending(definition)

    while (pending.length > 0) {
      if (Date.now() >= deadline) {
        throw new DependencyNotReadyError(definition.name, pending)
      }
      this._log.debug({ service: definition.name, pending }, 'Waiting for dependencies')
      await sleep(Math.min(this._pollIntervalMs, Math.max(0, deadline - Date.now())), signal)
      if (signal?.aborted === true) {
        throw toError(signal.reason ?? new Error('Startup cancelled'))
      }
      pending = this._pending(definition)
    }
  }

  /** Stop `started` in reverse; returns the names it tried to stop */
  private async _rollback(started: readonly ServiceName[]): Promise<ServiceName[]> {
    const rolledBack: ServiceName[] = []
    for (const name of [...started].reverse()) {
      const supervisor = this._supervisors.get(name)
      if (supervisor === undefined) continue
      rolledBack.push(name)
      try {
        await supervisor.stop('startup rollback')
      } catch (err) {
        this._log.error({ service: name, err }, 'Rollback stop failed')
      }
    }
    return rolledBack
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDependencyOrchestrator(
  options: DependencyOrchestratorOptions,
): DependencyOrchestrator {
  return new DependencyOrchestratorImpl(options)
}
