/**
 * SupervisorImpl: composition root for the foreground daemon.
 *
 * createSupervisor() loads the declaration and settings and wires every
 * module by constructor injection. Nothing is spawned and no file is written
 * until run().
 *
 * run():
 *  1. Compute the plan (a cycle fails here, before anything else)
 *  2. Open the state database; refuse if another live supervisor owns it
 *  3. Record the run, start the state recorder and control signal poller
 *  4. startAll in dependency order (rolls back on failure)
 *  5. Monitor until shutdown() (SIGINT/SIGTERM, `svcward stop`, or a caller)
 *  6. stopAll in reverse order, record the run as stopped
 */

import { resolve } from 'node:path'
import type pino from 'pino'
import { resolveSettings } from '../modules/config/config-system-impl.js'
import type { SupervisorSettings } from '../modules/config/config-schema.js'
import { STATE_DB_FILENAME } from '../modules/config/defaults.js'
import { createHealthProbe } from '../modules/health-probe/health-probe-impl.js'
import { createMonitor } from '../modules/monitor/monitor-impl.js'
import type { Monitor } from '../modules/monitor/monitor.js'
import type {
  DependencyOrchestrator,
  ShutdownReport,
} from '../modules/orchestrator/dependency-orchestrator.js'
import { createDependencyOrchestrator } from '../modules/orchestrator/dependency-orchestrator-impl.js'
import { createCommandHook } from '../modules/process-supervisor/command-hook.js'
import { createProcessSupervisor } from '../modules/process-supervisor/process-supervisor-impl.js'
import type { ProcessSupervisor } from '../modules/process-supervisor/process-supervisor.js'
import { createRecoveryPolicy } from '../modules/recovery-policy/recovery-policy-impl.js'
import { resolveDeclarationPath } from '../modules/registry/declaration-parser.js'
import { loadRegistry } from '../modules/registry/service-registry-impl.js'
import type { ServiceRegistry } from '../modules/registry/service-registry.js'
import { createDatabaseService, type DatabaseService } from '../persistence/database.js'
import type { ControlSignal } from '../persistence/queries/control-signals.js'
import {
  createRun,
  findLiveRun,
  markStaleRuns,
  updateRunStatus,
  type RunStatus,
} from '../persistence/queries/supervisor-runs.js'
import { createStateRecorder } from '../persistence/state-recorder.js'
import { setupGracefulShutdown } from '../recovery/shutdown-handler.js'
import { isProcessRunning } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { createControlSignalPoller, type ControlSignalPoller } from './control-signal-poller.js'
import { ComponentRegistry } from './di.js'
import { SupervisorActiveError } from './errors.js'
import { createEventBus, type TypedEventBus } from './event-bus.js'
import type { Supervisor, SupervisorConfig } from './supervisor.js'
import type { HealthSummary, ServiceDefinition, ServiceName } from './types.js'

/** Reason attached to the abort of an interrupted startup or monitor run */
export const INTERRUPTED = 'interrupted'

/**
 * Location of state.db for a project.
 */
export function resolveDatabasePath(projectRoot: string, settings: SupervisorSettings): string {
  return resolve(projectRoot, settings.state_dir, STATE_DB_FILENAME)
}

// ---------------------------------------------------------------------------
// SupervisorImpl
// ---------------------------------------------------------------------------

interface SupervisorParts {
  eventBus: TypedEventBus
  registry: ServiceRegistry
  settings: SupervisorSettings
  configPath: string
  databasePath: string
  database: DatabaseService
  supervisors: ReadonlyMap<ServiceName, ProcessSupervisor>
  failureCount: (name: ServiceName) => number
  monitor: Monitor
  orchestrator: DependencyOrchestrator
  handleSignals: boolean
  isProcessAlive: (pid: number) => boolean
  logger: pino.Logger
}

export class SupervisorImpl implements Supervisor {
  readonly eventBus: TypedEventBus
  readonly registry: ServiceRegistry
  readonly settings: SupervisorSettings
  readonly configPath: string
  readonly databasePath: string

  private readonly _parts: SupervisorParts
  private readonly _log: pino.Logger
  private readonly _components = new ComponentRegistry()
  private readonly _abort = new AbortController()
  private _runId: number | null = null
  private _started = false
  private _poller: ControlSignalPoller | null = null

  constructor(parts: SupervisorParts) {
    this._parts = parts
    this.eventBus = parts.eventBus
    this.registry = parts.registry
    this.settings = parts.settings
    this.configPath = parts.configPath
    this.databasePath = parts.databasePath
    this._log = parts.logger
  }

  get runId(): number | null {
    return this._runId
  }

  get stopRequested(): boolean {
    return this._abort.signal.aborted
  }

  plan(): ServiceDefinition[] {
    return this._parts.orchestrator.plan()
  }

  async run(): Promise<ShutdownReport> {
    if (this._started) {
      throw new Error('Supervisor has already been run')
    }
    this._started = true

    const removeSignalHandlers = this._parts.handleSignals
      ? setupGracefulShutdown({
          onShutdown: (signal) => this.shutdown(signal),
          logger: this._log,
        })
      : (): void => {}

    try {
      return await this._run()
    } finally {
      removeSignalHandlers()
    }
  }

  shutdown(reason = 'shutdown requested'): void {
    if (this._abort.signal.aborted) return
    this._log.info({ reason }, 'Supervisor stopping')
    this._abort.abort(new Error(INTERRUPTED))
  }

  restartService(name: ServiceName): Promise<void> {
    return this._parts.monitor.restartService(name, this._abort.signal)
  }

  resetService(name: ServiceName): Promise<void> {
    return this._parts.monitor.resetService(name)
  }

  healthSummary(): HealthSummary {
    return this._parts.monitor.healthSummary()
  }

  // -------------------------------------------------------------------------
  // Run phases
  // -------------------------------------------------------------------------

  private async _run(): Promise<ShutdownReport> {
    const { orchestrator, monitor } = this._parts
    const plan = orchestrator.plan()

    await this._claimStateDirectory()

    try {
      await this._components.initializeAll()
      await orchestrator.startAll(plan, { signal: this._abort.signal })
    } catch (err) {
      this._setRunStatus(this.stopRequested ? 'stopped' : 'failed')
      await this._closeComponents()
      throw err
    }

    this._setRunStatus('running')
    this._log.info(
      { services: plan.length, runId: this._runId, pid: process.pid },
      'Supervising services',
    )

    if (!this._abort.signal.aborted) {
      await monitor.run(this._abort.signal)
    }

    this._setRunStatus('stopping')
    // A manual restart still in flight would otherwise start its service
    // again after stopAll has passed it
    await this._poller?.shutdown()
    const report = await orchestrator.stopAll(plan)
    this._setRunStatus('stopped')
    await this._closeComponents()
    return report
  }

  /**
   * Open the database, take ownership of the state directory and register
   * the components that write to it.
   */
  private async _claimStateDirectory(): Promise<void> {
    const { database, isProcessAlive } = this._parts
    this._components.register('database', database)
    await this._components.initializeAll()

    try {
      const db = database.db
      const stale = markStaleRuns(db, isProcessAlive)
      if (stale > 0) {
        this._log.warn({ stale }, 'Marked runs of exited supervisors as failed')
      }

      const live = findLiveRun(db, isProcessAlive)
      if (live !== undefined) throw new SupervisorActiveError(live.pid, live.id)

      this._runId = createRun(db, process.pid, this.configPath)
    } catch (err) {
      await this._closeComponents()
      throw err
    }
    this._registerComponents()
  }

  private _registerComponents(): void {
    const { database, registry, eventBus, supervisors, failureCount, settings } = this._parts
    const db = () => database.db

    this._components.register(
      'stateRecorder',
      createStateRecorder({
        db,
        eventBus,
        services: registry.list(),
        failureCount,
        lastError: (name) => supervisors.get(name)?.lastError ?? null,
        logger: this._log,
      }),
    )
    this._poller = createControlSignalPoller({
      db,
      intervalMs: settings.signal_poll_interval_ms,
      handler: (signal) => this._onControlSignal(signal),
      logger: this._log,
    })
    this._components.register('controlSignals', this._poller)
  }

  private async _onControlSignal(signal: ControlSignal): Promise<void> {
    if (signal.signal === 'stop') {
      this.shutdown('stop command')
      return
    }

    if (this.stopRequested) {
      this._log.warn({ signal: signal.signal, service: signal.service }, 'Ignoring control signal during shutdown')
      return
    }
    if (signal.service === null) {
      throw new Error(`Control signal ${String(signal.id)} (${signal.signal}) names no service`)
    }

    if (signal.signal === 'restart') await this.restartService(signal.service)
    else await this.resetService(signal.service)
  }

  private _setRunStatus(status: RunStatus): void {
    if (this._runId === null || !this._parts.database.isOpen) return
    try {
      updateRunStatus(this._parts.database.db, this._runId, status)
    } catch (err) {
      this._log.error({ err, status }, 'Failed to record supervisor run status')
    }
  }

  private async _closeComponents(): Promise<void> {
    try {
      await this._components.shutdownAll()
    } catch (err) {
      this._log.error({ err }, 'Error while shutting down supervisor components')
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Load the declaration and settings, then wire every module.
 *
 * @throws {ConfigParseError} if the declaration is missing or unreadable
 * @throws {ConfigValidationError} listing every declaration violation
 * @throws {ConfigError} for invalid settings
 */
export function createSupervisor(config: SupervisorConfig): Supervisor {
  const configPath = resolveDeclarationPath(config.projectRoot, config.configPath)
  const registry = loadRegistry(configPath)
  const settings = resolveSettings({
    fileSettings: registry.settings,
    ...(config.cliOverrides !== undefined ? { cliOverrides: config.cliOverrides } : {}),
    ...(config.env !== undefined ? { env: config.env } : {}),
  })
  const logger = createLogger('supervisor', { level: settings.log_level })
  const databasePath = resolveDatabasePath(config.projectRoot, settings)

  const eventBus = createEventBus()
  const hookFactory =
    config.hookFactory ??
    ((definition: ServiceDefinition, log: pino.Logger) =>
      createCommandHook(definition.name, definition.start, definition.stop, log))

  const supervisors = new Map<ServiceName, ProcessSupervisor>()
  for (const definition of registry.list()) {
    supervisors.set(
      definition.name,
      createProcessSupervisor({
        definition,
        hook: hookFactory(definition, logger),
        eventBus,
        pendingDependencies: () =>
          definition.dependsOn.filter((dep) => supervisors.get(dep)?.status() !== 'running'),
        logger,
      }),
    )
  }

  const policy = createRecoveryPolicy({
    policies: new Map(registry.list().map((d) => [d.name, d.restart])),
    ...(config.now !== undefined ? { now: config.now } : {}),
  })

  const monitor = createMonitor({
    registry,
    supervisors,
    probe: config.probe ?? createHealthProbe(),
    policy,
    eventBus,
    logger,
  })

  const orchestrator = createDependencyOrchestrator({
    registry,
    supervisors,
    eventBus,
    startTimeoutMs: settings.start_timeout_ms,
    logger,
  })

  logger.debug({ configPath, databasePath, services: registry.names }, 'Supervisor wired')

  return new SupervisorImpl({
    eventBus,
    registry,
    settings,
    configPath,
    databasePath,
    database: createDatabaseService(databasePath),
    supervisors,
    failureCount: (name) => policy.failureCount(name),
    monitor,
    orchestrator,
    handleSignals: config.handleSignals ?? true,
    isProcessAlive: config.isProcessAlive ?? isProcessRunning,
    logger,
  })
}
