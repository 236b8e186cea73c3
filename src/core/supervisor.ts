/**
 * Supervisor interface: the foreground daemon behind `svcward start`.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createSupervisor()` from supervisor-impl.ts.
 */

import type pino from 'pino'
import type { PartialSupervisorSettings, SupervisorSettings } from '../modules/config/config-schema.js'
import type { HealthProbe } from '../modules/health-probe/health-probe.js'
import type { ShutdownReport } from '../modules/orchestrator/dependency-orchestrator.js'
import type { ProcessHook } from '../modules/process-supervisor/process-hook.js'
import type { ServiceRegistry } from '../modules/registry/service-registry.js'
import type { TypedEventBus } from './event-bus.js'
import type { HealthSummary, ServiceDefinition, ServiceName } from './types.js'

// ---------------------------------------------------------------------------
// SupervisorConfig
// ---------------------------------------------------------------------------

export interface SupervisorConfig {
  /** Directory holding the declaration and the state directory */
  projectRoot: string

  /**
   * Declaration file, relative to projectRoot or absolute.
   * If omitted, svcward.yaml / svcward.yml / svcward.json is looked up.
   */
  configPath?: string

  /** Highest-priority settings, typically from CLI flags */
  cliOverrides?: PartialSupervisorSettings

  /** Environment read for SVCWARD_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv

  /** Builds each service's hook (default: CommandHook over the declared commands) */
  hookFactory?: (definition: ServiceDefinition, logger: pino.Logger) => ProcessHook

  /** Liveness checker (default: HTTP/TCP/process probe) */
  probe?: HealthProbe

  /** Clock for the failure windows */
  now?: () => number

  /**
   * Install SIGINT/SIGTERM handlers for the duration of run().
   * @default true
   */
  handleSignals?: boolean

  /** Whether a pid recorded by an earlier run still exists */
  isProcessAlive?: (pid: number) => boolean
}

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

export interface Supervisor {
  readonly eventBus: TypedEventBus
  readonly registry: ServiceRegistry
  readonly settings: SupervisorSettings
  /** Absolute path of the loaded declaration */
  readonly configPath: string
  /** Absolute path of state.db */
  readonly databasePath: string

  /** Id of the supervisor_runs row for the current run, once run() began */
  readonly runId: number | null

  /** True once shutdown() was called, by a signal, a stop command or directly */
  readonly stopRequested: boolean

  /** Dry-run startup order */
  plan(): ServiceDefinition[]

  /**
   * Start every service in dependency order, supervise until a stop is
   * requested, then stop every service in reverse order.
   *
   * @throws {SupervisorActiveError} when another live supervisor owns the state directory
   * @throws {DependencyCycleError} before any service is touched
   * @throws {StartFailure} after rolling back the services it started
   */
  run(): Promise<ShutdownReport>

  /** Request a graceful stop; run() resolves once every service is down */
  shutdown(reason?: string): void

  /** Manual restart of one service (clears its failure history) */
  restartService(name: ServiceName): Promise<void>

  /** Failed → Stopped for one service */
  resetService(name: ServiceName): Promise<void>

  healthSummary(): HealthSummary
}
