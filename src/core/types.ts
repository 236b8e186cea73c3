/**
 * Core types for svcward
 * Shared type definitions used across all modules
 */

/** Unique name of a supervised service */
export type ServiceName = string

/** Lifecycle state of a supervised service */
export type ServiceState =
  | 'stopped'
  | 'starting'
  | 'running'
  | 'unhealthy'
  | 'restarting'
  | 'failed'

/** All service states, in lifecycle order */
export const SERVICE_STATES: readonly ServiceState[] = [
  'stopped',
  'starting',
  'running',
  'unhealthy',
  'restarting',
  'failed',
] as const

/** Outcome of a single liveness probe */
export type ProbeStatus = 'healthy' | 'unhealthy' | 'probe_error'

/** Action requested by the recovery policy after a probe */
export type RecoveryAction = 'none' | 'restart' | 'mark_failed'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** A command invoked to start or stop a service */
export interface HookSpec {
  command: string
  args: readonly string[]
  env: Readonly<Record<string, string>>
  cwd?: string
  /** Start only: the command runs to completion instead of staying resident */
  oneshot: boolean
}

/** HTTP liveness endpoint */
export interface HttpProbeTarget {
  type: 'http'
  url: string
  method: 'GET' | 'HEAD'
  timeoutMs: number
  /** Accepted status code; any 2xx when absent */
  expectStatus?: number
}

/** TCP port that must accept connections */
export interface TcpProbeTarget {
  type: 'tcp'
  host: string
  port: number
  timeoutMs: number
}

/** Liveness derived from the start hook's own process handle */
export interface ProcessProbeTarget {
  type: 'process'
  timeoutMs: number
}

export type ProbeTarget = HttpProbeTarget | TcpProbeTarget | ProcessProbeTarget

/** Crash-loop protection parameters */
export interface RestartPolicy {
  maxAttempts: number
  windowMs: number
  backoffMs: number
}

/** A fully resolved, immutable service declaration */
export interface ServiceDefinition {
  readonly name: ServiceName
  readonly description?: string
  /** Position in the declaration file, used to break ties when planning */
  readonly index: number
  readonly dependsOn: readonly ServiceName[]
  readonly start: HookSpec
  readonly stop?: HookSpec
  readonly probe: ProbeTarget
  readonly probeIntervalMs: number
  readonly restart: RestartPolicy
  readonly gracePeriodMs: number
  readonly hookTimeoutMs: number
}

/** Immutable result of one probe */
export interface ProbeResult {
  readonly status: ProbeStatus
  readonly timestamp: Date
  readonly latencyMs: number
  readonly message?: string
  readonly httpStatus?: number
}

/** Aggregate health view across all services */
export interface HealthSummary {
  services: Record<ServiceName, ServiceState>
  counts: {
    running: number
    unhealthy: number
    failed: number
    other: number
  }
  /** True when every service is running */
  healthy: boolean
}
