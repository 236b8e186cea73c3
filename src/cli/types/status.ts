/**
 * Types for the `svcward status` and `svcward health` commands.
 */

import type { HealthSummary, ProbeStatus, ServiceName, ServiceState } from '../../core/types.js'
import type { Alert } from '../../persistence/queries/alerts.js'
import type { RunStatus } from '../../persistence/queries/supervisor-runs.js'

// ---------------------------------------------------------------------------
// SupervisorInfo
// ---------------------------------------------------------------------------

/** The latest supervisor run recorded in state.db */
export interface SupervisorInfo {
  runId: number
  pid: number
  status: RunStatus
  /** Whether that process is still alive and the run not finished */
  active: boolean
  startedAt: string
  updatedAt: string
}

// ---------------------------------------------------------------------------
// StatusSnapshot
// ---------------------------------------------------------------------------

export interface ServiceStatusEntry {
  name: ServiceName
  state: ServiceState
  dependsOn: ServiceName[]
  lastProbe: { status: ProbeStatus; at: string; message: string | null } | null
  failureCount: number
  restartCount: number
  lastError: string | null
  updatedAt: string
}

/**
 * Everything `status` shows, read from state.db: serialised as-is in NDJSON
 * output.
 */
export interface StatusSnapshot {
  supervisor: SupervisorInfo | null
  services: ServiceStatusEntry[]
  alerts: Alert[]
}

// ---------------------------------------------------------------------------
// HealthReport
// ---------------------------------------------------------------------------

export interface HealthReport extends HealthSummary {
  /** False when no live supervisor is keeping the recorded states current */
  supervisorActive: boolean
  alerts: Alert[]
}
