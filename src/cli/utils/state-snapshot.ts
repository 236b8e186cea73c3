/**
 * Read-only views of state.db for `status` and `health`.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { listOpenAlerts } from '../../persistence/queries/alerts.js'
import { listServiceStates } from '../../persistence/queries/service-states.js'
import { getLatestRun } from '../../persistence/queries/supervisor-runs.js'
import type { HealthReport, StatusSnapshot, SupervisorInfo } from '../types/status.js'

const ACTIVE_RUN_STATUSES = new Set(['starting', 'running', 'stopping'])

export function readSupervisorInfo(
  db: BetterSqlite3Database,
  isAlive: (pid: number) => boolean,
): SupervisorInfo | null {
  const run = getLatestRun(db)
  if (run === undefined) return null
  return {
    runId: run.id,
    pid: run.pid,
    status: run.status,
    active: ACTIVE_RUN_STATUSES.has(run.status) && isAlive(run.pid),
    startedAt: run.started_at,
    updatedAt: run.updated_at,
  }
}

export function readStatusSnapshot(
  db: BetterSqlite3Database,
  isAlive: (pid: number) => boolean,
): StatusSnapshot {
  return {
    supervisor: readSupervisorInfo(db, isAlive),
    services: listServiceStates(db).map((record) => ({
      name: record.name,
      state: record.state,
      dependsOn: record.dependencies,
      lastProbe: record.lastProbe,
      failureCount: record.failureCount,
      restartCount: record.restartCount,
      lastError: record.lastError,
      updatedAt: record.updatedAt,
    })),
    alerts: listOpenAlerts(db),
  }
}

/**
 * Aggregate counts. Healthy only when a live supervisor reports every
 * service Running.
 */
export function summarizeHealth(snapshot: StatusSnapshot): HealthReport {
  const report: HealthReport = {
    services: {},
    counts: { running: 0, unhealthy: 0, failed: 0, other: 0 },
    healthy: false,
    supervisorActive: snapshot.supervisor?.active ?? false,
    alerts: snapshot.alerts,
  }

  for (const service of snapshot.services) {
    report.services[service.name] = service.state
    switch (service.state) {
      case 'running':
        report.counts.running += 1
        break
      case 'unhealthy':
        report.counts.unhealthy += 1
        break
      case 'failed':
        report.counts.failed += 1
        break
      default:
        report.counts.other += 1
    }
  }

  report.healthy =
    report.supervisorActive &&
    snapshot.services.length > 0 &&
    report.counts.running === snapshot.services.length
  return report
}
