/**
 * Human-readable formatters for the `svcward status` and `svcward health`
 * commands.
 *
 * Both views keep Unhealthy (automatic recovery in progress) and Failed
 * (recovery exhausted) visibly apart.
 */

import type { ServiceState } from '../../core/types.js'
import type { Alert } from '../../persistence/queries/alerts.js'
import type {
  HealthReport,
  ServiceStatusEntry,
  StatusSnapshot,
  SupervisorInfo,
} from '../types/status.js'

const STATE_NOTES: Partial<Record<ServiceState, string>> = {
  unhealthy: 'being recovered',
  restarting: 'being recovered',
  failed: 'recovery exhausted; needs an operator',
}

export const OPERATOR_HINT =
  'Failed services stay down until `svcward reset <service>` or `svcward restart <service>`.'

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

export function renderSupervisorLine(info: SupervisorInfo | null): string {
  if (info === null) return 'Supervisor: never started here'
  if (info.active) {
    return `Supervisor: ${info.status} (pid ${String(info.pid)}, run ${String(info.runId)}, since ${info.startedAt})`
  }
  const ending =
    info.status === 'stopped' || info.status === 'failed' ? `ended ${info.status}` : 'exited without stopping'
  return `Supervisor: not running (run ${String(info.runId)} ${ending}); states are the last recorded`
}

function renderAlerts(alerts: Alert[]): string[] {
  if (alerts.length === 0) return []
  return [
    '',
    'Open alerts:',
    ...alerts.map((a) => `  [${a.service}] ${a.kind}: ${a.message} (since ${a.created_at})`),
  ]
}

/** Render rows as left-aligned columns separated by two spaces */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)))
  const line = (cells: string[]): string =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join('  ')
  return [line(headers), ...rows.map(line)]
}

function describeProbe(service: ServiceStatusEntry): string {
  const probe = service.lastProbe
  if (probe === null) return '-'
  return probe.message !== null ? `${probe.status}: ${probe.message}` : probe.status
}

// ---------------------------------------------------------------------------
// renderStatusHuman
// ---------------------------------------------------------------------------

/**
 * Output sections:
 *  - Supervisor line
 *  - Service table: SERVICE | STATE | FAILURES | RESTARTS | LAST PROBE
 *  - Open alerts, and a hint when something is Failed
 */
export function renderStatusHuman(snapshot: StatusSnapshot): string {
  const lines: string[] = [renderSupervisorLine(snapshot.supervisor), '']

  if (snapshot.services.length === 0) {
    lines.push('No services recorded.')
  } else {
    lines.push(
      ...renderTable(
        ['SERVICE', 'STATE', 'FAILURES', 'RESTARTS', 'LAST PROBE'],
        snapshot.services.map((s) => [
          s.name,
          s.state,
          String(s.failureCount),
          String(s.restartCount),
          describeProbe(s),
        ]),
      ),
    )
  }

  const errors = snapshot.services.filter((s) => s.lastError !== null)
  if (errors.length > 0) {
    lines.push('', 'Last hook errors:')
    for (const s of errors) lines.push(`  [${s.name}] ${s.lastError ?? ''}`)
  }

  lines.push(...renderAlerts(snapshot.alerts))
  if (snapshot.services.some((s) => s.state === 'failed')) {
    lines.push('', OPERATOR_HINT)
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderHealthHuman
// ---------------------------------------------------------------------------

export function renderHealthHuman(report: HealthReport): string {
  const { counts } = report
  const lines: string[] = [
    `Health: ${report.healthy ? 'HEALTHY' : 'UNHEALTHY'}`,
    `running: ${String(counts.running)}  unhealthy: ${String(counts.unhealthy)}  failed: ${String(counts.failed)}  other: ${String(counts.other)}`,
  ]

  const entries = Object.entries(report.services)
  if (entries.length > 0) {
    lines.push('')
    lines.push(
      ...renderTable(
        ['SERVICE', 'STATE', 'NOTE'],
        entries.map(([name, state]) => [name, state, STATE_NOTES[state] ?? '']),
      ).map((l) => l.trimEnd()),
    )
  }

  lines.push(...renderAlerts(report.alerts))
  if (!report.supervisorActive) {
    lines.push('', 'No supervisor is running; states are the last recorded.')
  }
  if (counts.failed > 0) lines.push('', OPERATOR_HINT)
  return lines.join('\n')
}
