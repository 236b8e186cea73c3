/**
 * service_states query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ProbeResult, ServiceName, ServiceState } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServiceStateRow {
  name: string
  state: ServiceState
  /** JSON array of dependency names */
  dependencies: string
  last_probe_status: ProbeResult['status'] | null
  last_probe_at: string | null
  last_probe_message: string | null
  failure_count: number
  restart_count: number
  last_error: string | null
  updated_at: string
}

export interface ServiceStateRecord {
  name: ServiceName
  state: ServiceState
  dependencies: ServiceName[]
  lastProbe: { status: ProbeResult['status']; at: string; message: string | null } | null
  failureCount: number
  restartCount: number
  lastError: string | null
  updatedAt: string
}

function toRecord(row: ServiceStateRow): ServiceStateRecord {
  let dependencies: ServiceName[] = []
  const parsed: unknown = JSON.parse(row.dependencies)
  if (Array.isArray(parsed)) {
    dependencies = parsed.filter((d): d is string => typeof d === 'string')
  }
  return {
    name: row.name,
    state: row.state,
    dependencies,
    lastProbe:
      row.last_probe_status !== null && row.last_probe_at !== null
        ? { status: row.last_probe_status, at: row.last_probe_at, message: row.last_probe_message }
        : null,
    failureCount: row.failure_count,
    restartCount: row.restart_count,
    lastError: row.last_error,
    updatedAt: row.updated_at,
  }
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Replace the table's contents with one Stopped row per declared service.
 * Called when a supervisor run begins.
 */
export function seedServiceStates(
  db: BetterSqlite3Database,
  services: readonly { name: ServiceName; dependsOn: readonly ServiceName[] }[],
  now: string = new Date().toISOString(),
): void {
  const insert = db.prepare<[string, string, string]>(
    `INSERT INTO service_states (name, state, dependencies, updated_at)
     VALUES (?, 'stopped', ?, ?)`,
  )
  db.transaction(() => {
    db.prepare('DELETE FROM service_states').run()
    for (const service of services) {
      insert.run(service.name, JSON.stringify(service.dependsOn), now)
    }
  })()
}

export function updateServiceState(
  db: BetterSqlite3Database,
  name: ServiceName,
  state: ServiceState,
  now: string = new Date().toISOString(),
): void {
  db.prepare<[string, string, string]>(
    'UPDATE service_states SET state = ?, updated_at = ? WHERE name = ?',
  ).run(state, now, name)
}

export function recordProbe(
  db: BetterSqlite3Database,
  name: ServiceName,
  result: ProbeResult,
  failureCount: number,
): void {
  const at = result.timestamp.toISOString()
  db.prepare<[string, string, string | null, number, string, string]>(
    `UPDATE service_states
     SET last_probe_status = ?, last_probe_at = ?, last_probe_message = ?,
         failure_count = ?, updated_at = ?
     WHERE name = ?`,
  ).run(result.status, at, result.message ?? null, failureCount, at, name)
}

export function incrementRestartCount(db: BetterSqlite3Database, name: ServiceName): void {
  db.prepare<[string]>(
    'UPDATE service_states SET restart_count = restart_count + 1 WHERE name = ?',
  ).run(name)
}

export function setFailureCount(db: BetterSqlite3Database, name: ServiceName, count: number): void {
  db.prepare<[number, string]>('UPDATE service_states SET failure_count = ? WHERE name = ?').run(
    count,
    name,
  )
}

export function setLastError(
  db: BetterSqlite3Database,
  name: ServiceName,
  error: string | null,
): void {
  db.prepare<[string | null, string]>('UPDATE service_states SET last_error = ? WHERE name = ?').run(
    error,
    name,
  )
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export function getServiceState(
  db: BetterSqlite3Database,
  name: ServiceName,
): ServiceStateRecord | undefined {
  const row = db
    .prepare<[string], ServiceStateRow>('SELECT * FROM service_states WHERE name = ?')
    .get(name)
  return row !== undefined ? toRecord(row) : undefined
}

/** Every service row, in the order the services were seeded */
export function listServiceStates(db: BetterSqlite3Database): ServiceStateRecord[] {
  return db
    .prepare<[], ServiceStateRow>('SELECT * FROM service_states ORDER BY rowid ASC')
    .all()
    .map(toRecord)
}
