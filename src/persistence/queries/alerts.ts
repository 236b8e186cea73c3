/**
 * alerts query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ServiceName } from '../../core/types.js'

export interface Alert {
  id: number
  service: ServiceName
  kind: string
  message: string
  created_at: string
  cleared_at: string | null
}

export function raiseAlert(
  db: BetterSqlite3Database,
  alert: { service: ServiceName; kind: string; message: string },
): number {
  const info = db
    .prepare<[string, string, string]>(
      'INSERT INTO alerts (service, kind, message) VALUES (?, ?, ?)',
    )
    .run(alert.service, alert.kind, alert.message)
  return Number(info.lastInsertRowid)
}

/**
 * Clear every open alert for a service.
 * @returns the number of alerts cleared
 */
export function clearAlerts(db: BetterSqlite3Database, service: ServiceName): number {
  return db
    .prepare<[string]>(
      `UPDATE alerts SET cleared_at = datetime('now')
       WHERE service = ? AND cleared_at IS NULL`,
    )
    .run(service).changes
}

/** Open alerts, oldest first; all services unless `service` is given */
export function listOpenAlerts(db: BetterSqlite3Database, service?: ServiceName): Alert[] {
  if (service !== undefined) {
    return db
      .prepare<[string], Alert>(
        'SELECT * FROM alerts WHERE cleared_at IS NULL AND service = ? ORDER BY id ASC',
      )
      .all(service)
  }
  return db
    .prepare<[], Alert>('SELECT * FROM alerts WHERE cleared_at IS NULL ORDER BY id ASC')
    .all()
}
