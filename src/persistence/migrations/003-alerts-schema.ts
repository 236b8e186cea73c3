/**
 * Migration 003: persistent alerts.
 *
 * An alert is raised when a service exhausts its restart budget and stays
 * open until an operator restarts or resets that service.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const alertsSchemaMigration: Migration = {
  version: 3,
  name: '003-alerts-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS alerts (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        service    TEXT NOT NULL,
        kind       TEXT NOT NULL,
        message    TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        cleared_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_alerts_open
        ON alerts(service)
        WHERE cleared_at IS NULL;
    `)
  },
}
