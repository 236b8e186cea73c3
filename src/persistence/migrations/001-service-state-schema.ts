/**
 * Migration 001: service state and supervisor run tables.
 *
 * service_states holds one row per declared service, rewritten by the running
 * supervisor on every state change and probe. supervisor_runs lets CLI
 * commands find the supervisor process, if any, that is currently active.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const serviceStateSchemaMigration: Migration = {
  version: 1,
  name: '001-service-state-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS service_states (
        name               TEXT PRIMARY KEY,
        state              TEXT NOT NULL CHECK(state IN (
                             'stopped', 'starting', 'running',
                             'unhealthy', 'restarting', 'failed')),
        dependencies       TEXT NOT NULL DEFAULT '[]',
        last_probe_status  TEXT CHECK(last_probe_status IN ('healthy', 'unhealthy', 'probe_error')),
        last_probe_at      TEXT,
        last_probe_message TEXT,
        failure_count      INTEGER NOT NULL DEFAULT 0,
        restart_count      INTEGER NOT NULL DEFAULT 0,
        last_error         TEXT,
        updated_at         TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS supervisor_runs (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        pid        INTEGER NOT NULL,
        status     TEXT NOT NULL CHECK(status IN (
                     'starting', 'running', 'stopping', 'stopped', 'failed')),
        config     TEXT,
        started_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_supervisor_runs_status ON supervisor_runs(status);
    `)
  },
}
