/**
 * Migration 002: control signal queue.
 *
 * CLI commands (`stop`, `restart`, `reset`) insert rows here; the running
 * supervisor polls for unprocessed rows and marks each one processed when it
 * claims it.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const controlSignalsSchemaMigration: Migration = {
  version: 2,
  name: '002-control-signals-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS control_signals (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        signal       TEXT NOT NULL CHECK(signal IN ('stop', 'restart', 'reset')),
        service      TEXT,
        created_at   TEXT NOT NULL DEFAULT (datetime('now')),
        processed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_control_signals_unprocessed
        ON control_signals(processed_at)
        WHERE processed_at IS NULL;
    `)
  },
}
