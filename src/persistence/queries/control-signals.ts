/**
 * control_signals query functions: the queue between CLI commands and the
 * running supervisor.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ServiceName } from '../../core/types.js'

export type ControlSignalKind = 'stop' | 'restart' | 'reset'

export interface ControlSignal {
  id: number
  signal: ControlSignalKind
  service: ServiceName | null
  created_at: string
  processed_at: string | null
}

/**
 * Queue a signal for the running supervisor.
 * @returns the new signal's id
 */
export function enqueueSignal(
  db: BetterSqlite3Database,
  signal: ControlSignalKind,
  service: ServiceName | null = null,
): number {
  const info = db
    .prepare<[string, string | null]>('INSERT INTO control_signals (signal, service) VALUES (?, ?)')
    .run(signal, service)
  return Number(info.lastInsertRowid)
}

/**
 * Take every unprocessed signal, oldest first, marking each processed.
 *
 * A signal is returned to exactly one caller: rows another connection marked
 * processed between the read and the update are skipped.
 */
export function claimPendingSignals(db: BetterSqlite3Database): ControlSignal[] {
  const select = db.prepare<[], ControlSignal>(
    'SELECT * FROM control_signals WHERE processed_at IS NULL ORDER BY id ASC',
  )
  const mark = db.prepare<[number]>(
    `UPDATE control_signals SET processed_at = datetime('now')
     WHERE id = ? AND processed_at IS NULL`,
  )

  return db.transaction((): ControlSignal[] => {
    const claimed: ControlSignal[] = []
    for (const row of select.all()) {
      if (mark.run(row.id).changes === 1) claimed.push(row)
    }
    return claimed
  }).immediate()
}

/** Signals not yet claimed by a supervisor, oldest first */
export function listPendingSignals(db: BetterSqlite3Database): ControlSignal[] {
  return db
    .prepare<[], ControlSignal>(
      'SELECT * FROM control_signals WHERE processed_at IS NULL ORDER BY id ASC',
    )
    .all()
}

/** Drop unclaimed signals, e.g. ones left behind by a supervisor that died */
export function discardPendingSignals(db: BetterSqlite3Database): number {
  return db.prepare('DELETE FROM control_signals WHERE processed_at IS NULL').run().changes
}
