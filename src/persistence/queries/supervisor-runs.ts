/**
 * supervisor_runs query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export type RunStatus = 'starting' | 'running' | 'stopping' | 'stopped' | 'failed'

export interface SupervisorRun {
  id: number
  pid: number
  status: RunStatus
  config: string | null
  started_at: string
  updated_at: string
}

export function createRun(db: BetterSqlite3Database, pid: number, config: string | null = null): number {
  const info = db
    .prepare<[number, string | null]>(
      `INSERT INTO supervisor_runs (pid, status, config) VALUES (?, 'starting', ?)`,
    )
    .run(pid, config)
  return Number(info.lastInsertRowid)
}

export function updateRunStatus(db: BetterSqlite3Database, id: number, status: RunStatus): void {
  db.prepare<[string, number]>(
    `UPDATE supervisor_runs SET status = ?, updated_at = datetime('now') WHERE id = ?`,
  ).run(status, id)
}

export function getRun(db: BetterSqlite3Database, id: number): SupervisorRun | undefined {
  return db.prepare<[number], SupervisorRun>('SELECT * FROM supervisor_runs WHERE id = ?').get(id)
}

/** The most recent run that has not reached a terminal status */
export function getActiveRun(db: BetterSqlite3Database): SupervisorRun | undefined {
  return db
    .prepare<[], SupervisorRun>(
      `SELECT * FROM supervisor_runs
       WHERE status IN ('starting', 'running', 'stopping')
       ORDER BY id DESC LIMIT 1`,
    )
    .get()
}

/** Runs that have not reached a terminal status, newest first */
export function listActiveRuns(db: BetterSqlite3Database): SupervisorRun[] {
  return db
    .prepare<[], SupervisorRun>(
      `SELECT * FROM supervisor_runs
       WHERE status IN ('starting', 'running', 'stopping')
       ORDER BY id DESC`,
    )
    .all()
}

/** The newest non-terminal run whose process still exists */
export function findLiveRun(
  db: BetterSqlite3Database,
  isAlive: (pid: number) => boolean,
): SupervisorRun | undefined {
  return listActiveRuns(db).find((run) => isAlive(run.pid))
}

/**
 * Mark non-terminal runs whose process is gone as failed.
 * @returns the number of runs marked
 */
export function markStaleRuns(
  db: BetterSqlite3Database,
  isAlive: (pid: number) => boolean,
): number {
  let marked = 0
  for (const run of listActiveRuns(db)) {
    if (isAlive(run.pid)) continue
    updateRunStatus(db, run.id, 'failed')
    marked += 1
  }
  return marked
}

/** The most recent run of any status */
export function getLatestRun(db: BetterSqlite3Database): SupervisorRun | undefined {
  return db
    .prepare<[], SupervisorRun>('SELECT * FROM supervisor_runs ORDER BY id DESC LIMIT 1')
    .get()
}

