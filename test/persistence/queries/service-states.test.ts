/**
 * Tests for service_states, alerts and supervisor_runs queries.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import {
  getServiceState,
  incrementRestartCount,
  listServiceStates,
  recordProbe,
  seedServiceStates,
  setLastError,
  updateServiceState,
} from '../../../src/persistence/queries/service-states.js'
import { clearAlerts, listOpenAlerts, raiseAlert } from '../../../src/persistence/queries/alerts.js'
import {
  createRun,
  findLiveRun,
  getActiveRun,
  getLatestRun,
  getRun,
  markStaleRuns,
  updateRunStatus,
} from '../../../src/persistence/queries/supervisor-runs.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  runMigrations(db)
  return db
}

const SERVICES = [
  { name: 'storage', dependsOn: [] },
  { name: 'gpu', dependsOn: [] },
  { name: 'model-a', dependsOn: ['storage', 'gpu'] },
]

describe('service state queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
    seedServiceStates(db, SERVICES, '2026-01-01T00:00:00.000Z')
  })

  afterEach(() => {
    db.close()
  })

  it('seeds one Stopped row per service in declaration order', () => {
    const rows = listServiceStates(db)
    expect(rows.map((r) => [r.name, r.state])).toEqual([
      ['storage', 'stopped'],
      ['gpu', 'stopped'],
      ['model-a', 'stopped'],
    ])
    expect(rows[2]?.dependencies).toEqual(['storage', 'gpu'])
    expect(rows[0]?.lastProbe).toBeNull()
  })

  it('replaces rows from an earlier run when seeding again', () => {
    updateServiceState(db, 'gpu', 'failed')
    seedServiceStates(db, [{ name: 'storage', dependsOn: [] }])

    expect(listServiceStates(db).map((r) => r.name)).toEqual(['storage'])
  })

  it('updates state and timestamp', () => {
    updateServiceState(db, 'storage', 'running', '2026-01-01T00:01:00.000Z')
    const row = getServiceState(db, 'storage')
    expect(row?.state).toBe('running')
    expect(row?.updatedAt).toBe('2026-01-01T00:01:00.000Z')
  })

  it('records the last probe and the failure count', () => {
    recordProbe(
      db,
      'model-a',
      {
        status: 'unhealthy',
        timestamp: new Date('2026-01-01T00:02:00.000Z'),
        latencyMs: 12,
        message: 'HTTP 503',
      },
      2,
    )
    const row = getServiceState(db, 'model-a')
    expect(row?.lastProbe).toEqual({
      status: 'unhealthy',
      at: '2026-01-01T00:02:00.000Z',
      message: 'HTTP 503',
    })
    expect(row?.failureCount).toBe(2)
    expect(row?.updatedAt).toBe('2026-01-01T00:02:00.000Z')
  })

  it('counts restarts and keeps the last error', () => {
    incrementRestartCount(db, 'model-a')
    incrementRestartCount(db, 'model-a')
    setLastError(db, 'model-a', 'start hook failed')

    const row = getServiceState(db, 'model-a')
    expect(row?.restartCount).toBe(2)
    expect(row?.lastError).toBe('start hook failed')
  })

  it('returns undefined for an unknown service', () => {
    expect(getServiceState(db, 'ghost')).toBeUndefined()
  })
})

describe('alert queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('keeps alerts open until cleared for that service', () => {
    raiseAlert(db, { service: 'model-a', kind: 'restart_limit_exceeded', message: 'limit hit' })
    raiseAlert(db, { service: 'gpu', kind: 'restart_limit_exceeded', message: 'gpu limit hit' })

    expect(listOpenAlerts(db).map((a) => a.service)).toEqual(['model-a', 'gpu'])
    expect(clearAlerts(db, 'model-a')).toBe(1)
    expect(listOpenAlerts(db).map((a) => a.service)).toEqual(['gpu'])
    expect(listOpenAlerts(db, 'model-a')).toEqual([])
  })
})

describe('supervisor run queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('tracks the active run until it stops', () => {
    const id = createRun(db, 4242, 'svcward.yaml')
    expect(getActiveRun(db)?.status).toBe('starting')

    updateRunStatus(db, id, 'running')
    expect(getActiveRun(db)).toMatchObject({ id, pid: 4242, status: 'running', config: 'svcward.yaml' })

    updateRunStatus(db, id, 'stopped')
    expect(getActiveRun(db)).toBeUndefined()
    expect(getLatestRun(db)?.status).toBe('stopped')
  })

  it('finds the newest run whose process is alive', () => {
    const older = createRun(db, 100)
    const newer = createRun(db, 200)
    const alive = (pid: number): boolean => pid === 100

    expect(findLiveRun(db, alive)?.id).toBe(older)
    expect(getRun(db, newer)?.status).toBe('starting')
  })

  it('marks runs of dead processes as failed', () => {
    const live = createRun(db, 100)
    const dead = createRun(db, 200)

    expect(markStaleRuns(db, (pid) => pid === 100)).toBe(1)
    expect(getRun(db, dead)?.status).toBe('failed')
    expect(getRun(db, live)?.status).toBe('starting')
  })
})
