/**
 * Tests for `svcward health`.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ServiceState } from '../../../core/types.js'
import { seedServiceStates, updateServiceState } from '../../../persistence/queries/service-states.js'
import { createRun, updateRunStatus } from '../../../persistence/queries/supervisor-runs.js'
import { captureOutput, type CapturedOutput } from '../../../testing/output.js'
import { TempProject } from '../../../testing/project.js'
import { runHealthAction, type HealthActionOptions } from '../health.js'

vi.mock('../../../utils/logger.js', () => {
  const fake = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => fake,
  }
  return { createLogger: () => fake, childLogger: () => fake }
})

const SUPERVISOR_PID = 4242

let project: TempProject
let output: CapturedOutput

beforeEach(() => {
  project = new TempProject('svcward-health-')
  project.writeDeclaration()
  output = captureOutput()
})

afterEach(() => {
  vi.restoreAllMocks()
  project.remove()
})

function options(overrides: Partial<HealthActionOptions> = {}): HealthActionOptions {
  return {
    projectRoot: project.dir,
    outputFormat: 'human',
    strict: false,
    env: {},
    isProcessAlive: (pid) => pid === SUPERVISOR_PID,
    ...overrides,
  }
}

function seed(states: Record<string, ServiceState>): void {
  project.withDb((db: BetterSqlite3Database) => {
    updateRunStatus(db, createRun(db, SUPERVISOR_PID), 'running')
    seedServiceStates(
      db,
      Object.keys(states).map((name) => ({ name, dependsOn: [] })),
    )
    for (const [name, state] of Object.entries(states)) updateServiceState(db, name, state)
  })
}

describe('runHealthAction', () => {
  it('reports HEALTHY and passes --strict when every service is running', () => {
    seed({ storage: 'running', gpu: 'running', 'model-a': 'running' })

    expect(runHealthAction(options({ strict: true }))).toBe(0)
    expect(output.stdout().split('\n').slice(0, 2)).toEqual([
      'Health: HEALTHY',
      'running: 3  unhealthy: 0  failed: 0  other: 0',
    ])
  })

  it('separates services being recovered from those that need an operator', () => {
    seed({ storage: 'running', gpu: 'unhealthy', 'model-a': 'failed' })

    expect(runHealthAction(options())).toBe(0)

    const lines = output.stdout().split('\n')
    expect(lines[0]).toBe('Health: UNHEALTHY')
    expect(lines).toContain('running: 1  unhealthy: 1  failed: 1  other: 0')
    expect(lines).toContain('storage  running')
    expect(lines).toContain('gpu      unhealthy  being recovered')
    expect(lines).toContain('model-a  failed     recovery exhausted; needs an operator')
  })

  it('exits 6 with --strict when any service is not running', () => {
    seed({ storage: 'running', gpu: 'restarting', 'model-a': 'running' })
    expect(runHealthAction(options({ strict: true }))).toBe(6)
  })

  it('is not healthy when no live supervisor keeps the states current', () => {
    seed({ storage: 'running', gpu: 'running', 'model-a': 'running' })

    expect(runHealthAction(options({ strict: true, isProcessAlive: () => false }))).toBe(6)
    expect(output.stdout()).toContain('No supervisor is running; states are the last recorded.')
  })

  it('reports an empty, unhealthy summary before any run', () => {
    expect(runHealthAction(options({ outputFormat: 'json' }))).toBe(0)
    expect(output.events()).toEqual([
      {
        event: 'health:report',
        timestamp: expect.any(String),
        data: {
          services: {},
          counts: { running: 0, unhealthy: 0, failed: 0, other: 0 },
          healthy: false,
          supervisorActive: false,
          alerts: [],
        },
      },
    ])
  })

  it('emits counts and states as a health:report event', () => {
    seed({ storage: 'running', gpu: 'unhealthy', 'model-a': 'failed' })

    runHealthAction(options({ outputFormat: 'json' }))

    expect(output.events()[0]).toMatchObject({
      event: 'health:report',
      data: {
        services: { storage: 'running', gpu: 'unhealthy', 'model-a': 'failed' },
        counts: { running: 1, unhealthy: 1, failed: 1, other: 0 },
        healthy: false,
        supervisorActive: true,
      },
    })
  })
})
