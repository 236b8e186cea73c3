/**
 * Unit tests for MonitorImpl
 *
 * Covers:
 *  - K restarts within the limit, then Failed on the next failure
 *  - Probing continues for a Failed service without further restarts
 *  - A failed automatic restart keeps recovery going from Stopped
 *  - Loop independence: a hanging probe never delays another service
 *  - Clean cancellation: run() resolves after every loop exits
 *  - Manual restart/reset overrides and the health summary
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import type { SupervisorEvents } from '../../../core/event-bus.types.js'
import { ServiceNotFoundError } from '../../../core/errors.js'
import type { ServiceDefinition } from '../../../core/types.js'
import { createRecoveryPolicy } from '../../recovery-policy/recovery-policy-impl.js'
import type { RecoveryPolicy } from '../../recovery-policy/recovery-policy.js'
import type { HealthProbe } from '../../health-probe/health-probe.js'
import { createMonitor } from '../monitor-impl.js'
import type { Monitor } from '../monitor.js'
import {
  FakeProbe,
  buildFakeSystem,
  httpProbe,
  makeDefinition,
  probeResult,
  waitFor,
} from '../../../testing/fakes.js'
import type { FakeSystem } from '../../../testing/fakes.js'

vi.mock('../../../utils/logger.js', () => {
  const fake = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => fake,
  }
  return {
    createLogger: () => fake,
    childLogger: () => fake,
  }
})

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let bus: TypedEventBus
let system: FakeSystem
let fakeProbe: FakeProbe
let policy: RecoveryPolicy
let monitor: Monitor
let controller: AbortController
let running: Promise<void> | null
let decisions: SupervisorEvents['service:recovery-decision'][]

function service(name: string, overrides: Partial<ServiceDefinition> = {}): ServiceDefinition {
  return makeDefinition(name, { probe: httpProbe(name), ...overrides })
}

async function setup(definitions: ServiceDefinition[], probe?: HealthProbe): Promise<void> {
  system = buildFakeSystem(definitions, bus)
  policy = createRecoveryPolicy({
    policies: new Map(definitions.map((d) => [d.name, d.restart])),
  })
  monitor = createMonitor({
    registry: system.registry,
    supervisors: system.supervisors,
    probe: probe ?? fakeProbe,
    policy,
    eventBus: bus,
  })
  for (const definition of system.registry.list()) {
    await system.supervisor(definition.name).start()
  }
}

function startMonitor(): void {
  running = monitor.run(controller.signal)
}

beforeEach(() => {
  bus = createEventBus()
  fakeProbe = new FakeProbe()
  controller = new AbortController()
  running = null
  decisions = []
  bus.on('service:recovery-decision', (e) => decisions.push(e))
})

afterEach(async () => {
  controller.abort()
  await running
})

// ---------------------------------------------------------------------------
// Recovery
// ---------------------------------------------------------------------------

describe('automatic recovery', () => {
  it('restarts max_attempts times, then marks the service Failed', async () => {
    await setup([service('storage'), service('model-a', { dependsOn: ['storage'] })])
    fakeProbe.script('model-a', [], 'unhealthy')
    const failed: SupervisorEvents['service:failed'][] = []
    bus.on('service:failed', (e) => failed.push(e))

    startMonitor()
    await waitFor(() => system.supervisor('model-a').status() === 'failed', 'model-a to fail')

    expect(decisions.map((d) => d.action)).toEqual(['restart', 'restart', 'restart', 'mark_failed'])
    expect(decisions.map((d) => d.failures)).toEqual([1, 2, 3, 4])
    // initial start plus three restarts
    expect(system.hook('model-a').startCalls).toBe(4)
    expect(failed).toEqual([
      {
        service: 'model-a',
        failures: 4,
        message:
          'Service "model-a" failed 4 times within 300000ms (limit 3); automatic restarts stopped',
      },
    ])
    expect(monitor.healthSummary().services).toEqual({ storage: 'running', 'model-a': 'failed' })
  })

  it('keeps probing a Failed service without restarting it', async () => {
    await setup([service('model-a', { restart: { maxAttempts: 1, windowMs: 300_000, backoffMs: 0 } })])
    fakeProbe.script('model-a', [], 'probe_error')

    startMonitor()
    await waitFor(() => system.supervisor('model-a').status() === 'failed', 'model-a to fail')
    const probesAtFailure = fakeProbe.callCount('model-a')
    const startsAtFailure = system.hook('model-a').startCalls

    await waitFor(() => fakeProbe.callCount('model-a') >= probesAtFailure + 3, 'more probes')
    expect(system.hook('model-a').startCalls).toBe(startsAtFailure)
    expect(system.supervisor('model-a').status()).toBe('failed')
    expect(decisions.filter((d) => d.action === 'mark_failed')).toHaveLength(1)
  })

  it('leaves a healthy service alone', async () => {
    await setup([service('storage')])

    startMonitor()
    await waitFor(() => fakeProbe.callCount('storage') >= 3, 'three probes')

    expect(decisions).toEqual([])
    expect(system.hook('storage').startCalls).toBe(1)
    expect(monitor.lastProbe('storage')?.status).toBe('healthy')
  })

  it('recovers a service once a restart brings it back', async () => {
    await setup([service('model-a')])
    fakeProbe.script('model-a', ['unhealthy'], 'healthy')

    startMonitor()
    await waitFor(() => system.hook('model-a').startCalls === 2, 'one restart')
    await waitFor(() => fakeProbe.callCount('model-a') >= 4, 'more probes')

    expect(system.supervisor('model-a').status()).toBe('running')
    expect(decisions).toEqual([{ service: 'model-a', action: 'restart', failures: 1 }])
  })

  it('keeps recovering when a restart fails, and fails from Stopped at the limit', async () => {
    await setup([service('model-a', { restart: { maxAttempts: 2, windowMs: 300_000, backoffMs: 0 } })])
    fakeProbe.script('model-a', [], 'unhealthy')
    system.hook('model-a').startBehavior = 'fail'

    startMonitor()
    await waitFor(() => system.supervisor('model-a').status() === 'failed', 'model-a to fail')

    expect(decisions.map((d) => d.action)).toEqual(['restart', 'restart', 'mark_failed'])
    expect(system.hook('model-a').startCalls).toBe(3)
  })

  it('waits out the backoff before restarting', async () => {
    await setup([service('model-a', { restart: { maxAttempts: 3, windowMs: 300_000, backoffMs: 150 } })])
    fakeProbe.script('model-a', ['unhealthy'], 'healthy')

    startMonitor()
    await waitFor(() => decisions.length === 1, 'a restart decision')
    const decidedAt = Date.now()
    await waitFor(() => system.hook('model-a').startCalls === 2, 'the restart')

    expect(Date.now() - decidedAt).toBeGreaterThanOrEqual(100)
  })
})

// ---------------------------------------------------------------------------
// Loops
// ---------------------------------------------------------------------------

describe('loops', () => {
  it('keeps probing other services while one probe hangs', async () => {
    await setup([
      service('slow', { probe: httpProbe('slow', 5000) }),
      service('fast'),
    ])
    fakeProbe.script('slow', [], 'hang')

    startMonitor()
    await waitFor(() => fakeProbe.callCount('fast') >= 10, 'ten fast probes')

    expect(fakeProbe.callCount('slow')).toBe(1)
  })

  it('resolves run() once every loop has exited after cancellation', async () => {
    await setup([service('slow', { probe: httpProbe('slow', 5000) }), service('fast')])
    fakeProbe.script('slow', [], 'hang')

    startMonitor()
    await waitFor(() => fakeProbe.callCount('fast') >= 2, 'two fast probes')
    controller.abort()
    await running

    expect(monitor.isRunning).toBe(false)
    const calls = fakeProbe.callCount('fast')
    await new Promise((resolve) => setTimeout(resolve, 50))
    expect(fakeProbe.callCount('fast')).toBe(calls)
  })

  it('continues after an iteration throws', async () => {
    const check = vi
      .fn<HealthProbe['check']>()
      .mockRejectedValueOnce(new Error('probe exploded'))
      .mockResolvedValue(probeResult('healthy'))
    await setup([service('storage')], { check })

    startMonitor()
    await waitFor(() => check.mock.calls.length >= 3, 'probes after the error')

    expect(system.supervisor('storage').status()).toBe('running')
  })

  it('does not probe a service that was stopped on purpose', async () => {
    await setup([service('storage')])
    await system.supervisor('storage').stop()

    startMonitor()
    await new Promise((resolve) => setTimeout(resolve, 60))

    expect(fakeProbe.callCount('storage')).toBe(0)
  })

  it('refuses to run twice at once', async () => {
    await setup([service('storage')])
    startMonitor()
    await expect(monitor.run(controller.signal)).rejects.toThrow('Monitor is already running')
  })
})

// ---------------------------------------------------------------------------
// Manual overrides
// ---------------------------------------------------------------------------

describe('manual overrides', () => {
  async function failModelA(): Promise<void> {
    await setup([service('model-a', { restart: { maxAttempts: 1, windowMs: 300_000, backoffMs: 0 } })])
    fakeProbe.script('model-a', [], 'unhealthy')
    startMonitor()
    await waitFor(() => system.supervisor('model-a').status() === 'failed', 'model-a to fail')
  }

  it('restartService brings a Failed service back with a clean window', async () => {
    await failModelA()
    fakeProbe.script('model-a', [], 'healthy')
    const resets = vi.fn()
    bus.on('service:reset', resets)

    await monitor.restartService('model-a')

    expect(system.supervisor('model-a').status()).toBe('running')
    expect(policy.failureCount('model-a')).toBe(0)
    expect(resets).toHaveBeenCalledWith({ service: 'model-a' })
  })

  it('restartService stops but does not start again once shutdown has begun', async () => {
    await setup([service('storage')])
    const shutdown = new AbortController()
    shutdown.abort()

    await monitor.restartService('storage', shutdown.signal)

    expect(system.supervisor('storage').status()).toBe('stopped')
    expect(system.hook('storage').stopCalls).toBe(1)
    expect(system.hook('storage').startCalls).toBe(1)
  })

  it('resetService leaves the service Stopped and unprobed', async () => {
    await failModelA()
    await monitor.resetService('model-a')
    const probes = fakeProbe.callCount('model-a')
    await new Promise((resolve) => setTimeout(resolve, 50))

    expect(system.supervisor('model-a').status()).toBe('stopped')
    expect(policy.failureCount('model-a')).toBe(0)
    expect(fakeProbe.callCount('model-a')).toBe(probes)
  })

  it('rejects unknown services', async () => {
    await setup([service('storage')])
    await expect(monitor.restartService('ghost')).rejects.toBeInstanceOf(ServiceNotFoundError)
    await expect(monitor.resetService('ghost')).rejects.toBeInstanceOf(ServiceNotFoundError)
  })
})

// ---------------------------------------------------------------------------
// healthSummary
// ---------------------------------------------------------------------------

describe('healthSummary()', () => {
  it('counts states and is healthy only when everything runs', async () => {
    await setup([service('storage'), service('gpu'), service('model-a')])
    expect(monitor.healthSummary()).toEqual({
      services: { storage: 'running', gpu: 'running', 'model-a': 'running' },
      counts: { running: 3, unhealthy: 0, failed: 0, other: 0 },
      healthy: true,
    })

    await system.supervisor('gpu').stop()
    expect(monitor.healthSummary()).toEqual({
      services: { storage: 'running', gpu: 'stopped', 'model-a': 'running' },
      counts: { running: 2, unhealthy: 0, failed: 0, other: 1 },
      healthy: false,
    })
  })
})
