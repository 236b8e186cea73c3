/**
 * Unit tests for DependencyOrchestratorImpl
 *
 * Covers:
 *  - Startup in plan order with dependency gating
 *  - All-or-nothing rollback on start failure, timeout and cancellation
 *  - Total shutdown despite individual stop failures
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import type { SupervisorEvents } from '../../../core/event-bus.types.js'
import { StartFailure } from '../../../core/errors.js'
import type { ServiceDefinition } from '../../../core/types.js'
import { createDependencyOrchestrator } from '../dependency-orchestrator-impl.js'
import type { DependencyOrchestrator } from '../dependency-orchestrator.js'
import { buildFakeSystem, makeDefinition } from '../../../testing/fakes.js'
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
let orchestrator: DependencyOrchestrator
let running: string[]

function inferenceStack(overrides: Partial<ServiceDefinition> = {}): ServiceDefinition[] {
  return [
    makeDefinition('storage', { index: 0 }),
    makeDefinition('gpu', { index: 1 }),
    makeDefinition('model-a', { index: 2, dependsOn: ['storage', 'gpu'], ...overrides }),
  ]
}

function setup(definitions: ServiceDefinition[], startTimeoutMs = 1000): void {
  system = buildFakeSystem(definitions, bus)
  orchestrator = createDependencyOrchestrator({
    registry: system.registry,
    supervisors: system.supervisors,
    eventBus: bus,
    startTimeoutMs,
    pollIntervalMs: 10,
  })
}

function states(): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [name, sup] of system.supervisors) out[name] = sup.status()
  return out
}

beforeEach(() => {
  bus = createEventBus()
  running = []
  bus.on('service:state-changed', (e) => {
    if (e.to === 'running') running.push(e.service)
  })
})

async function captureFailure(promise: Promise<unknown>): Promise<StartFailure> {
  try {
    await promise
  } catch (err) {
    if (err instanceof StartFailure) return err
    throw err
  }
  throw new Error('expected StartFailure')
}

// ---------------------------------------------------------------------------
// plan()
// ---------------------------------------------------------------------------

describe('plan()', () => {
  it('orders the registry and announces the order', () => {
    setup(inferenceStack())
    const computed: SupervisorEvents['plan:computed'][] = []
    bus.on('plan:computed', (e) => computed.push(e))

    const plan = orchestrator.plan()

    expect(plan.map((s) => s.name)).toEqual(['storage', 'gpu', 'model-a'])
    expect(computed).toEqual([{ order: ['storage', 'gpu', 'model-a'] }])
  })
})

// ---------------------------------------------------------------------------
// startAll()
// ---------------------------------------------------------------------------

describe('startAll()', () => {
  it('starts every service in plan order', async () => {
    setup(inferenceStack())
    const complete = vi.fn()
    bus.on('startup:complete', complete)

    await orchestrator.startAll(orchestrator.plan())

    expect(running).toEqual(['storage', 'gpu', 'model-a'])
    expect(states()).toEqual({ storage: 'running', gpu: 'running', 'model-a': 'running' })
    expect(complete).toHaveBeenCalledTimes(1)
  })

  it('rolls back started services in reverse order when a start hook fails', async () => {
    setup(inferenceStack())
    system.hook('model-a').startBehavior = 'fail'
    const stopOrder: string[] = []
    bus.on('service:state-changed', (e) => {
      if (e.to === 'stopped' && e.from === 'running') stopOrder.push(e.service)
    })
    const failed = vi.fn()
    bus.on('startup:failed', failed)

    const error = await captureFailure(orchestrator.startAll(orchestrator.plan()))

    expect(error.service).toBe('model-a')
    expect(error.rolledBack).toEqual(['gpu', 'storage'])
    expect(error.message).toBe('Service "model-a" failed to start: start hook failed')
    expect(stopOrder).toEqual(['gpu', 'storage'])
    expect(states()).toEqual({ storage: 'stopped', gpu: 'stopped', 'model-a': 'stopped' })
    expect(failed).toHaveBeenCalledWith({
      service: 'model-a',
      error: 'start hook failed',
      rolledBack: ['gpu', 'storage'],
    })
  })

  it('fails when a dependency does not reach Running in time', async () => {
    setup(inferenceStack(), 50)
    const modelOnly = [system.registry.get('model-a')]

    const error = await captureFailure(orchestrator.startAll(modelOnly))

    expect(error.message).toMatch(/dependencies not running: storage, gpu$/)
    expect(error.rolledBack).toEqual([])
    expect(system.hook('model-a').startCalls).toBe(0)
  })

  it('rolls back when cancelled during a start hook', async () => {
    setup(inferenceStack({ hookTimeoutMs: 5000 }))
    system.hook('model-a').startBehavior = 'hang'
    const controller = new AbortController()
    setTimeout(() => controller.abort(new Error('interrupted')), 20)

    const error = await captureFailure(
      orchestrator.startAll(orchestrator.plan(), { signal: controller.signal }),
    )

    expect(error.message).toBe('Service "model-a" failed to start: interrupted')
    expect(error.rolledBack).toEqual(['gpu', 'storage'])
    expect(states()).toEqual({ storage: 'stopped', gpu: 'stopped', 'model-a': 'stopped' })
  })

  it('does not touch any service when already cancelled', async () => {
    setup(inferenceStack())
    const controller = new AbortController()
    controller.abort(new Error('interrupted'))

    await expect(
      orchestrator.startAll(orchestrator.plan(), { signal: controller.signal }),
    ).rejects.toThrow(StartFailure)
    expect(system.hook('storage').startCalls).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// stopAll()
// ---------------------------------------------------------------------------

describe('stopAll()', () => {
  it('stops in reverse order and keeps going past failures', async () => {
    setup(inferenceStack())
    const plan = orchestrator.plan()
    await orchestrator.startAll(plan)
    const gpu = system.hook('gpu')
    gpu.stopBehavior = 'fail'
    gpu.forceStopFails = true

    const report = await orchestrator.stopAll(plan)

    expect(report).toEqual({
      stopped: ['model-a', 'storage'],
      errors: [{ service: 'gpu', error: 'force stop failed' }],
    })
    expect(states()).toEqual({ storage: 'stopped', gpu: 'stopped', 'model-a': 'stopped' })
  })

  it('skips services that are already stopped', async () => {
    setup(inferenceStack())
    const report = await orchestrator.stopAll(orchestrator.plan())

    expect(report).toEqual({ stopped: [], errors: [] })
    expect(system.hook('storage').stopCalls).toBe(0)
  })
})
