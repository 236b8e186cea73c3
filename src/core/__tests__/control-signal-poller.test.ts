/**
 * Unit tests for ControlSignalPoller
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../persistence/migrations/index.js'
import {
  enqueueSignal,
  listPendingSignals,
  type ControlSignal,
} from '../../persistence/queries/control-signals.js'
import { ControlSignalPoller } from '../control-signal-poller.js'
import { waitFor } from '../../testing/fakes.js'

vi.mock('../../utils/logger.js', () => {
  const fake = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => fake,
  }
  return { createLogger: () => fake, childLogger: () => fake }
})

let db: BetterSqlite3Database
let received: string[]
let poller: ControlSignalPoller

function describeSignal(signal: ControlSignal): string {
  return signal.service === null ? signal.signal : `${signal.signal} ${signal.service}`
}

beforeEach(() => {
  db = new BetterSqlite3(':memory:')
  runMigrations(db)
  received = []
})

afterEach(async () => {
  await poller.shutdown()
  db.close()
})

function createPoller(
  handler: (signal: ControlSignal) => Promise<void> = async (signal) => {
    received.push(describeSignal(signal))
  },
  intervalMs = 60_000,
): ControlSignalPoller {
  poller = new ControlSignalPoller({ db: () => db, intervalMs, handler })
  return poller
}

describe('ControlSignalPoller', () => {
  it('discards signals left from a previous run on initialize()', async () => {
    enqueueSignal(db, 'stop')
    await createPoller().initialize()

    expect(listPendingSignals(db)).toEqual([])
    await poller.poll()
    expect(received).toEqual([])
  })

  it('dispatches pending signals oldest first, once', async () => {
    await createPoller().initialize()
    enqueueSignal(db, 'restart', 'gpu')
    enqueueSignal(db, 'reset', 'model-a')

    await poller.poll()
    await poller.poll()

    expect(received).toEqual(['restart gpu', 'reset model-a'])
  })

  it('keeps dispatching after a handler fails', async () => {
    await createPoller(async (signal) => {
      if (signal.service === 'ghost') throw new Error('Service not found: ghost')
      received.push(describeSignal(signal))
    }).initialize()
    enqueueSignal(db, 'reset', 'ghost')
    enqueueSignal(db, 'stop')

    await expect(poller.poll()).resolves.toBeUndefined()
    expect(received).toEqual(['stop'])
  })

  it('shares one pass between overlapping polls', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    await createPoller(async (signal) => {
      await gate
      received.push(describeSignal(signal))
    }).initialize()
    enqueueSignal(db, 'stop')

    const first = poller.poll()
    const second = poller.poll()
    expect(second).toBe(first)

    release()
    await first
    expect(received).toEqual(['stop'])
  })

  it('polls on its interval until shut down', async () => {
    await createPoller(undefined, 5).initialize()
    enqueueSignal(db, 'stop')

    await waitFor(() => received.length === 1, 'interval poll')
    await poller.shutdown()
    enqueueSignal(db, 'restart', 'gpu')

    await new Promise((resolve) => setTimeout(resolve, 30))
    expect(received).toEqual(['stop'])
    expect(listPendingSignals(db)).toHaveLength(1)
  })
})
