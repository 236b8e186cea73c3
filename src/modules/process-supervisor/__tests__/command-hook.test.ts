/**
 * Tests for CommandHook: uses vi.mock to simulate child_process.spawn with
 * fake processes so no real commands run.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { MockInstance } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import type { HookSpec } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Mock child_process.spawn
// ---------------------------------------------------------------------------

function createFakeProcess(pid: number) {
  const emitter = new EventEmitter()
  const stdout = new PassThrough()
  const stderr = new PassThrough()

  const proc = Object.assign(emitter, {
    stdin: null,
    stdout,
    stderr,
    pid,
    exitCode: null as number | null,
    signalCode: null as string | null,
    kill: vi.fn(),
  })

  return {
    proc,
    emitSpawn() {
      emitter.emit('spawn')
    },
    emitError(err: Error) {
      emitter.emit('error', err)
    },
    emitExit(code: number | null, signal: string | null = null) {
      proc.exitCode = code
      proc.signalCode = signal
      emitter.emit('exit', code, signal)
      emitter.emit('close', code, signal)
    },
    writeStderr(data: string) {
      stderr.write(data)
    },
  }
}

type FakeProcess = ReturnType<typeof createFakeProcess>

const spawned: { cmd: string; args: string[]; opts: Record<string, unknown>; fp: FakeProcess }[] = []

vi.mock('node:child_process', () => ({
  spawn: vi.fn((cmd: string, args: string[], opts: Record<string, unknown>) => {
    const fp = createFakeProcess(4000 + spawned.length)
    spawned.push({ cmd, args, opts, fp })
    return fp.proc
  }),
}))

vi.mock('../../../utils/logger.js', () => {
  const fake = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }
  return {
    createLogger: () => fake,
    childLogger: () => fake,
  }
})

// Import after mocking
import { CommandHook } from '../command-hook.js'
import { HookError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function spec(command: string, extra: Partial<HookSpec> = {}): HookSpec {
  return { command, args: [], env: {}, oneshot: false, ...extra }
}

function last(): FakeProcess {
  const entry = spawned[spawned.length - 1]
  if (entry === undefined) throw new Error('nothing spawned')
  return entry.fp
}

/** Let pending microtasks and stream callbacks run */
function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

let killSpy: MockInstance<typeof process.kill>

beforeEach(() => {
  spawned.length = 0
  killSpy = vi.spyOn(process, 'kill').mockImplementation(() => true)
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Resident processes
// ---------------------------------------------------------------------------

describe('CommandHook (resident)', () => {
  it('spawns detached with the merged environment and resolves on spawn', async () => {
    const hook = new CommandHook(
      'model-a',
      spec('python', { args: ['-m', 'server'], env: { CUDA_VISIBLE_DEVICES: '0' }, cwd: '/srv' }),
    )
    const starting = hook.start(new AbortController().signal)
    last().emitSpawn()
    const handle = await starting

    expect(handle).toEqual({ id: 'model-a:4000', pid: 4000 })
    expect(hook.isAlive()).toBe(true)

    const call = spawned[0]
    expect(call?.cmd).toBe('python')
    expect(call?.args).toEqual(['-m', 'server'])
    expect(call?.opts['detached']).toBe(true)
    expect(call?.opts['cwd']).toBe('/srv')
    expect(call?.opts['env']).toMatchObject({ CUDA_VISIBLE_DEVICES: '0' })
  })

  it('rejects with HookError when the command cannot be launched', async () => {
    const hook = new CommandHook('model-a', spec('missing-binary'))
    const starting = hook.start(new AbortController().signal)
    last().emitError(new Error('spawn missing-binary ENOENT'))

    await expect(starting).rejects.toThrow(
      'Failed to launch "missing-binary": spawn missing-binary ENOENT',
    )
    expect(hook.isAlive()).toBe(false)
  })

  it('stops by sending SIGTERM to the process group and waiting for exit', async () => {
    const hook = new CommandHook('model-a', spec('server'))
    const starting = hook.start(new AbortController().signal)
    last().emitSpawn()
    await starting

    const stopping = hook.stop(new AbortController().signal)
    expect(killSpy).toHaveBeenCalledWith(-4000, 'SIGTERM')
    last().emitExit(null, 'SIGTERM')
    await stopping

    expect(hook.isAlive()).toBe(false)
  })

  it('rejects stop with the abort reason when the process ignores SIGTERM', async () => {
    const hook = new CommandHook('model-a', spec('server'))
    const starting = hook.start(new AbortController().signal)
    last().emitSpawn()
    await starting

    const controller = new AbortController()
    const stopping = hook.stop(controller.signal)
    controller.abort(new Error('grace period over'))

    await expect(stopping).rejects.toThrow('grace period over')
    expect(hook.isAlive()).toBe(true)
  })

  it('force-stops with SIGKILL', async () => {
    const hook = new CommandHook('model-a', spec('server'))
    const starting = hook.start(new AbortController().signal)
    last().emitSpawn()
    await starting

    const forcing = hook.forceStop()
    expect(killSpy).toHaveBeenCalledWith(-4000, 'SIGKILL')
    last().emitExit(null, 'SIGKILL')
    await forcing

    expect(hook.isAlive()).toBe(false)
  })

  it('falls back to signalling the child when the group signal fails', async () => {
    killSpy.mockImplementation(() => {
      throw new Error('ESRCH')
    })
    const hook = new CommandHook('model-a', spec('server'))
    const starting = hook.start(new AbortController().signal)
    const fp = last()
    fp.emitSpawn()
    await starting

    const stopping = hook.stop(new AbortController().signal)
    expect(fp.proc.kill).toHaveBeenCalledWith('SIGTERM')
    fp.emitExit(0)
    await stopping
  })

  it('runs an explicit stop command, then waits for the process to exit', async () => {
    const hook = new CommandHook('model-a', spec('server'), spec('server-ctl', { args: ['shutdown'] }))
    const starting = hook.start(new AbortController().signal)
    const main = last()
    main.emitSpawn()
    await starting

    const stopping = hook.stop(new AbortController().signal)
    const ctl = last()
    expect(spawned[1]?.cmd).toBe('server-ctl')
    expect(spawned[1]?.opts['detached']).toBe(false)
    ctl.emitExit(0)
    await tick()
    main.emitExit(0)
    await stopping

    expect(killSpy).not.toHaveBeenCalled()
    expect(hook.isAlive()).toBe(false)
  })

  it('treats an unexpected exit as not alive', async () => {
    const hook = new CommandHook('model-a', spec('server'))
    const starting = hook.start(new AbortController().signal)
    last().emitSpawn()
    await starting

    last().emitExit(1)
    expect(hook.isAlive()).toBe(false)
  })

  it('refuses to start a second process while the first is alive', async () => {
    const hook = new CommandHook('model-a', spec('server'))
    const starting = hook.start(new AbortController().signal)
    last().emitSpawn()
    await starting

    await expect(hook.start(new AbortController().signal)).rejects.toBeInstanceOf(HookError)
    expect(spawned).toHaveLength(1)
  })
})

// ---------------------------------------------------------------------------
// Oneshot commands
// ---------------------------------------------------------------------------

describe('CommandHook (oneshot)', () => {
  it('succeeds when the command exits 0 and counts as alive until stopped', async () => {
    const hook = new CommandHook('storage', spec('mount-models', { oneshot: true }))
    const starting = hook.start(new AbortController().signal)
    last().emitExit(0)

    expect(await starting).toEqual({ id: 'storage:oneshot' })
    expect(hook.isAlive()).toBe(true)

    await hook.stop(new AbortController().signal)
    expect(hook.isAlive()).toBe(false)
  })

  it('fails with the exit code and stderr tail on non-zero exit', async () => {
    const hook = new CommandHook('storage', spec('mount-models', { oneshot: true }))
    const starting = hook.start(new AbortController().signal)
    const fp = last()
    fp.writeStderr('mount: permission denied\n')
    await tick()
    fp.emitExit(32)

    await expect(starting).rejects.toThrow(
      '"mount-models" exited with code 32: mount: permission denied',
    )
    expect(hook.isAlive()).toBe(false)
  })

  it('reassembles a stderr line written across several chunks', async () => {
    const hook = new CommandHook('storage', spec('mount-models', { oneshot: true }))
    const starting = hook.start(new AbortController().signal)
    const fp = last()
    fp.writeStderr('mount: permis')
    await tick()
    fp.writeStderr('sion denied\nretry')
    await tick()
    fp.writeStderr(' with sudo\n')
    await tick()
    fp.emitExit(32)

    await expect(starting).rejects.toThrow(
      '"mount-models" exited with code 32: mount: permission denied | retry with sudo',
    )
  })

  it('kills the command and rejects when aborted', async () => {
    const hook = new CommandHook('storage', spec('mount-models', { oneshot: true }))
    const controller = new AbortController()
    const starting = hook.start(controller.signal)
    const fp = last()
    controller.abort(new Error('timed out'))

    await expect(starting).rejects.toThrow('timed out')
    expect(fp.proc.kill).toHaveBeenCalledWith('SIGKILL')
  })
})
