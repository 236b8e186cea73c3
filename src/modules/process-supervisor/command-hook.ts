/**
 * CommandHook: ProcessHook backed by child_process.spawn.
 *
 * Responsibilities:
 *  - Launching the start command, either resident (detached into its own
 *    process group) or oneshot (run to completion, exit 0 = success)
 *  - Stopping via the optional stop command, else SIGTERM to the process group
 *  - SIGKILL to the process group on forced stop
 *  - Forwarding child output to the service's logger
 */

import { spawn } from 'node:child_process'
import type { ChildProcess, SpawnOptions } from 'node:child_process'
import { createInterface } from 'node:readline'
import type pino from 'pino'
import { HookError } from '../../core/errors.js'
import type { HookSpec } from '../../core/types.js'
import { createLogger, childLogger } from '../../utils/logger.js'
import type { HookHandle, ProcessHook } from './process-hook.js'

const baseLogger = createLogger('command-hook')

/** How long to wait for the process to disappear after SIGKILL */
export const FORCE_STOP_WAIT_MS = 5_000

/** Lines of stderr kept for error messages */
const STDERR_TAIL_LINES = 20

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function spawnOptions(spec: HookSpec, detached: boolean): SpawnOptions {
  return {
    cwd: spec.cwd,
    env: { ...process.env, ...spec.env },
    detached,
    stdio: ['ignore', 'pipe', 'pipe'],
  }
}

function commandLine(spec: HookSpec): string {
  return [spec.command, ...spec.args].join(' ')
}

/**
 * Forward output line by line; keep the last lines of stderr. A line split
 * across chunks is reassembled before it is logged.
 */
function forwardOutput(proc: ChildProcess, log: pino.Logger, stderrTail: string[]): void {
  if (proc.stdout !== null) {
    createInterface({ input: proc.stdout, crlfDelay: Infinity }).on('line', (line: string) => {
      if (line.trim() !== '') log.debug({ stream: 'stdout' }, line)
    })
  }
  if (proc.stderr !== null) {
    createInterface({ input: proc.stderr, crlfDelay: Infinity }).on('line', (line: string) => {
      if (line.trim() === '') return
      log.debug({ stream: 'stderr' }, line)
      stderrTail.push(line)
      if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift()
    })
  }
}

/**
 * Run a command to completion. Resolves on exit code 0.
 * Kills the command and rejects with the abort reason when `signal` aborts.
 */
export function runToCompletion(
  spec: HookSpec,
  signal: AbortSignal,
  log: pino.Logger,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const stderrTail: string[] = []
    const proc = spawn(spec.command, spec.args, spawnOptions(spec, false))
    forwardOutput(proc, log, stderrTail)

    const onAbort = (): void => {
      proc.kill('SIGKILL')
      reject(signal.reason instanceof Error ? signal.reason : new HookError(`Aborted: ${commandLine(spec)}`))
    }
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })

    proc.once('error', (err: Error) => {
      signal.removeEventListener('abort', onAbort)
      reject(new HookError(`Failed to run "${commandLine(spec)}": ${err.message}`, { command: spec.command }))
    })

    proc.once('close', (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
      signal.removeEventListener('abort', onAbort)
      if (exitCode === 0) {
        resolve()
        return
      }
      const how = exitSignal !== null ? `signal ${exitSignal}` : `code ${String(exitCode ?? 1)}`
      const tail = stderrTail.length > 0 ? `: ${stderrTail.join(' | ')}` : ''
      reject(
        new HookError(`"${commandLine(spec)}" exited with ${how}${tail}`, {
          command: spec.command,
          exitCode,
        }),
      )
    })
  })
}

// ---------------------------------------------------------------------------
// CommandHook
// ---------------------------------------------------------------------------

export class CommandHook implements ProcessHook {
  private readonly _service: string
  private readonly _start: HookSpec
  private readonly _stop: HookSpec | undefined
  private readonly _log: pino.Logger

  private _proc: ChildProcess | null = null
  private _exited: Promise<void> = Promise.resolve()
  private _stopping = false
  private _oneshotDone = false
  private readonly _stderrTail: string[] = []

  constructor(service: string, start: HookSpec, stop?: HookSpec, logger?: pino.Logger) {
    this._service = service
    this._start = start
    this._stop = stop
    this._log = childLogger(logger ?? baseLogger, { service })
  }

  async start(signal: AbortSignal): Promise<HookHandle> {
    if (this._start.oneshot) {
      this._log.info({ command: this._start.command }, 'Running oneshot start command')
      await runToCompletion(this._start, signal, this._log)
      this._oneshotDone = true
      return { id: `${this._service}:oneshot` }
    }

    if (this.isAlive()) {
      throw new HookError(`Service "${this._service}" already has a running process`, {
        pid: this._proc?.pid,
      })
    }

    this._stopping = false
    this._stderrTail.length = 0
    const proc = spawn(this._start.command, this._start.args, spawnOptions(this._start, true))
    this._proc = proc
    forwardOutput(proc, this._log, this._stderrTail)

    this._exited = new Promise<void>((resolve) => {
      proc.once('exit', (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
        if (this._proc === proc) this._proc = null
        if (!this._stopping) {
          this._log.warn(
            { exitCode, signal: exitSignal, stderr: this._stderrTail.slice(-5) },
            'Service process exited unexpectedly',
          )
        }
        resolve()
      })
    })

    await new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        proc.off('spawn', onSpawn)
        proc.off('error', onError)
        signal.removeEventListener('abort', onAbort)
      }
      const onSpawn = (): void => {
        cleanup()
        resolve()
      }
      const onError = (err: Error): void => {
        cleanup()
        if (this._proc === proc) this._proc = null
        reject(
          new HookError(`Failed to launch "${commandLine(this._start)}": ${err.message}`, {
            command: this._start.command,
          }),
        )
      }
      const onAbort = (): void => {
        cleanup()
        reject(signal.reason instanceof Error ? signal.reason : new HookError('Start aborted'))
      }
      proc.once('spawn', onSpawn)
      proc.once('error', onError)
      signal.addEventListener('abort', onAbort, { once: true })
    })

    this._log.info({ pid: proc.pid }, 'Service process launched')
    return { id: `${this._service}:${String(proc.pid ?? 'unknown')}`, pid: proc.pid }
  }

  async stop(signal: AbortSignal): Promise<void> {
    this._stopping = true

    if (this._stop !== undefined) {
      this._log.info({ command: this._stop.command }, 'Running stop command')
      await runToCompletion(this._stop, signal, this._log)
    }

    if (this._start.oneshot) {
      this._oneshotDone = false
      return
    }

    const proc = this._proc
    if (proc === null || !this.isAlive()) return

    if (this._stop === undefined) {
      this._signal(proc, 'SIGTERM')
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        reject(signal.reason instanceof Error ? signal.reason : new HookError('Stop aborted'))
      }
      if (signal.aborted) {
        onAbort()
        return
      }
      signal.addEventListener('abort', onAbort, { once: true })
      this._exited.then(() => {
        signal.removeEventListener('abort', onAbort)
        resolve()
      }, reject)
    })
  }

  async forceStop(): Promise<void> {
    this._stopping = true
    this._oneshotDone = false

    const proc = this._proc
    if (proc === null || !this.isAlive()) return

    this._log.warn({ pid: proc.pid }, 'Force-stopping service process')
    this._signal(proc, 'SIGKILL')

    let timer: ReturnType<typeof setTimeout> | undefined
    const exited = await Promise.race([
      this._exited.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), FORCE_STOP_WAIT_MS)
      }),
    ])
    clearTimeout(timer)

    if (!exited) {
      throw new HookError(
        `Process ${String(proc.pid)} for service "${this._service}" did not exit after SIGKILL`,
        { pid: proc.pid },
      )
    }
  }

  isAlive(): boolean {
    if (this._start.oneshot) return this._oneshotDone
    return this._proc !== null && this._proc.exitCode === null && this._proc.signalCode === null
  }

  /** Signal the whole process group; fall back to the direct child */
  private _signal(proc: ChildProcess, sig: NodeJS.Signals): void {
    if (proc.pid !== undefined) {
      try {
        process.kill(-proc.pid, sig)
        return
      } catch (err) {
        this._log.debug({ err, pid: proc.pid, signal: sig }, 'Process group signal failed; signalling child')
      }
    }
    proc.kill(sig)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCommandHook(
  service: string,
  start: HookSpec,
  stop?: HookSpec,
  logger?: pino.Logger,
): ProcessHook {
  return new CommandHook(service, start, stop, logger)
}
