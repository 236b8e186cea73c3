/**
 * ProcessSupervisorImpl: state bookkeeping around a ProcessHook.
 */

import type pino from 'pino'
import {
  DependencyNotReadyError,
  HookTimeoutError,
  InvalidStateTransitionError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ServiceDefinition, ServiceName, ServiceState } from '../../core/types.js'
import { createLogger, childLogger } from '../../utils/logger.js'
import { SerialLock, toError, withTimeout } from '../../utils/helpers.js'
import type { HookHandle, ProcessHook } from './process-hook.js'
import type { ProcessSupervisor, StartOptions } from './process-supervisor.js'
import { canTransition } from './state-machine.js'

const baseLogger = createLogger('process-supervisor')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ProcessSupervisorOptions {
  definition: ServiceDefinition
  hook: ProcessHook
  eventBus: TypedEventBus
  /**
   * Names of dependencies that are not currently Running. Consulted before
   * every transition to Starting; omit for a service without a gate.
   */
  pendingDependencies?: () => ServiceName[]
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// ProcessSupervisorImpl
// ---------------------------------------------------------------------------

export class ProcessSupervisorImpl implements ProcessSupervisor {
  readonly definition: ServiceDefinition
  private readonly _hook: ProcessHook
  private readonly _eventBus: TypedEventBus
  private readonly _pendingDependencies: () => ServiceName[]
  private readonly _log: pino.Logger
  private readonly _lock = new SerialLock()

  private _state: ServiceState = 'stopped'
  private _since = new Date()
  private _handle: HookHandle | null = null
  private _lastError: string | null = null

  constructor(options: ProcessSupervisorOptions) {
    this.definition = options.definition
    this._hook = options.hook
    this._eventBus = options.eventBus
    this._pendingDependencies = options.pendingDependencies ?? (() => [])
    this._log = childLogger(options.logger ?? baseLogger, { service: options.definition.name })
  }

  get name(): ServiceName {
    return this.definition.name
  }

  get handle(): HookHandle | null {
    return this._handle
  }

  get lastError(): string | null {
    return this._lastError
  }

  get since(): Date {
    return this._since
  }

  status(): ServiceState {
    return this._state
  }

  isAlive(): boolean {
    return this._hook.isAlive()
  }

  // -------------------------------------------------------------------------
  // Public operations
  // -------------------------------------------------------------------------

  start(options: StartOptions = {}): Promise<void> {
    return this._lock.run(async () => {
      const state = this._state
      if (state === 'running') {
        this._log.debug('Start requested while running; nothing to do')
        return
      }
      if (state !== 'stopped') {
        throw new InvalidStateTransitionError(this.name, state, 'starting')
      }
      await this._launch('start requested', options.signal)
    })
  }

  stop(reason = 'stop requested'): Promise<void> {
    return this._lock.run(async () => {
      if (this._state === 'stopped') return
      const failure = await this._terminate()
      this._handle = null
      this._transition('stopped', reason)
      if (failure !== undefined) throw failure
    })
  }

  markUnhealthy(reason: string): Promise<boolean> {
    return this._lock.run(async () => {
      if (this._state !== 'running') return false
      this._transition('unhealthy', reason)
      return true
    })
  }

  markFailed(reason: string): Promise<void> {
    return this._lock.run(async () => {
      this._transition('failed', reason)
    })
  }

  restart(options: StartOptions = {}): Promise<void> {
    return this._lock.run(async () => {
      const state = this._state
      if (state === 'unhealthy') {
        this._transition('restarting', 'restart permitted by recovery policy')
        const failure = await this._terminate()
        this._handle = null
        if (failure !== undefined) {
          this._log.warn({ err: failure }, 'Stop during restart did not complete cleanly')
        }
      } else if (state !== 'stopped') {
        throw new InvalidStateTransitionError(this.name, state, 'restarting')
      }
      await this._launch('restart', options.signal)
    })
  }

  reset(): Promise<void> {
    return this._lock.run(async () => {
      if (this._state === 'stopped') return
      if (this._state !== 'failed') {
        throw new InvalidStateTransitionError(this.name, this._state, 'stopped')
      }
      const failure = await this._terminate()
      if (failure !== undefined) {
        this._log.warn({ err: failure }, 'Process cleanup during reset failed')
      }
      this._handle = null
      this._lastError = null
      this._transition('stopped', 'manual reset')
    })
  }

  // -------------------------------------------------------------------------
  // Internals (lock held)
  // -------------------------------------------------------------------------

  /**
   * From Stopped or Restarting: check dependencies, enter Starting, run the
   * start hook. Ends Running, or Stopped with the error rethrown.
   */
  private async _launch(reason: string, signal?: AbortSignal): Promise<void> {
    const pending = this._pendingDependencies()
    if (pending.length > 0) {
      const error = new DependencyNotReadyError(this.name, pending)
      this._lastError = error.message
      if (this._state !== 'stopped') this._transition('stopped', error.message)
      throw error
    }

    this._transition('starting', reason)
    const timeoutMs = this.definition.hookTimeoutMs

    try {
      this._handle = await withTimeout(
        (hookSignal) => this._hook.start(hookSignal),
        timeoutMs,
        () => new HookTimeoutError(this.name, 'start', timeoutMs),
        signal,
      )
    } catch (err) {
      const error = toError(err)
      this._lastError = error.message
      this._log.error({ err: error }, 'Start hook failed')
      await this._discardPartialStart()
      this._handle = null
      this._transition('stopped', `start failed: ${error.message}`)
      throw error
    }

    this._lastError = null
    this._transition('running', reason)
  }

  /**
   * Run the stop hook within the grace period, forcing termination when it
   * does not confirm. Returns the error to report, if forcing failed too.
   */
  private async _terminate(): Promise<Error | undefined> {
    const graceMs = this.definition.gracePeriodMs
    try {
      await withTimeout(
        (hookSignal) => this._hook.stop(hookSignal),
        graceMs,
        () => new HookTimeoutError(this.name, 'stop', graceMs),
      )
      return undefined
    } catch (err) {
      const error = toError(err)
      this._log.warn({ err: error, graceMs }, 'Stop hook did not confirm termination; forcing stop')
      try {
        await this._hook.forceStop()
        return undefined
      } catch (forceErr) {
        const forceError = toError(forceErr)
        this._lastError = forceError.message
        this._log.error({ err: forceError }, 'Forced stop failed')
        return forceError
      }
    }
  }

  /** A start hook that failed or timed out may still have left a process behind */
  private async _discardPartialStart(): Promise<void> {
    if (!this._hook.isAlive()) return
    try {
      await this._hook.forceStop()
    } catch (err) {
      this._log.error({ err }, 'Could not remove process left by failed start')
    }
  }

  private _transition(to: ServiceState, reason?: string): void {
    const from = this._state
    if (!canTransition(from, to)) {
      throw new InvalidStateTransitionError(this.name, from, to)
    }
    this._state = to
    this._since = new Date()

    const logLevel = to === 'failed' ? 'error' : to === 'unhealthy' ? 'warn' : 'info'
    this._log[logLevel]({ from, to, reason }, 'Service state changed')
    this._eventBus.emit('service:state-changed', {
      service: this.name,
      from,
      to,
      ...(reason !== undefined ? { reason } : {}),
    })
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createProcessSupervisor(options: ProcessSupervisorOptions): ProcessSupervisor {
  return new ProcessSupervisorImpl(options)
}
