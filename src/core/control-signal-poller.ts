/**
 * ControlSignalPoller: reads the control_signals queue on an interval and
 * hands each claimed signal to the supervisor.
 *
 * CLI commands run in separate processes; the queue in the state database is
 * the only channel between them and the foreground supervisor.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type pino from 'pino'
import {
  claimPendingSignals,
  discardPendingSignals,
  type ControlSignal,
} from '../persistence/queries/control-signals.js'
import { createLogger } from '../utils/logger.js'
import type { Component } from './di.js'

const baseLogger = createLogger('control-signals')

export type ControlSignalHandler = (signal: ControlSignal) => Promise<void>

export interface ControlSignalPollerOptions {
  db: () => BetterSqlite3Database
  intervalMs: number
  handler: ControlSignalHandler
  logger?: pino.Logger
}

export class ControlSignalPoller implements Component {
  private readonly _options: ControlSignalPollerOptions
  private readonly _log: pino.Logger
  private _timer: ReturnType<typeof setInterval> | null = null
  private _inFlight: Promise<void> | null = null

  constructor(options: ControlSignalPollerOptions) {
    this._options = options
    this._log = options.logger ?? baseLogger
  }

  /**
   * Drop signals queued for a previous run, then start polling.
   */
  async initialize(): Promise<void> {
    if (this._timer !== null) return
    const discarded = discardPendingSignals(this._options.db())
    if (discarded > 0) {
      this._log.warn({ discarded }, 'Discarded control signals left from a previous run')
    }
    this._timer = setInterval(() => {
      void this.poll()
    }, this._options.intervalMs)
  }

  async shutdown(): Promise<void> {
    if (this._timer !== null) {
      clearInterval(this._timer)
      this._timer = null
    }
    if (this._inFlight !== null) await this._inFlight
  }

  /**
   * Claim and dispatch pending signals. Overlapping calls share one pass.
   * Never rejects: handler and database errors are logged.
   */
  poll(): Promise<void> {
    if (this._inFlight !== null) return this._inFlight
    this._inFlight = this._drain().finally(() => {
      this._inFlight = null
    })
    return this._inFlight
  }

  private async _drain(): Promise<void> {
    let signals: ControlSignal[]
    try {
      signals = claimPendingSignals(this._options.db())
    } catch (err) {
      this._log.warn({ err }, 'Control signal poll failed; retrying next interval')
      return
    }

    for (const signal of signals) {
      this._log.info({ signal: signal.signal, service: signal.service, id: signal.id }, 'Control signal received')
      try {
        await this._options.handler(signal)
      } catch (err) {
        this._log.error({ err, signal: signal.signal, service: signal.service }, 'Control signal failed')
      }
    }
  }
}

export function createControlSignalPoller(options: ControlSignalPollerOptions): ControlSignalPoller {
  return new ControlSignalPoller(options)
}
