/**
 * StateRecorder: mirrors supervisor events into the state database so that
 * separate CLI processes (`status`, `health`) can read them.
 *
 * Subscriptions:
 *  - service:state-changed → service_states.state (restart_count on Restarting)
 *  - service:probed        → last probe columns and failure_count
 *  - service:recovery-decision → failure_count including the probe just judged
 *  - service:failed        → open a restart-limit alert
 *  - service:reset         → clear alerts, zero failure_count
 *
 * Write failures are logged; they never propagate into the emitting module.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type pino from 'pino'
import type { Component } from '../core/di.js'
import type { TypedEventBus } from '../core/event-bus.js'
import type { SupervisorEvents } from '../core/event-bus.types.js'
import type { ServiceDefinition, ServiceName } from '../core/types.js'
import { createLogger } from '../utils/logger.js'
import { clearAlerts, raiseAlert } from './queries/alerts.js'
import {
  incrementRestartCount,
  recordProbe,
  seedServiceStates,
  setFailureCount,
  setLastError,
  updateServiceState,
} from './queries/service-states.js'

const baseLogger = createLogger('persistence:state-recorder')

export const RESTART_LIMIT_ALERT = 'restart_limit_exceeded'

export interface StateRecorderOptions {
  db: () => BetterSqlite3Database
  eventBus: TypedEventBus
  services: readonly ServiceDefinition[]
  /** Current failure-window size for a service */
  failureCount: (name: ServiceName) => number
  /** Last hook error reported by a service's supervisor */
  lastError: (name: ServiceName) => string | null
  logger?: pino.Logger
}

type Handler<K extends keyof SupervisorEvents> = (payload: SupervisorEvents[K]) => void

export class StateRecorder implements Component {
  private readonly _options: StateRecorderOptions
  private readonly _log: pino.Logger
  private _subscribed = false

  private readonly _onStateChanged: Handler<'service:state-changed'> = (e) => {
    this._write('service:state-changed', (db) => {
      updateServiceState(db, e.service, e.to)
      if (e.to === 'restarting') incrementRestartCount(db, e.service)
      if (e.to === 'stopped' || e.to === 'running') {
        setLastError(db, e.service, this._options.lastError(e.service))
      }
    })
  }

  private readonly _onProbed: Handler<'service:probed'> = (e) => {
    this._write('service:probed', (db) => {
      recordProbe(db, e.service, e.result, this._options.failureCount(e.service))
    })
  }

  private readonly _onDecision: Handler<'service:recovery-decision'> = (e) => {
    this._write('service:recovery-decision', (db) => {
      setFailureCount(db, e.service, e.failures)
    })
  }

  private readonly _onFailed: Handler<'service:failed'> = (e) => {
    this._write('service:failed', (db) => {
      raiseAlert(db, { service: e.service, kind: RESTART_LIMIT_ALERT, message: e.message })
      setFailureCount(db, e.service, e.failures)
    })
  }

  private readonly _onReset: Handler<'service:reset'> = (e) => {
    this._write('service:reset', (db) => {
      clearAlerts(db, e.service)
      setFailureCount(db, e.service, 0)
    })
  }

  constructor(options: StateRecorderOptions) {
    this._options = options
    this._log = options.logger ?? baseLogger
  }

  async initialize(): Promise<void> {
    if (this._subscribed) return
    seedServiceStates(this._options.db(), this._options.services)
    const bus = this._options.eventBus
    bus.on('service:state-changed', this._onStateChanged)
    bus.on('service:probed', this._onProbed)
    bus.on('service:recovery-decision', this._onDecision)
    bus.on('service:failed', this._onFailed)
    bus.on('service:reset', this._onReset)
    this._subscribed = true
  }

  async shutdown(): Promise<void> {
    if (!this._subscribed) return
    const bus = this._options.eventBus
    bus.off('service:state-changed', this._onStateChanged)
    bus.off('service:probed', this._onProbed)
    bus.off('service:recovery-decision', this._onDecision)
    bus.off('service:failed', this._onFailed)
    bus.off('service:reset', this._onReset)
    this._subscribed = false
  }

  private _write(event: keyof SupervisorEvents, fn: (db: BetterSqlite3Database) => void): void {
    try {
      fn(this._options.db())
    } catch (err) {
      this._log.error({ err, event }, 'Failed to record event in state database')
    }
  }
}

export function createStateRecorder(options: StateRecorderOptions): StateRecorder {
  return new StateRecorder(options)
}
