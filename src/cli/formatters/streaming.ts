/**
 * StreamingFormatter: NDJSON event emitter for svcward commands.
 *
 * Each JSON line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 * In human mode the same supervisor events are rendered as one line each.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { SupervisorEvents } from '../../core/event-bus.types.js'
import { formatDuration } from '../../utils/helpers.js'
import type { StatusSnapshot } from '../types/status.js'

export type OutputFormat = 'human' | 'json'

/** Anything other than "json" means human output */
export function parseOutputFormat(value: string | undefined): OutputFormat {
  return value === 'json' ? 'json' : 'human'
}

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "status:snapshot", "service:state-changed")
 * @param data  - Event payload data
 */
export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

export function emitStatusSnapshot(snapshot: StatusSnapshot): void {
  emitEvent('status:snapshot', snapshot)
}

// ---------------------------------------------------------------------------
// Supervisor event rendering
// ---------------------------------------------------------------------------

/** Events relayed to the terminal while `svcward start` runs */
export type StreamedEvent =
  | 'plan:computed'
  | 'service:state-changed'
  | 'service:recovery-decision'
  | 'service:failed'
  | 'service:reset'
  | 'startup:complete'
  | 'startup:failed'
  | 'shutdown:complete'

type Renderer<K extends StreamedEvent> = (payload: SupervisorEvents[K]) => string

export const HUMAN_RENDERERS: { [K in StreamedEvent]: Renderer<K> } = {
  'plan:computed': ({ order }) => `Startup plan: ${order.join(' → ')}`,
  'service:state-changed': ({ service, from, to, reason }) =>
    `[${service}] ${from} → ${to}${reason !== undefined ? ` (${reason})` : ''}`,
  'service:recovery-decision': ({ service, action, failures }) => {
    const outcome =
      action === 'restart' ? 'restarting' : action === 'mark_failed' ? 'restart limit exceeded' : 'no action'
    return `[${service}] failure ${String(failures)} in window: ${outcome}`
  },
  'service:failed': ({ service, message }) => `[${service}] FAILED: ${message}`,
  'service:reset': ({ service }) => `[${service}] failure history cleared`,
  'startup:complete': ({ order, durationMs }) =>
    `All ${String(order.length)} services running (${formatDuration(durationMs)})`,
  'startup:failed': ({ service, error, rolledBack }) =>
    `Startup failed at ${service}: ${error}` +
    (rolledBack.length > 0 ? `; rolled back ${rolledBack.join(', ')}` : ''),
  'shutdown:complete': ({ stopped, errors }) =>
    `Stopped ${String(stopped.length)} service(s)` +
    (errors.length > 0 ? `; errors: ${errors.map((e) => `${e.service}: ${e.error}`).join('; ')}` : ''),
}

function relay<K extends StreamedEvent>(
  bus: TypedEventBus,
  event: K,
  format: OutputFormat,
): () => void {
  const render: Renderer<K> = HUMAN_RENDERERS[event]
  const handler = (payload: SupervisorEvents[K]): void => {
    if (format === 'json') emitEvent(event, payload)
    else process.stdout.write(render(payload) + '\n')
  }
  bus.on(event, handler)
  return () => bus.off(event, handler)
}

/**
 * Relay supervisor events to stdout until the returned function is called.
 */
export function streamSupervisorEvents(bus: TypedEventBus, format: OutputFormat): () => void {
  const events: StreamedEvent[] = [
    'plan:computed',
    'service:state-changed',
    'service:recovery-decision',
    'service:failed',
    'service:reset',
    'startup:complete',
    'startup:failed',
    'shutdown:complete',
  ]
  const unsubscribers = events.map((event) => relay(bus, event, format))
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe()
  }
}
