/**
 * plan-formatter.ts: Human-readable and JSON views of a startup plan.
 *
 * Used by `svcward plan`. Hook environments are masked before display.
 */

import type { HookSpec, ProbeTarget, ServiceDefinition } from '../../core/types.js'
import { formatDuration } from '../../utils/helpers.js'
import { maskEnv } from '../utils/masking.js'

// ---------------------------------------------------------------------------
// JSON shape
// ---------------------------------------------------------------------------

export interface PlanEntry {
  position: number
  name: string
  dependsOn: string[]
  start: { command: string; args: string[]; env: Record<string, string>; oneshot: boolean }
  stop: { command: string; args: string[]; env: Record<string, string> } | null
  probe: ProbeTarget
  probeIntervalMs: number
  restart: { maxAttempts: number; windowMs: number; backoffMs: number }
}

export function toPlanEntries(plan: readonly ServiceDefinition[]): PlanEntry[] {
  return plan.map((service, i) => ({
    position: i + 1,
    name: service.name,
    dependsOn: [...service.dependsOn],
    start: {
      command: service.start.command,
      args: [...service.start.args],
      env: maskEnv({ ...service.start.env }),
      oneshot: service.start.oneshot,
    },
    stop:
      service.stop !== undefined
        ? {
            command: service.stop.command,
            args: [...service.stop.args],
            env: maskEnv({ ...service.stop.env }),
          }
        : null,
    probe: service.probe,
    probeIntervalMs: service.probeIntervalMs,
    restart: { ...service.restart },
  }))
}

// ---------------------------------------------------------------------------
// Human output
// ---------------------------------------------------------------------------

function commandLine(hook: HookSpec): string {
  return [hook.command, ...hook.args].join(' ')
}

export function describeProbe(probe: ProbeTarget): string {
  switch (probe.type) {
    case 'http':
      return `http ${probe.method} ${probe.url}` +
        (probe.expectStatus !== undefined ? ` expect ${String(probe.expectStatus)}` : '')
    case 'tcp':
      return `tcp ${probe.host}:${String(probe.port)}`
    case 'process':
      return 'process'
  }
}

/**
 * Render the plan as numbered entries, one block per service:
 *
 *   1. storage
 *      start:   ./bin/storage --port 9000
 *      env:     ACCESS_KEY=***
 *      probe:   tcp 127.0.0.1:9000 every 5.0s
 *      restart: 3 in 5m 0s, backoff 1.0s
 */
export function renderPlan(plan: readonly ServiceDefinition[]): string {
  if (plan.length === 0) return 'No services declared.'

  const lines: string[] = [`Startup plan (${String(plan.length)} services):`, '']
  plan.forEach((service, i) => {
    lines.push(`${String(i + 1)}. ${service.name}`)
    if (service.dependsOn.length > 0) {
      lines.push(`   after:   ${service.dependsOn.join(', ')}`)
    }
    lines.push(`   start:   ${commandLine(service.start)}${service.start.oneshot ? ' (oneshot)' : ''}`)
    const env = Object.entries(maskEnv({ ...service.start.env }))
    if (env.length > 0) {
      lines.push(`   env:     ${env.map(([k, v]) => `${k}=${v}`).join(' ')}`)
    }
    if (service.stop !== undefined) {
      lines.push(`   stop:    ${commandLine(service.stop)}`)
    }
    lines.push(`   probe:   ${describeProbe(service.probe)} every ${formatDuration(service.probeIntervalMs)}`)
    const { maxAttempts, windowMs, backoffMs } = service.restart
    lines.push(
      `   restart: ${String(maxAttempts)} in ${formatDuration(windowMs)}` +
        (backoffMs > 0 ? `, backoff ${formatDuration(backoffMs)}` : ''),
    )
  })
  return lines.join('\n')
}
