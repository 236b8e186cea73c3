/**
 * HealthProbeImpl: HTTP, TCP and process liveness checks on Node's own
 * http/https/net modules.
 */

import { request as httpRequest } from 'node:http'
import type { IncomingMessage } from 'node:http'
import { request as httpsRequest } from 'node:https'
import { createConnection } from 'node:net'
import type {
  HttpProbeTarget,
  ProbeResult,
  ProbeStatus,
  ProbeTarget,
  TcpProbeTarget,
} from '../../core/types.js'
import type { HealthProbe, ProbeContext } from './health-probe.js'

// ---------------------------------------------------------------------------
// Result helpers
// ---------------------------------------------------------------------------

function result(
  status: ProbeStatus,
  startedAt: number,
  message?: string,
  httpStatus?: number,
): ProbeResult {
  return Object.freeze({
    status,
    timestamp: new Date(),
    latencyMs: Date.now() - startedAt,
    ...(message !== undefined ? { message } : {}),
    ...(httpStatus !== undefined ? { httpStatus } : {}),
  })
}

function isAccepted(target: HttpProbeTarget, statusCode: number): boolean {
  if (target.expectStatus !== undefined) return statusCode === target.expectStatus
  return statusCode >= 200 && statusCode < 300
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function checkHttp(target: HttpProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
  const startedAt = Date.now()

  return new Promise<ProbeResult>((resolve) => {
    let settled = false
    const finish = (value: ProbeResult): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      resolve(value)
    }

    let url: URL
    try {
      url = new URL(target.url)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      resolve(result('probe_error', startedAt, `invalid probe URL: ${message}`))
      return
    }

    const send = url.protocol === 'https:' ? httpsRequest : httpRequest
    const req = send(url, { method: target.method, headers: { connection: 'close' } })

    const timer = setTimeout(() => {
      finish(result('probe_error', startedAt, `timed out after ${String(target.timeoutMs)}ms`))
      req.destroy()
    }, target.timeoutMs)

    const onAbort = (): void => {
      finish(result('probe_error', startedAt, 'probe cancelled'))
      req.destroy()
    }
    if (signal?.aborted === true) {
      onAbort()
      return
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    req.on('response', (res: IncomingMessage) => {
      const statusCode = res.statusCode ?? 0
      if (isAccepted(target, statusCode)) {
        finish(result('healthy', startedAt, undefined, statusCode))
      } else {
        finish(result('unhealthy', startedAt, `HTTP ${String(statusCode)}`, statusCode))
      }
      // The status decides; the body is never read, and a body that never
      // ends must not keep the socket open
      res.destroy()
    })

    req.on('error', (err: Error) => {
      finish(result('probe_error', startedAt, err.message))
    })

    req.end()
  })
}

function checkTcp(target: TcpProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
  const startedAt = Date.now()

  return new Promise<ProbeResult>((resolve) => {
    const socket = createConnection({ host: target.host, port: target.port })
    let settled = false

    const finish = (value: ProbeResult): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      socket.destroy()
      resolve(value)
    }

    const timer = setTimeout(() => {
      finish(result('probe_error', startedAt, `timed out after ${String(target.timeoutMs)}ms`))
    }, target.timeoutMs)

    const onAbort = (): void => {
      finish(result('probe_error', startedAt, 'probe cancelled'))
    }
    if (signal?.aborted === true) {
      onAbort()
      return
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    socket.once('connect', () => finish(result('healthy', startedAt)))
    socket.once('error', (err: Error) => finish(result('probe_error', startedAt, err.message)))
  })
}

function checkProcess(context: ProbeContext): ProbeResult {
  const startedAt = Date.now()
  if (context.isAlive === undefined) {
    return result('probe_error', startedAt, 'no process handle to inspect')
  }
  return context.isAlive()
    ? result('healthy', startedAt)
    : result('probe_error', startedAt, 'process not running')
}

// ---------------------------------------------------------------------------
// HealthProbeImpl
// ---------------------------------------------------------------------------

export class HealthProbeImpl implements HealthProbe {
  async check(target: ProbeTarget, context: ProbeContext = {}): Promise<ProbeResult> {
    switch (target.type) {
      case 'http':
        return checkHttp(target, context.signal)
      case 'tcp':
        return checkTcp(target, context.signal)
      case 'process':
        return checkProcess(context)
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createHealthProbe(): HealthProbe {
  return new HealthProbeImpl()
}
