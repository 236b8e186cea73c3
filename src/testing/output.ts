/**
 * Capture process.stdout / process.stderr writes in CLI tests.
 */

import { vi } from 'vitest'

export interface CapturedOutput {
  stdout(): string
  stderr(): string
  /** stdout parsed as NDJSON events */
  events(): Array<{ event: string; timestamp: string; data: unknown }>
}

/**
 * Replace both streams' write with a recorder until vi.restoreAllMocks().
 */
export function captureOutput(): CapturedOutput {
  let out = ''
  let err = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    out += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    err += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  return {
    stdout: () => out,
    stderr: () => err,
    events: () =>
      out
        .split('\n')
        .filter((line) => line.trim() !== '')
        .map((line): { event: string; timestamp: string; data: unknown } => {
          const parsed: unknown = JSON.parse(line)
          if (
            typeof parsed !== 'object' ||
            parsed === null ||
            !('event' in parsed) ||
            typeof parsed.event !== 'string' ||
            !('timestamp' in parsed) ||
            typeof parsed.timestamp !== 'string'
          ) {
            throw new Error(`Not an NDJSON event: ${line}`)
          }
          return { event: parsed.event, timestamp: parsed.timestamp, data: 'data' in parsed ? parsed.data : undefined }
        }),
  }
}
