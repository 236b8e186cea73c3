/**
 * Temporary project directories for tests that load a real declaration and
 * state database.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openStateDatabase } from '../persistence/database.js'

export interface ServiceEntry {
  name: string
  depends_on?: string[]
}

/** Three services where model-a needs both others */
export const STACK: ServiceEntry[] = [
  { name: 'storage' },
  { name: 'gpu' },
  { name: 'model-a', depends_on: ['storage', 'gpu'] },
]

/**
 * A declaration with fast timings. Each service gets an HTTP probe on
 * `<name>.test`, which FakeProbe scripts by hostname.
 */
export function serviceDeclaration(services: ServiceEntry[] = STACK): Record<string, unknown> {
  return {
    version: '1',
    settings: { signal_poll_interval_ms: 10, start_timeout_ms: 500 },
    defaults: {
      probe: { interval_ms: 10, timeout_ms: 50 },
      restart: { max_attempts: 3, window_ms: 300_000, backoff_ms: 0 },
      grace_period_ms: 50,
      hook_timeout_ms: 200,
    },
    services: services.map((s) => ({
      ...s,
      start: { command: `${s.name}-start` },
      probe: { type: 'http', url: `http://${s.name}.test/health` },
    })),
  }
}

export class TempProject {
  readonly dir: string

  constructor(prefix = 'svcward-project-') {
    this.dir = mkdtempSync(join(tmpdir(), prefix))
  }

  /** Default state.db location */
  get databasePath(): string {
    return join(this.dir, '.svcward', 'state.db')
  }

  writeDeclaration(services: ServiceEntry[] = STACK, file = 'svcward.json'): string {
    const path = join(this.dir, file)
    writeFileSync(path, JSON.stringify(serviceDeclaration(services)))
    return path
  }

  writeFile(file: string, content: string): string {
    const path = join(this.dir, file)
    writeFileSync(path, content)
    return path
  }

  withDb<T>(fn: (db: BetterSqlite3Database) => T): T {
    const wrapper = openStateDatabase(this.databasePath)
    try {
      return fn(wrapper.db)
    } finally {
      wrapper.close()
    }
  }

  remove(): void {
    rmSync(this.dir, { recursive: true, force: true })
  }
}
