/**
 * ServiceRegistry implementation and loader.
 *
 * loadRegistry() is pure: it reads and validates the declaration, resolves
 * per-service defaults, and returns frozen definitions. No process is touched.
 */

import { resolve } from 'node:path'
import { ConfigValidationError, ServiceNotFoundError } from '../../core/errors.js'
import type {
  HookSpec,
  ProbeTarget,
  ServiceDefinition,
  ServiceName,
} from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { DEFAULT_SERVICE_VALUES } from '../config/defaults.js'
import type { PartialSupervisorSettings } from '../config/config-schema.js'
import { parseDeclarationFile } from './declaration-parser.js'
import { validateDeclaration } from './declaration-validator.js'
import type {
  DeclarationFile,
  RawHookSpec,
  RawServiceDefaults,
  RawServiceEntry,
} from './schemas.js'
import type { ServiceRegistry } from './service-registry.js'

const logger = createLogger('registry')

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function toHookSpec(raw: RawHookSpec): HookSpec {
  return Object.freeze({
    command: raw.command,
    args: Object.freeze([...raw.args]),
    env: Object.freeze({ ...raw.env }),
    ...(raw.cwd !== undefined ? { cwd: raw.cwd } : {}),
    oneshot: raw.oneshot,
  })
}

function toProbeTarget(entry: RawServiceEntry, defaults: RawServiceDefaults): ProbeTarget {
  const probe = entry.probe
  const timeoutMs =
    probe.timeout_ms ?? defaults.probe?.timeout_ms ?? DEFAULT_SERVICE_VALUES.probe.timeout_ms

  switch (probe.type) {
    case 'http':
      return {
        type: 'http',
        url: probe.url,
        method: probe.method,
        timeoutMs,
        ...(probe.expect_status !== undefined ? { expectStatus: probe.expect_status } : {}),
      }
    case 'tcp':
      return { type: 'tcp', host: probe.host, port: probe.port, timeoutMs }
    case 'process':
      return { type: 'process', timeoutMs }
  }
}

/**
 * Turn one validated entry into a frozen ServiceDefinition, applying
 * file-wide defaults and then built-in defaults.
 */
export function resolveDefinition(
  entry: RawServiceEntry,
  index: number,
  defaults: RawServiceDefaults = {},
): ServiceDefinition {
  const builtIn = DEFAULT_SERVICE_VALUES
  const definition: ServiceDefinition = {
    name: entry.name,
    ...(entry.description !== undefined ? { description: entry.description } : {}),
    index,
    dependsOn: Object.freeze([...entry.depends_on]),
    start: toHookSpec(entry.start),
    ...(entry.stop !== undefined ? { stop: toHookSpec(entry.stop) } : {}),
    probe: Object.freeze(toProbeTarget(entry, defaults)),
    probeIntervalMs:
      entry.probe.interval_ms ?? defaults.probe?.interval_ms ?? builtIn.probe.interval_ms,
    restart: Object.freeze({
      maxAttempts:
        entry.restart?.max_attempts ?? defaults.restart?.max_attempts ?? builtIn.restart.max_attempts,
      windowMs: entry.restart?.window_ms ?? defaults.restart?.window_ms ?? builtIn.restart.window_ms,
      backoffMs:
        entry.restart?.backoff_ms ?? defaults.restart?.backoff_ms ?? builtIn.restart.backoff_ms,
    }),
    gracePeriodMs: entry.grace_period_ms ?? defaults.grace_period_ms ?? builtIn.grace_period_ms,
    hookTimeoutMs: entry.hook_timeout_ms ?? defaults.hook_timeout_ms ?? builtIn.hook_timeout_ms,
  }
  return Object.freeze(definition)
}

// ---------------------------------------------------------------------------
// ServiceRegistryImpl
// ---------------------------------------------------------------------------

export class ServiceRegistryImpl implements ServiceRegistry {
  private readonly _definitions: Map<ServiceName, ServiceDefinition>
  private readonly _ordered: readonly ServiceDefinition[]
  readonly names: readonly ServiceName[]
  readonly settings: PartialSupervisorSettings
  readonly source?: string

  constructor(
    definitions: ServiceDefinition[],
    settings: PartialSupervisorSettings = {},
    source?: string,
  ) {
    const ordered = [...definitions].sort((a, b) => a.index - b.index)
    this._ordered = Object.freeze(ordered)
    this._definitions = new Map(ordered.map((d) => [d.name, d]))
    this.names = Object.freeze(ordered.map((d) => d.name))
    this.settings = Object.freeze({ ...settings })
    if (source !== undefined) this.source = source
  }

  get(name: ServiceName): ServiceDefinition {
    const definition = this._definitions.get(name)
    if (definition === undefined) {
      throw new ServiceNotFoundError(name)
    }
    return definition
  }

  has(name: ServiceName): boolean {
    return this._definitions.has(name)
  }

  list(): readonly ServiceDefinition[] {
    return this._ordered
  }

  dependentsOf(name: ServiceName): ServiceName[] {
    return this._ordered.filter((d) => d.dependsOn.includes(name)).map((d) => d.name)
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Build a registry from an already-validated declaration.
 */
export function createRegistry(declaration: DeclarationFile, source?: string): ServiceRegistry {
  const defaults = declaration.defaults ?? {}
  const definitions = declaration.services.map((entry, index) =>
    resolveDefinition(entry, index, defaults),
  )
  return new ServiceRegistryImpl(definitions, declaration.settings ?? {}, source)
}

/**
 * Load, validate and resolve a service declaration.
 *
 * @param source - Path to a YAML/JSON file, or an already-parsed document
 * @throws {ConfigParseError} if the file cannot be read or parsed
 * @throws {ConfigValidationError} listing every violation found
 */
export function loadRegistry(source: string | Record<string, unknown>): ServiceRegistry {
  const filePath = typeof source === 'string' ? resolve(source) : undefined
  const raw: unknown = filePath !== undefined ? parseDeclarationFile(filePath) : source

  const result = validateDeclaration(raw)
  for (const warning of result.warnings) {
    logger.warn({ source: filePath }, warning)
  }

  if (!result.valid || result.declaration === undefined) {
    throw new ConfigValidationError(result.errors, filePath !== undefined ? { filePath } : {})
  }

  const registry = createRegistry(result.declaration, filePath)
  logger.debug({ services: registry.names, source: filePath }, 'Service registry loaded')
  return registry
}
