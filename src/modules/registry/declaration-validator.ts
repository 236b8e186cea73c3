/**
 * Service declaration validator.
 *
 * Combines Zod schema validation with reference checks (duplicate names,
 * undeclared or self dependencies, repeated dependency entries) into a single
 * ValidationResult. Every problem is collected; nothing stops at the first.
 *
 * Cycles are not checked here; planning reports them as DependencyCycleError.
 */

import { DeclarationFileSchema } from './schemas.js'
import type { DeclarationFile } from './schemas.js'
import { isPlainObject } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// ValidationResult
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
  /** The validated declaration (only present when valid === true) */
  declaration?: DeclarationFile
}

// ---------------------------------------------------------------------------
// Reference checks
// ---------------------------------------------------------------------------

interface LooseServiceEntry {
  position: number
  name: string
  dependsOn: unknown[]
  probeType?: unknown
  oneshot?: unknown
}

/**
 * Pull whatever names and dependency lists can be read from an unvalidated
 * document, so reference problems are reported alongside schema problems.
 */
function looseServices(raw: unknown): LooseServiceEntry[] {
  if (!isPlainObject(raw) || !Array.isArray(raw['services'])) return []

  const entries: LooseServiceEntry[] = []
  raw['services'].forEach((item: unknown, position: number) => {
    if (!isPlainObject(item) || typeof item['name'] !== 'string') return
    const deps = item['depends_on']
    const probe = item['probe']
    const start = item['start']
    entries.push({
      position,
      name: item['name'],
      dependsOn: Array.isArray(deps) ? deps : [],
      probeType: isPlainObject(probe) ? probe['type'] : undefined,
      oneshot: isPlainObject(start) ? start['oneshot'] : undefined,
    })
  })
  return entries
}

/**
 * Return every reference violation found in the raw document.
 */
export function checkReferences(raw: unknown): string[] {
  const errors: string[] = []
  const services = looseServices(raw)

  const firstPosition = new Map<string, number>()
  for (const svc of services) {
    const seen = firstPosition.get(svc.name)
    if (seen !== undefined) {
      errors.push(
        `Duplicate service name "${svc.name}" (services[${String(seen)}] and services[${String(svc.position)}])`,
      )
    } else {
      firstPosition.set(svc.name, svc.position)
    }
  }

  for (const svc of services) {
    const listed = new Set<string>()
    for (const dep of svc.dependsOn) {
      if (typeof dep !== 'string') continue
      if (listed.has(dep)) {
        errors.push(`Service "${svc.name}" lists dependency "${dep}" more than once`)
        continue
      }
      listed.add(dep)
      if (dep === svc.name) {
        errors.push(`Service "${svc.name}" depends on itself`)
      } else if (!firstPosition.has(dep)) {
        errors.push(`Service "${svc.name}" depends on undeclared service "${dep}"`)
      }
    }

    if (svc.probeType === 'process' && svc.oneshot === true) {
      errors.push(
        `Service "${svc.name}" uses a process probe but its start hook is oneshot; use an http or tcp probe`,
      )
    }
  }

  return errors
}

// ---------------------------------------------------------------------------
// validateDeclaration
// ---------------------------------------------------------------------------

/**
 * Validate a raw (unknown) declaration object.
 *
 * Runs in order:
 *  1. Zod schema validation
 *  2. Reference checks (run even when step 1 fails)
 *  3. Timing warnings (only for schema-valid documents)
 *
 * @param raw - Raw parsed object (output of parseDeclarationFile/parseDeclarationString)
 */
export function validateDeclaration(raw: unknown): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  if (!isPlainObject(raw)) {
    errors.push('Declaration must be a mapping with "version" and "services" keys')
    return { valid: false, errors, warnings }
  }

  const parseResult = DeclarationFileSchema.safeParse(raw)
  if (!parseResult.success) {
    for (const issue of parseResult.error.issues) {
      const path = issue.path.length > 0 ? ` (at ${issue.path.join('.')})` : ''
      errors.push(`${issue.message}${path}`)
    }
  }

  errors.push(...checkReferences(raw))

  if (!parseResult.success || errors.length > 0) {
    return { valid: false, errors, warnings }
  }

  const declaration = parseResult.data
  for (const svc of declaration.services) {
    const interval = svc.probe.interval_ms ?? declaration.defaults?.probe?.interval_ms
    const timeout = svc.probe.timeout_ms ?? declaration.defaults?.probe?.timeout_ms
    if (interval !== undefined && timeout !== undefined && timeout > interval) {
      warnings.push(
        `Service "${svc.name}" has a probe timeout (${String(timeout)}ms) longer than its interval (${String(interval)}ms)`,
      )
    }
  }

  return { valid: true, errors, warnings, declaration }
}
