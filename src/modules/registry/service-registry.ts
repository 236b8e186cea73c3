/**
 * ServiceRegistry interface: the immutable catalogue of declared services.
 *
 * Create an instance via `loadRegistry()` from service-registry-impl.ts.
 */

import type { ServiceDefinition, ServiceName } from '../../core/types.js'
import type { PartialSupervisorSettings } from '../config/config-schema.js'

export interface ServiceRegistry {
  /** Service names in declaration order */
  readonly names: readonly ServiceName[]

  /** The declaration file's `settings:` block (empty when absent) */
  readonly settings: PartialSupervisorSettings

  /** Path of the file this registry was loaded from, if any */
  readonly source?: string

  /**
   * Return a service definition by name.
   * @throws {ServiceNotFoundError} if the name is not declared.
   */
  get(name: ServiceName): ServiceDefinition

  has(name: ServiceName): boolean

  /** All definitions in declaration order */
  list(): readonly ServiceDefinition[]

  /** Services that declare `name` as a direct dependency, in declaration order */
  dependentsOf(name: ServiceName): ServiceName[]
}
