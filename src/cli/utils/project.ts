/**
 * Shared setup for commands that talk to a supervisor through the state
 * directory: locate and validate the declaration, resolve settings, and
 * open state.db when it exists.
 */

import { existsSync } from 'node:fs'
import { resolveDatabasePath } from '../../core/supervisor-impl.js'
import { resolveSettings } from '../../modules/config/config-system-impl.js'
import type { SupervisorSettings } from '../../modules/config/config-schema.js'
import { resolveDeclarationPath } from '../../modules/registry/declaration-parser.js'
import { loadRegistry } from '../../modules/registry/service-registry-impl.js'
import type { ServiceRegistry } from '../../modules/registry/service-registry.js'
import { openStateDatabase, type DatabaseWrapper } from '../../persistence/database.js'

export interface ProjectOptions {
  projectRoot: string
  configPath?: string
  env?: NodeJS.ProcessEnv
}

export interface ProjectContext {
  configPath: string
  registry: ServiceRegistry
  settings: SupervisorSettings
  databasePath: string
}

/**
 * @throws {ConfigParseError} / {ConfigValidationError} / {ConfigError}
 */
export function loadProjectContext(options: ProjectOptions): ProjectContext {
  const configPath = resolveDeclarationPath(options.projectRoot, options.configPath)
  const registry = loadRegistry(configPath)
  const settings = resolveSettings({
    fileSettings: registry.settings,
    ...(options.env !== undefined ? { env: options.env } : {}),
  })
  return {
    configPath,
    registry,
    settings,
    databasePath: resolveDatabasePath(options.projectRoot, settings),
  }
}

/**
 * Open state.db if a supervisor has ever run here; null otherwise. The
 * caller closes the wrapper.
 */
export function openExistingStateDatabase(databasePath: string): DatabaseWrapper | null {
  if (!existsSync(databasePath)) return null
  return openStateDatabase(databasePath)
}
