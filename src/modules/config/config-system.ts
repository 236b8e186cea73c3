/**
 * ConfigSystem interface: public contract for settings resolution.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { SupervisorSettings, PartialSupervisorSettings } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** The `settings:` block of the declaration file, if any */
  fileSettings?: PartialSupervisorSettings
  /** Values from CLI flags; override everything else */
  cliOverrides?: PartialSupervisorSettings
  /** Environment to read SVCWARD_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to merged, validated settings.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < declaration file < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Merge and validate settings from every source.
   * @throws {ConfigError} if the merged settings are invalid.
   */
  load(): void

  /**
   * Return the merged settings.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): SupervisorSettings

  /** Return a single setting by key, or undefined if unknown */
  get(key: string): unknown

  readonly isLoaded: boolean
}
