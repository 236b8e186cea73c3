/**
 * ConfigSystem implementation: merges settings in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → declaration file  (`settings:` block)
 *     → environment vars  (SVCWARD_* prefixed)
 *     → CLI flag overrides
 */

import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import {
  SupervisorSettingsSchema,
  PartialSupervisorSettingsSchema,
  type SupervisorSettings,
  type PartialSupervisorSettings,
} from './config-schema.js'
import { DEFAULT_SETTINGS } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/** Map of SVCWARD_ environment variable names to setting keys */
export const ENV_VAR_MAP: Record<string, keyof SupervisorSettings> = {
  SVCWARD_LOG_LEVEL: 'log_level',
  SVCWARD_STATE_DIR: 'state_dir',
  SVCWARD_START_TIMEOUT_MS: 'start_timeout_ms',
  SVCWARD_SIGNAL_POLL_INTERVAL_MS: 'signal_poll_interval_ms',
}

/**
 * Read SVCWARD_* variables and return a validated partial settings overlay.
 * Invalid overrides are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialSupervisorSettings {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, settingKey] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue

    // Coerce to appropriate type
    if (/^\d+$/.test(rawValue)) overrides[settingKey] = parseInt(rawValue, 10)
    else overrides[settingKey] = rawValue
  }

  const parsed = PartialSupervisorSettingsSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: SupervisorSettings | null = null
  private readonly _fileSettings: PartialSupervisorSettings
  private readonly _cliOverrides: PartialSupervisorSettings
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._fileSettings = options.fileSettings ?? {}
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  load(): void {
    const layers = [this._fileSettings, readEnvOverrides(this._env), this._cliOverrides]
    const merged: Record<string, unknown> = { ...DEFAULT_SETTINGS }
    for (const layer of layers) {
      for (const [key, value] of Object.entries(layer)) {
        // Unset CLI flags arrive as explicit undefined
        if (value !== undefined) merged[key] = value
      }
    }

    const result = SupervisorSettingsSchema.safeParse(merged)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
        .join('\n')
      throw new ConfigError(`Settings validation failed:\n${issues}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ settings: this._config }, 'Settings loaded')
  }

  getConfig(): SupervisorSettings {
    if (this._config === null) {
      throw new ConfigError('Settings have not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    const config = this.getConfig()
    return Object.entries(config).find(([k]) => k === key)?.[1]
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}

/**
 * Convenience wrapper: build, load and return merged settings in one call.
 */
export function resolveSettings(options: ConfigSystemOptions = {}): SupervisorSettings {
  const system = createConfigSystem(options)
  system.load()
  return system.getConfig()
}
