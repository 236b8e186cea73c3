/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  resolveSettings,
  readEnvOverrides,
  ENV_VAR_MAP,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  LogLevelSchema,
  SupervisorSettingsSchema,
  PartialSupervisorSettingsSchema,
} from './config-schema.js'
export type { SupervisorSettings, PartialSupervisorSettings } from './config-schema.js'
export {
  DEFAULT_SETTINGS,
  DEFAULT_SERVICE_VALUES,
  DEFAULT_CONFIG_FILENAMES,
  STATE_DB_FILENAME,
} from './defaults.js'
