/**
 * Built-in default values.
 *
 * Settings defaults are overridden by: declaration file → env vars → CLI flags.
 * Per-service defaults are overridden by the file's `defaults:` block, then by
 * each service entry.
 */

import type { SupervisorSettings } from './config-schema.js'

export const DEFAULT_SETTINGS: SupervisorSettings = {
  log_level: 'info',
  state_dir: '.svcward',
  start_timeout_ms: 60_000,
  signal_poll_interval_ms: 1_000,
}

/** Per-service values used when neither the service nor `defaults:` sets them */
export const DEFAULT_SERVICE_VALUES = {
  probe: {
    interval_ms: 30_000,
    timeout_ms: 10_000,
  },
  restart: {
    max_attempts: 3,
    window_ms: 300_000,
    backoff_ms: 5_000,
  },
  grace_period_ms: 10_000,
  hook_timeout_ms: 60_000,
} as const

/** Declaration file names looked up in the project root, in order */
export const DEFAULT_CONFIG_FILENAMES = ['svcward.yaml', 'svcward.yml', 'svcward.json'] as const

/** Name of the SQLite database inside the state directory */
export const STATE_DB_FILENAME = 'state.db'
