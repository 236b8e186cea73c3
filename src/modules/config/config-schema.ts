/**
 * Zod validation schemas for svcward's global settings.
 *
 * Settings sit under the `settings:` key of the declaration file and may be
 * overridden by SVCWARD_* environment variables and CLI flags.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])

export const SupervisorSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory (relative to the project root) holding state.db */
    state_dir: z.string().min(1, 'state_dir must not be empty'),
    /** Bound on waiting for a dependency to reach Running during startup */
    start_timeout_ms: z.number().int().positive(),
    /** How often the running supervisor reads queued control signals */
    signal_poll_interval_ms: z.number().int().positive(),
  })
  .strict()

export type SupervisorSettings = z.infer<typeof SupervisorSettingsSchema>

export const PartialSupervisorSettingsSchema = SupervisorSettingsSchema.partial()

export type PartialSupervisorSettings = z.infer<typeof PartialSupervisorSettingsSchema>
