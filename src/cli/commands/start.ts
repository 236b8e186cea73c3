/**
 * `svcward start` command
 *
 * Runs the supervisor in the foreground: starts every declared service in
 * dependency order, supervises them until stopped (Ctrl-C, SIGTERM or
 * `svcward stop`), then stops them in reverse order.
 *
 * Usage:
 *   svcward start
 *   svcward start --config stack.yaml --log-level debug
 *   svcward start --state-dir /var/lib/svcward --start-timeout-ms 120000
 *   svcward start --output-format json
 *
 * Exit codes:
 *   0   - Clean stop
 *   1   - Unexpected error, or a service failed to stop
 *   2   - Declaration or settings error
 *   3   - Dependency cycle
 *   4   - A service failed to start (started services were rolled back)
 *   5   - Another supervisor is already running here
 *   130 - Interrupted during startup
 */

import type { Command } from 'commander'
import { ConfigError, StartFailure } from '../../core/errors.js'
import { createSupervisor } from '../../core/supervisor-impl.js'
import type { Supervisor, SupervisorConfig } from '../../core/supervisor.js'
import {
  PartialSupervisorSettingsSchema,
  type PartialSupervisorSettings,
} from '../../modules/config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_ERROR,
  EXIT_INTERRUPTED,
  EXIT_SUCCESS,
  exitCodeFor,
} from '../utils/exit-codes.js'
import { reportError } from '../utils/report-error.js'
import { parseOutputFormat, streamSupervisorEvents, type OutputFormat } from '../formatters/streaming.js'

const logger = createLogger('start-cmd')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StartActionOptions {
  projectRoot: string
  configPath?: string
  logLevel?: string
  stateDir?: string
  startTimeoutMs?: string
  outputFormat: OutputFormat
  /** Extra supervisor wiring (hooks, probe, signal handling) */
  supervisor?: Omit<SupervisorConfig, 'projectRoot' | 'configPath' | 'cliOverrides'>
}

/**
 * Validate the settings given as flags.
 * @throws {ConfigError}
 */
export function parseCliOverrides(options: {
  logLevel?: string
  stateDir?: string
  startTimeoutMs?: string
}): PartialSupervisorSettings {
  const raw: Record<string, unknown> = {}
  if (options.logLevel !== undefined) raw.log_level = options.logLevel
  if (options.stateDir !== undefined) raw.state_dir = options.stateDir
  if (options.startTimeoutMs !== undefined) raw.start_timeout_ms = Number(options.startTimeoutMs)

  const result = PartialSupervisorSettingsSchema.safeParse(raw)
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `--${String(issue.path[0] ?? '').replace(/_/g, '-')}: ${issue.message}`,
    )
    throw new ConfigError(`Invalid command-line settings: ${problems.join('; ')}`, { problems })
  }
  return result.data
}

// ---------------------------------------------------------------------------
// runStartAction: testable core logic
// ---------------------------------------------------------------------------

export async function runStartAction(options: StartActionOptions): Promise<number> {
  const { outputFormat } = options

  let supervisor: Supervisor
  try {
    supervisor = createSupervisor({
      ...options.supervisor,
      projectRoot: options.projectRoot,
      ...(options.configPath !== undefined ? { configPath: options.configPath } : {}),
      cliOverrides: parseCliOverrides(options),
    })
  } catch (err) {
    reportError(err, outputFormat)
    return exitCodeFor(err)
  }

  const unsubscribe = streamSupervisorEvents(supervisor.eventBus, outputFormat)
  try {
    const report = await supervisor.run()
    return report.errors.length > 0 ? EXIT_ERROR : EXIT_SUCCESS
  } catch (err) {
    if (err instanceof StartFailure && supervisor.stopRequested) {
      if (outputFormat === 'human') process.stderr.write('Interrupted during startup\n')
      return EXIT_INTERRUPTED
    }
    // startup:failed has already been streamed
    if (!(err instanceof StartFailure)) {
      logger.error({ err }, 'Supervisor run failed')
      reportError(err, outputFormat)
    }
    return exitCodeFor(err)
  } finally {
    unsubscribe()
  }
}

// ---------------------------------------------------------------------------
// registerStartCommand
// ---------------------------------------------------------------------------

export function registerStartCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('start')
    .description('Start every service in dependency order and supervise them in the foreground')
    .option('--config <path>', 'Service declaration file')
    .option('--log-level <level>', 'Log level: trace, debug, info, warn, error or fatal')
    .option('--state-dir <dir>', 'Directory holding state.db')
    .option('--start-timeout-ms <ms>', 'How long a service waits for its dependencies')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (opts: {
        config?: string
        logLevel?: string
        stateDir?: string
        startTimeoutMs?: string
        outputFormat: string
      }) => {
        process.exitCode = await runStartAction({
          projectRoot,
          ...(opts.config !== undefined ? { configPath: opts.config } : {}),
          ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
          ...(opts.stateDir !== undefined ? { stateDir: opts.stateDir } : {}),
          ...(opts.startTimeoutMs !== undefined ? { startTimeoutMs: opts.startTimeoutMs } : {}),
          outputFormat: parseOutputFormat(opts.outputFormat),
        })
      },
    )
}
