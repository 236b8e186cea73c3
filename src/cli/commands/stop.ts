/**
 * `svcward stop` command
 *
 * Queues a stop signal for the supervisor running in this project. The
 * supervisor stops every service in reverse dependency order and exits.
 *
 * Usage:
 *   svcward stop
 *   svcward stop --wait --timeout-ms 120000
 *
 * Exit codes:
 *   0 - Stop queued (with --wait: the run has ended)
 *   1 - Unexpected error, or --wait timed out
 *   2 - Declaration or settings error
 *   5 - No active supervisor
 */

import type { Command } from 'commander'
import { enqueueSignal } from '../../persistence/queries/control-signals.js'
import { findLiveRun, getRun, type SupervisorRun } from '../../persistence/queries/supervisor-runs.js'
import type { DatabaseWrapper } from '../../persistence/database.js'
import { isProcessRunning, sleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { emitEvent, parseOutputFormat, type OutputFormat } from '../formatters/streaming.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR, exitCodeFor } from '../utils/exit-codes.js'
import { loadProjectContext, openExistingStateDatabase } from '../utils/project.js'
import { reportError } from '../utils/report-error.js'

const logger = createLogger('stop-cmd')

export const DEFAULT_STOP_TIMEOUT_MS = 60_000
export const DEFAULT_STOP_POLL_INTERVAL_MS = 200

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StopActionOptions {
  projectRoot: string
  configPath?: string
  outputFormat: OutputFormat
  wait: boolean
  timeoutMs?: number
  pollIntervalMs?: number
  env?: NodeJS.ProcessEnv
  isProcessAlive?: (pid: number) => boolean
}

function report(outputFormat: OutputFormat, event: string, data: object, human: string): void {
  if (outputFormat === 'json') emitEvent(event, data)
  else process.stdout.write(human + '\n')
}

/**
 * Poll until the run ends or its process disappears.
 * @returns the final run row, or null on timeout
 */
async function waitForRunEnd(
  wrapper: DatabaseWrapper,
  run: SupervisorRun,
  isAlive: (pid: number) => boolean,
  timeoutMs: number,
  pollIntervalMs: number,
): Promise<SupervisorRun | null> {
  const deadline = Date.now() + timeoutMs
  for (;;) {
    const current = getRun(wrapper.db, run.id) ?? run
    if (current.status === 'stopped' || current.status === 'failed' || !isAlive(run.pid)) {
      return current
    }
    if (Date.now() >= deadline) return null
    await sleep(pollIntervalMs)
  }
}

// ---------------------------------------------------------------------------
// runStopAction: testable core logic
// ---------------------------------------------------------------------------

export async function runStopAction(options: StopActionOptions): Promise<number> {
  const {
    outputFormat,
    timeoutMs = DEFAULT_STOP_TIMEOUT_MS,
    pollIntervalMs = DEFAULT_STOP_POLL_INTERVAL_MS,
    isProcessAlive = isProcessRunning,
  } = options

  let wrapper: DatabaseWrapper | null = null
  try {
    const context = loadProjectContext(options)
    wrapper = openExistingStateDatabase(context.databasePath)
    const run = wrapper !== null ? findLiveRun(wrapper.db, isProcessAlive) : undefined
    if (wrapper === null || run === undefined) {
      process.stderr.write('Error: No supervisor is running in this project\n')
      return EXIT_USAGE_ERROR
    }

    const signalId = enqueueSignal(wrapper.db, 'stop')
    logger.debug({ signalId, runId: run.id }, 'Queued stop signal')
    report(
      outputFormat,
      'supervisor:stop-requested',
      { runId: run.id, pid: run.pid },
      `Stop requested for supervisor (pid ${String(run.pid)})`,
    )
    if (!options.wait) return EXIT_SUCCESS

    const ended = await waitForRunEnd(wrapper, run, isProcessAlive, timeoutMs, pollIntervalMs)
    if (ended === null) {
      process.stderr.write(
        `Error: Supervisor (pid ${String(run.pid)}) did not stop within ${String(timeoutMs)}ms\n`,
      )
      return EXIT_ERROR
    }
    // A process that vanished without recording its end counts as exited
    const outcome = ended.status === 'stopped' || ended.status === 'failed' ? ended.status : 'exited'
    report(
      outputFormat,
      'supervisor:stopped',
      { runId: ended.id, pid: ended.pid, status: outcome },
      `Supervisor stopped (${outcome})`,
    )
    return EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'runStopAction failed')
    reportError(err, outputFormat)
    return exitCodeFor(err)
  } finally {
    wrapper?.close()
  }
}

// ---------------------------------------------------------------------------
// registerStopCommand
// ---------------------------------------------------------------------------

export function registerStopCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('stop')
    .description('Ask the running supervisor to stop every service and exit')
    .option('--config <path>', 'Service declaration file')
    .option('--wait', 'Wait until the supervisor has stopped', false)
    .option('--timeout-ms <ms>', 'How long --wait waits', String(DEFAULT_STOP_TIMEOUT_MS))
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (opts: { config?: string; wait: boolean; timeoutMs: string; outputFormat: string }) => {
        const timeoutMs = Number(opts.timeoutMs)
        process.exitCode = await runStopAction({
          projectRoot,
          ...(opts.config !== undefined ? { configPath: opts.config } : {}),
          outputFormat: parseOutputFormat(opts.outputFormat),
          wait: opts.wait,
          timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : DEFAULT_STOP_TIMEOUT_MS,
        })
      },
    )
}
