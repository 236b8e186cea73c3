/**
 * `svcward status` command
 *
 * Shows what the supervisor last recorded in state.db: its own run, each
 * service's state, last probe, failure and restart counts, and open alerts.
 *
 * Usage:
 *   svcward status
 *   svcward status --output-format json   Single NDJSON status:snapshot event
 *
 * Exit codes:
 *   0 - Snapshot displayed
 *   1 - Unexpected error
 *   2 - Declaration or settings error
 *   5 - No supervisor has run in this project
 */

import type { Command } from 'commander'
import type { DatabaseWrapper } from '../../persistence/database.js'
import { isProcessRunning } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { renderStatusHuman } from '../formatters/status-formatter.js'
import { emitStatusSnapshot, parseOutputFormat, type OutputFormat } from '../formatters/streaming.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, exitCodeFor } from '../utils/exit-codes.js'
import { loadProjectContext, openExistingStateDatabase } from '../utils/project.js'
import { reportError } from '../utils/report-error.js'
import { readStatusSnapshot } from '../utils/state-snapshot.js'

const logger = createLogger('status-cmd')

export interface StatusActionOptions {
  projectRoot: string
  configPath?: string
  outputFormat: OutputFormat
  env?: NodeJS.ProcessEnv
  isProcessAlive?: (pid: number) => boolean
}

export function runStatusAction(options: StatusActionOptions): number {
  const { outputFormat, isProcessAlive = isProcessRunning } = options

  let wrapper: DatabaseWrapper | null = null
  try {
    const context = loadProjectContext(options)
    wrapper = openExistingStateDatabase(context.databasePath)
    const snapshot = wrapper !== null ? readStatusSnapshot(wrapper.db, isProcessAlive) : null
    if (snapshot === null || (snapshot.supervisor === null && snapshot.services.length === 0)) {
      process.stderr.write("Error: No supervisor state found. Run 'svcward start' first.\n")
      return EXIT_USAGE_ERROR
    }

    if (outputFormat === 'json') emitStatusSnapshot(snapshot)
    else process.stdout.write(renderStatusHuman(snapshot) + '\n')
    return EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'runStatusAction failed')
    reportError(err, outputFormat)
    return exitCodeFor(err)
  } finally {
    wrapper?.close()
  }
}

export function registerStatusCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('status')
    .description('Show each service state, last probe and failure count')
    .option('--config <path>', 'Service declaration file')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((opts: { config?: string; outputFormat: string }) => {
      process.exitCode = runStatusAction({
        projectRoot,
        ...(opts.config !== undefined ? { configPath: opts.config } : {}),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
