/**
 * `svcward health` command
 *
 * Aggregate health: how many services are Running, Unhealthy (being
 * recovered) and Failed (recovery exhausted), and each service's state.
 *
 * Usage:
 *   svcward health
 *   svcward health --strict                Exit 6 unless every service is Running
 *   svcward health --output-format json    Single NDJSON health:report event
 *
 * Exit codes:
 *   0 - Report displayed (without --strict, whatever the health)
 *   1 - Unexpected error
 *   2 - Declaration or settings error
 *   6 - --strict and not every service is Running under a live supervisor
 */

import type { Command } from 'commander'
import type { DatabaseWrapper } from '../../persistence/database.js'
import { isProcessRunning } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { renderHealthHuman } from '../formatters/status-formatter.js'
import { emitEvent, parseOutputFormat, type OutputFormat } from '../formatters/streaming.js'
import type { StatusSnapshot } from '../types/status.js'
import { EXIT_SUCCESS, EXIT_UNHEALTHY, exitCodeFor } from '../utils/exit-codes.js'
import { loadProjectContext, openExistingStateDatabase } from '../utils/project.js'
import { reportError } from '../utils/report-error.js'
import { readStatusSnapshot, summarizeHealth } from '../utils/state-snapshot.js'

const logger = createLogger('health-cmd')

const EMPTY_SNAPSHOT: StatusSnapshot = { supervisor: null, services: [], alerts: [] }

export interface HealthActionOptions {
  projectRoot: string
  configPath?: string
  outputFormat: OutputFormat
  strict: boolean
  env?: NodeJS.ProcessEnv
  isProcessAlive?: (pid: number) => boolean
}

export function runHealthAction(options: HealthActionOptions): number {
  const { outputFormat, strict, isProcessAlive = isProcessRunning } = options

  let wrapper: DatabaseWrapper | null = null
  try {
    const context = loadProjectContext(options)
    wrapper = openExistingStateDatabase(context.databasePath)
    const snapshot = wrapper !== null ? readStatusSnapshot(wrapper.db, isProcessAlive) : EMPTY_SNAPSHOT
    const report = summarizeHealth(snapshot)

    if (outputFormat === 'json') emitEvent('health:report', report)
    else process.stdout.write(renderHealthHuman(report) + '\n')

    return strict && !report.healthy ? EXIT_UNHEALTHY : EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'runHealthAction failed')
    reportError(err, outputFormat)
    return exitCodeFor(err)
  } finally {
    wrapper?.close()
  }
}

export function registerHealthCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('health')
    .description('Summarise service health (running, unhealthy, failed)')
    .option('--config <path>', 'Service declaration file')
    .option('--strict', 'Exit 6 unless every service is running', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((opts: { config?: string; strict: boolean; outputFormat: string }) => {
      process.exitCode = runHealthAction({
        projectRoot,
        ...(opts.config !== undefined ? { configPath: opts.config } : {}),
        outputFormat: parseOutputFormat(opts.outputFormat),
        strict: opts.strict,
      })
    })
}
