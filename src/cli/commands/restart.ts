/**
 * `svcward restart <service>` command
 *
 * Queues a manual restart for one service. The running supervisor clears the
 * service's failure history first, so this also revives a Failed service.
 *
 * Exit codes:
 *   0 - Restart queued
 *   1 - Unexpected error
 *   2 - Declaration or settings error
 *   5 - Unknown service, or no active supervisor
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat } from '../formatters/streaming.js'
import { queueServiceSignal, type ServiceSignalOptions } from '../utils/service-signal.js'

const logger = createLogger('restart-cmd')

export type RestartActionOptions = ServiceSignalOptions

export function runRestartAction(options: RestartActionOptions): number {
  return queueServiceSignal(
    {
      signal: 'restart',
      describe: (service, pid) => `Restart of ${service} requested (supervisor pid ${String(pid)})`,
      logger,
    },
    options,
  )
}

export function registerRestartCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('restart <service>')
    .description('Restart one service and clear its failure history')
    .option('--config <path>', 'Service declaration file')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((service: string, opts: { config?: string; outputFormat: string }) => {
      process.exitCode = runRestartAction({
        service,
        projectRoot,
        ...(opts.config !== undefined ? { configPath: opts.config } : {}),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
