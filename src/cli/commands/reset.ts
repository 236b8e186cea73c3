/**
 * `svcward reset <service>` command
 *
 * Acknowledges a Failed service: the running supervisor moves it to Stopped,
 * clears its failure history and closes its alerts. The service stays down
 * until `svcward restart <service>`.
 *
 * Exit codes:
 *   0 - Reset queued
 *   1 - Unexpected error
 *   2 - Declaration or settings error
 *   5 - Unknown service, service not Failed, or no active supervisor
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { parseOutputFormat } from '../formatters/streaming.js'
import { queueServiceSignal, type ServiceSignalOptions } from '../utils/service-signal.js'

const logger = createLogger('reset-cmd')

export type ResetActionOptions = ServiceSignalOptions

export function runResetAction(options: ResetActionOptions): number {
  return queueServiceSignal(
    {
      signal: 'reset',
      refuse: (record) =>
        record === undefined || record.state === 'failed'
          ? null
          : `Service ${record.name} is ${record.state}, not failed; nothing to reset`,
      describe: (service, pid) => `Reset of ${service} requested (supervisor pid ${String(pid)})`,
      logger,
    },
    options,
  )
}

export function registerResetCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('reset <service>')
    .description('Acknowledge a failed service: mark it stopped and clear its alerts')
    .option('--config <path>', 'Service declaration file')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((service: string, opts: { config?: string; outputFormat: string }) => {
      process.exitCode = runResetAction({
        service,
        projectRoot,
        ...(opts.config !== undefined ? { configPath: opts.config } : {}),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
