/**
 * Queue a per-service control signal (`restart`, `reset`) for the running
 * supervisor. Shared by the restart and reset commands.
 */

import type pino from 'pino'
import { ServiceNotFoundError } from '../../core/errors.js'
import type { ServiceName } from '../../core/types.js'
import type { DatabaseWrapper } from '../../persistence/database.js'
import { enqueueSignal } from '../../persistence/queries/control-signals.js'
import { getServiceState, type ServiceStateRecord } from '../../persistence/queries/service-states.js'
import { findLiveRun } from '../../persistence/queries/supervisor-runs.js'
import { isProcessRunning } from '../../utils/helpers.js'
import { emitEvent, type OutputFormat } from '../formatters/streaming.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, exitCodeFor } from './exit-codes.js'
import { loadProjectContext, openExistingStateDatabase } from './project.js'
import { reportError } from './report-error.js'

export interface ServiceSignalOptions {
  service: ServiceName
  projectRoot: string
  configPath?: string
  outputFormat: OutputFormat
  env?: NodeJS.ProcessEnv
  isProcessAlive?: (pid: number) => boolean
}

export interface ServiceSignalSpec {
  signal: 'restart' | 'reset'
  /** Reason to refuse, given the service's recorded state; null to proceed */
  refuse?: (record: ServiceStateRecord | undefined) => string | null
  /** Human confirmation line */
  describe: (service: ServiceName, pid: number) => string
  logger: pino.Logger
}

/**
 * @returns the exit code
 */
export function queueServiceSignal(spec: ServiceSignalSpec, options: ServiceSignalOptions): number {
  const { service, outputFormat, isProcessAlive = isProcessRunning } = options

  let wrapper: DatabaseWrapper | null = null
  try {
    const context = loadProjectContext(options)
    if (!context.registry.has(service)) throw new ServiceNotFoundError(service)

    wrapper = openExistingStateDatabase(context.databasePath)
    const run = wrapper !== null ? findLiveRun(wrapper.db, isProcessAlive) : undefined
    if (wrapper === null || run === undefined) {
      process.stderr.write('Error: No supervisor is running in this project\n')
      return EXIT_USAGE_ERROR
    }

    const refusal = spec.refuse?.(getServiceState(wrapper.db, service)) ?? null
    if (refusal !== null) {
      process.stderr.write(`Error: ${refusal}\n`)
      return EXIT_USAGE_ERROR
    }

    const signalId = enqueueSignal(wrapper.db, spec.signal, service)
    spec.logger.debug({ signalId, service, runId: run.id }, `Queued ${spec.signal} signal`)

    if (outputFormat === 'json') {
      emitEvent(`service:${spec.signal}-requested`, { service, runId: run.id, signalId })
    } else {
      process.stdout.write(spec.describe(service, run.pid) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    reportError(err, outputFormat)
    return exitCodeFor(err)
  } finally {
    wrapper?.close()
  }
}
