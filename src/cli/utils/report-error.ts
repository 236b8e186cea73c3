/**
 * Error output for CLI commands.
 */

import { SvcwardError } from '../../core/errors.js'
import { emitEvent, type OutputFormat } from '../formatters/streaming.js'

/**
 * Write an error to stderr (human) or as an `error` NDJSON event (json).
 * Violations and cycles are already part of the error message.
 */
export function reportError(err: unknown, outputFormat: OutputFormat): void {
  const message = err instanceof Error ? err.message : String(err)

  if (outputFormat === 'json') {
    emitEvent(
      'error',
      err instanceof SvcwardError
        ? { message, code: err.code, context: err.context }
        : { message },
    )
    return
  }

  process.stderr.write(`Error: ${message}\n`)
}
