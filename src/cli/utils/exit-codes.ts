/**
 * Process exit codes shared by every svcward command.
 */

import {
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  DependencyCycleError,
  ServiceNotFoundError,
  StartFailure,
  SupervisorActiveError,
} from '../../core/errors.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_CONFIG_ERROR = 2
export const EXIT_CYCLE_ERROR = 3
export const EXIT_START_FAILURE = 4
/** Unknown service, no active supervisor, or nothing to act on */
export const EXIT_USAGE_ERROR = 5
/** `health --strict` when not every service is running */
export const EXIT_UNHEALTHY = 6
export const EXIT_INTERRUPTED = 130

/**
 * Map an error thrown by a command to its exit code.
 */
export function exitCodeFor(err: unknown): number {
  if (
    err instanceof ConfigParseError ||
    err instanceof ConfigValidationError ||
    err instanceof ConfigError
  ) {
    return EXIT_CONFIG_ERROR
  }
  if (err instanceof DependencyCycleError) return EXIT_CYCLE_ERROR
  if (err instanceof StartFailure) return EXIT_START_FAILURE
  if (err instanceof SupervisorActiveError || err instanceof ServiceNotFoundError) {
    return EXIT_USAGE_ERROR
  }
  return EXIT_ERROR
}
