/**
 * Error definitions for svcward
 * Provides a structured error hierarchy for supervision operations
 */

/** Base error class for all svcward errors */
export class SvcwardError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'SvcwardError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SvcwardError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when the service declaration cannot be read or parsed */
export class ConfigParseError extends SvcwardError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_PARSE_ERROR', context)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when the service declaration is invalid; lists every violation */
export class ConfigValidationError extends SvcwardError {
  public readonly violations: string[]

  constructor(violations: string[], context: Record<string, unknown> = {}) {
    super(
      `Service declaration is invalid (${String(violations.length)} problem${violations.length === 1 ? '' : 's'}):\n` +
        violations.map((v) => `  - ${v}`).join('\n'),
      'CONFIG_VALIDATION_ERROR',
      { violations, ...context }
    )
    this.name = 'ConfigValidationError'
    this.violations = violations
  }
}

/** Error thrown when the dependency graph contains one or more cycles */
export class DependencyCycleError extends SvcwardError {
  /** Every service lying on some cycle, in declaration order */
  public readonly members: string[]
  /** One closed path per cycle, e.g. ['a', 'b', 'a'] */
  public readonly cycles: string[][]

  constructor(members: string[], cycles: string[][]) {
    super(
      `Circular dependency detected between services: ${cycles.map((c) => c.join(' -> ')).join('; ')}`,
      'DEPENDENCY_CYCLE',
      { members, cycles }
    )
    this.name = 'DependencyCycleError'
    this.members = members
    this.cycles = cycles
  }
}

/** Error thrown when orchestrated startup fails; already-started services have been rolled back */
export class StartFailure extends SvcwardError {
  public readonly service: string
  /** Services that were running before the failure and have since been stopped */
  public readonly rolledBack: string[]

  constructor(
    service: string,
    reason: string,
    rolledBack: string[],
    cause?: Error
  ) {
    super(`Service "${service}" failed to start: ${reason}`, 'START_FAILURE', {
      service,
      rolledBack,
      cause: cause?.message,
    })
    this.name = 'StartFailure'
    this.service = service
    this.rolledBack = rolledBack
  }
}

/** Error thrown when a start or stop hook does not finish within its timeout */
export class HookTimeoutError extends SvcwardError {
  constructor(service: string, hook: 'start' | 'stop', timeoutMs: number) {
    super(
      `The ${hook} hook for service "${service}" did not complete within ${String(timeoutMs)}ms`,
      'HOOK_TIMEOUT',
      { service, hook, timeoutMs }
    )
    this.name = 'HookTimeoutError'
  }
}

/** Error thrown when a start or stop hook reports failure */
export class HookError extends SvcwardError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'HOOK_ERROR', context)
    this.name = 'HookError'
  }
}

/** Raised (as an alert) when a service exceeds its restart limit and enters Failed */
export class RestartLimitExceeded extends SvcwardError {
  constructor(service: string, failures: number, maxAttempts: number, windowMs: number) {
    super(
      `Service "${service}" failed ${String(failures)} times within ${String(windowMs)}ms ` +
        `(limit ${String(maxAttempts)}); automatic restarts stopped`,
      'RESTART_LIMIT_EXCEEDED',
      { service, failures, maxAttempts, windowMs }
    )
    this.name = 'RestartLimitExceeded'
  }
}

/** Error thrown when a state transition is not permitted */
export class InvalidStateTransitionError extends SvcwardError {
  constructor(service: string, from: string, to: string) {
    super(
      `Service "${service}" cannot transition from ${from} to ${to}`,
      'INVALID_STATE_TRANSITION',
      { service, from, to }
    )
    this.name = 'InvalidStateTransitionError'
  }
}

/** Error thrown when a service's dependencies are not running */
export class DependencyNotReadyError extends SvcwardError {
  constructor(service: string, pending: string[]) {
    super(
      `Service "${service}" cannot start: dependencies not running: ${pending.join(', ')}`,
      'DEPENDENCY_NOT_READY',
      { service, pending }
    )
    this.name = 'DependencyNotReadyError'
  }
}

/** Error thrown when a service name is not declared */
export class ServiceNotFoundError extends SvcwardError {
  constructor(service: string) {
    super(`Service not found: ${service}`, 'SERVICE_NOT_FOUND', { service })
    this.name = 'ServiceNotFoundError'
  }
}

/** Error thrown when global settings are invalid */
export class ConfigError extends SvcwardError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when another supervisor already owns the state directory */
export class SupervisorActiveError extends SvcwardError {
  constructor(pid: number, runId: number) {
    super(
      `A supervisor is already running (pid ${String(pid)}, run ${String(runId)})`,
      'SUPERVISOR_ACTIVE',
      { pid, runId }
    )
    this.name = 'SupervisorActiveError'
  }
}
