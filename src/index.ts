/**
 * svcward - Main module exports
 * Public API surface for embedding the supervisor
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Supervisor daemon
export { createSupervisor, SupervisorImpl, resolveDatabasePath, INTERRUPTED } from './core/supervisor-impl.js'
export type { Supervisor, SupervisorConfig } from './core/supervisor.js'
export { ControlSignalPoller, createControlSignalPoller } from './core/control-signal-poller.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { SupervisorEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { Component } from './core/di.js'
export { ComponentRegistry } from './core/di.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/registry/index.js'
export * from './modules/orchestrator/index.js'
export * from './modules/process-supervisor/index.js'
export * from './modules/health-probe/index.js'
export * from './modules/recovery-policy/index.js'
export * from './modules/monitor/index.js'

// Persistence
export * from './persistence/index.js'

// Shutdown handling
export * from './recovery/index.js'
