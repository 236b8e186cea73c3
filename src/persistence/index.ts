/**
 * Persistence layer: barrel exports
 */

export {
  DatabaseWrapper,
  DatabaseServiceImpl,
  createDatabaseService,
  openStateDatabase,
} from './database.js'
export type { DatabaseService } from './database.js'
export { runMigrations } from './migrations/index.js'
export type { Migration } from './migrations/index.js'
export { StateRecorder, createStateRecorder, RESTART_LIMIT_ALERT } from './state-recorder.js'
export type { StateRecorderOptions } from './state-recorder.js'
export * from './queries/service-states.js'
export * from './queries/control-signals.js'
export * from './queries/alerts.js'
export * from './queries/supervisor-runs.js'
