/**
 * Monitor module: barrel exports
 */

export type { Monitor } from './monitor.js'
export { MonitorImpl, createMonitor } from './monitor-impl.js'
export type { MonitorOptions } from './monitor-impl.js'
