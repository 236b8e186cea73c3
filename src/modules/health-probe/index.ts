/**
 * Health probe module: barrel exports
 */

export type { HealthProbe, ProbeContext } from './health-probe.js'
export { HealthProbeImpl, createHealthProbe } from './health-probe-impl.js'
