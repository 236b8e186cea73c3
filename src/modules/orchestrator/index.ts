/**
 * Orchestrator module: barrel exports
 */

export type {
  DependencyOrchestrator,
  ShutdownReport,
  StartAllOptions,
} from './dependency-orchestrator.js'
export {
  DependencyOrchestratorImpl,
  createDependencyOrchestrator,
  DEPENDENCY_POLL_INTERVAL_MS,
} from './dependency-orchestrator-impl.js'
export type { DependencyOrchestratorOptions } from './dependency-orchestrator-impl.js'
export { computePlan, findCycles } from './dependency-planner.js'
export type { CycleReport } from './dependency-planner.js'
