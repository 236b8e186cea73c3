/**
 * Dependency planner for service startup.
 *
 * Provides:
 *  - Topological planning with Kahn's algorithm, ties broken by declaration order
 *  - Cycle reporting via strongly connected components (Tarjan), naming every
 *    service that lies on a cycle
 *
 * Edges to names outside the given definitions are ignored.
 */

import { DependencyCycleError } from '../../core/errors.js'
import type { ServiceDefinition, ServiceName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// computePlan
// ---------------------------------------------------------------------------

/**
 * Order services so every service comes after all of its dependencies.
 *
 * Among services whose dependencies are all placed, the one declared first is
 * placed next, so the same declaration always yields the same plan.
 *
 * @param services - Definitions in any order; `index` gives declaration order
 * @throws {DependencyCycleError} if any dependency cycle exists
 */
export function computePlan(services: readonly ServiceDefinition[]): ServiceDefinition[] {
  const byName = new Map<ServiceName, ServiceDefinition>(services.map((s) => [s.name, s]))
  const inDegree = new Map<ServiceName, number>()
  const dependents = new Map<ServiceName, ServiceName[]>()

  for (const svc of services) {
    const deps = new Set(svc.dependsOn.filter((d) => byName.has(d)))
    inDegree.set(svc.name, deps.size)
    for (const dep of deps) {
      const list = dependents.get(dep) ?? []
      list.push(svc.name)
      dependents.set(dep, list)
    }
  }

  const ready: ServiceDefinition[] = services.filter((s) => inDegree.get(s.name) === 0)
  const plan: ServiceDefinition[] = []

  while (ready.length > 0) {
    ready.sort((a, b) => a.index - b.index)
    const next = ready.shift()
    if (next === undefined) break
    plan.push(next)

    for (const dependentName of dependents.get(next.name) ?? []) {
      const remaining = (inDegree.get(dependentName) ?? 0) - 1
      inDegree.set(dependentName, remaining)
      const dependent = byName.get(dependentName)
      if (remaining === 0 && dependent !== undefined) {
        ready.push(dependent)
      }
    }
  }

  if (plan.length < services.length) {
    const placed = new Set(plan.map((s) => s.name))
    const leftover = services.filter((s) => !placed.has(s.name))
    const { members, cycles } = findCycles(leftover)
    throw new DependencyCycleError(members, cycles)
  }

  return plan
}

// ---------------------------------------------------------------------------
// findCycles
// ---------------------------------------------------------------------------

export interface CycleReport {
  /** Every service on some cycle, in declaration order */
  members: ServiceName[]
  /** One closed path per strongly connected component, e.g. ['a', 'b', 'a'] */
  cycles: ServiceName[][]
}

/**
 * Find every dependency cycle among the given services.
 *
 * Services that merely depend on a cycle (without being part of one) are not
 * reported.
 */
export function findCycles(services: readonly ServiceDefinition[]): CycleReport {
  const byName = new Map<ServiceName, ServiceDefinition>(services.map((s) => [s.name, s]))
  const edges = (name: ServiceName): ServiceName[] =>
    (byName.get(name)?.dependsOn ?? []).filter((d) => byName.has(d))
  const order = (name: ServiceName): number => byName.get(name)?.index ?? Number.MAX_SAFE_INTEGER

  // Tarjan's strongly connected components
  let counter = 0
  const index = new Map<ServiceName, number>()
  const lowLink = new Map<ServiceName, number>()
  const stack: ServiceName[] = []
  const onStack = new Set<ServiceName>()
  const components: ServiceName[][] = []

  function strongConnect(name: ServiceName): void {
    index.set(name, counter)
    lowLink.set(name, counter)
    counter += 1
    stack.push(name)
    onStack.add(name)

    for (const dep of edges(name)) {
      if (!index.has(dep)) {
        strongConnect(dep)
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, lowLink.get(dep) ?? 0))
      } else if (onStack.has(dep)) {
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, index.get(dep) ?? 0))
      }
    }

    if (lowLink.get(name) === index.get(name)) {
      const component: ServiceName[] = []
      let member: ServiceName | undefined
      do {
        member = stack.pop()
        if (member === undefined) break
        onStack.delete(member)
        component.push(member)
      } while (member !== name)
      components.push(component)
    }
  }

  const sorted = [...services].sort((a, b) => a.index - b.index)
  for (const svc of sorted) {
    if (!index.has(svc.name)) strongConnect(svc.name)
  }

  const cyclic = components
    .filter((c) => c.length > 1 || (c.length === 1 && c[0] !== undefined && edges(c[0]).includes(c[0])))
    .map((c) => [...c].sort((a, b) => order(a) - order(b)))
    .sort((a, b) => order(a[0] ?? '') - order(b[0] ?? ''))

  const members = cyclic.flat().sort((a, b) => order(a) - order(b))
  const cycles = cyclic.map((component) => cyclePath(component, edges))

  return { members, cycles }
}

/**
 * Walk dependency edges inside one component from its first member back to
 * itself. The component is strongly connected, so such a path exists.
 */
function cyclePath(
  component: ServiceName[],
  edges: (name: ServiceName) => ServiceName[],
): ServiceName[] {
  const start = component[0]
  if (start === undefined) return []
  const inComponent = new Set(component)
  const path: ServiceName[] = [start]
  const visited = new Set<ServiceName>([start])

  function walk(node: ServiceName): boolean {
    for (const next of edges(node)) {
      if (!inComponent.has(next)) continue
      if (next === start) {
        path.push(start)
        return true
      }
      if (visited.has(next)) continue
      visited.add(next)
      path.push(next)
      if (walk(next)) return true
      path.pop()
    }
    return false
  }

  walk(start)
  return path
}
