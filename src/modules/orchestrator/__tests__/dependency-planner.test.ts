/**
 * Unit tests for computePlan() and findCycles()
 */

import { describe, it, expect } from 'vitest'
import { computePlan, findCycles } from '../dependency-planner.js'
import { DependencyCycleError } from '../../../core/errors.js'
import type { ServiceDefinition } from '../../../core/types.js'
import { makeDefinition } from '../../../testing/fakes.js'

function services(spec: [string, string[]][]): ServiceDefinition[] {
  return spec.map(([name, dependsOn], index) => makeDefinition(name, { index, dependsOn }))
}

function names(defs: readonly ServiceDefinition[]): string[] {
  return defs.map((d) => d.name)
}

describe('computePlan', () => {
  it('places dependencies before dependents', () => {
    const plan = computePlan(
      services([
        ['model-a', ['storage', 'gpu']],
        ['storage', []],
        ['gpu', []],
      ]),
    )
    expect(names(plan)).toEqual(['storage', 'gpu', 'model-a'])
  })

  it('breaks ties by declaration order', () => {
    const plan = computePlan(
      services([
        ['c', []],
        ['a', []],
        ['b', ['c']],
        ['d', ['a']],
      ]),
    )
    expect(names(plan)).toEqual(['c', 'a', 'b', 'd'])
  })

  it('prefers the earliest declared ready service once a dependency is placed', () => {
    const plan = computePlan(
      services([
        ['late-root', []],
        ['needs-root', ['late-root']],
        ['independent', []],
      ]),
    )
    expect(names(plan)).toEqual(['late-root', 'needs-root', 'independent'])
  })

  it('is deterministic regardless of input order', () => {
    const defs = services([
      ['storage', []],
      ['gpu', []],
      ['model-a', ['storage', 'gpu']],
      ['model-b', ['gpu']],
    ])
    const reversed = [...defs].reverse()
    expect(names(computePlan(reversed))).toEqual(names(computePlan(defs)))
  })

  it('returns an empty plan for no services', () => {
    expect(computePlan([])).toEqual([])
  })

  it('throws DependencyCycleError naming only the services on the cycle', () => {
    const defs = services([
      ['base', []],
      ['a', ['b']],
      ['b', ['c']],
      ['c', ['a']],
      ['downstream', ['a']],
    ])

    let caught: unknown
    try {
      computePlan(defs)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(DependencyCycleError)
    if (!(caught instanceof DependencyCycleError)) return
    expect(caught.members).toEqual(['a', 'b', 'c'])
    expect(caught.cycles).toEqual([['a', 'b', 'c', 'a']])
    expect(caught.message).toBe('Circular dependency detected between services: a -> b -> c -> a')
  })
})

describe('findCycles', () => {
  it('reports each independent cycle separately', () => {
    const report = findCycles(
      services([
        ['x', ['y']],
        ['y', ['x']],
        ['p', ['q']],
        ['q', ['p']],
      ]),
    )
    expect(report.members).toEqual(['x', 'y', 'p', 'q'])
    expect(report.cycles).toEqual([
      ['x', 'y', 'x'],
      ['p', 'q', 'p'],
    ])
  })

  it('reports a self-dependency', () => {
    const report = findCycles(services([['loop', ['loop']]]))
    expect(report.members).toEqual(['loop'])
    expect(report.cycles).toEqual([['loop', 'loop']])
  })

  it('reports nothing for an acyclic graph', () => {
    expect(findCycles(services([['a', []], ['b', ['a']]]))).toEqual({ members: [], cycles: [] })
  })
})
