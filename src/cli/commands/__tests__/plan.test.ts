/**
 * Tests for `svcward plan`.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { captureOutput, type CapturedOutput } from '../../../testing/output.js'
import { TempProject } from '../../../testing/project.js'
import { runPlanAction, type PlanActionOptions } from '../plan.js'

vi.mock('../../../utils/logger.js', () => {
  const fake = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => fake,
  }
  return { createLogger: () => fake, childLogger: () => fake }
})

let project: TempProject
let output: CapturedOutput

beforeEach(() => {
  project = new TempProject('svcward-plan-')
  output = captureOutput()
})

afterEach(() => {
  vi.restoreAllMocks()
  project.remove()
})

function options(overrides: Partial<PlanActionOptions> = {}): PlanActionOptions {
  return { projectRoot: project.dir, outputFormat: 'human', env: {}, ...overrides }
}

describe('runPlanAction', () => {
  it('prints the startup order without creating state', () => {
    project.writeDeclaration()

    expect(runPlanAction(options())).toBe(0)

    const lines = output.stdout().split('\n')
    expect(lines[0]).toBe('Startup plan (3 services):')
    expect(lines.filter((l) => /^\d+\. /.test(l))).toEqual(['1. storage', '2. gpu', '3. model-a'])
    expect(lines).toContain('   after:   storage, gpu')
    expect(lines).toContain('   probe:   http GET http://model-a.test/health every 10ms')
    expect(existsSync(project.databasePath)).toBe(false)
  })

  it('emits plan:computed with the order in json mode', () => {
    project.writeDeclaration()

    expect(runPlanAction(options({ outputFormat: 'json' }))).toBe(0)

    expect(output.events()).toHaveLength(1)
    expect(output.events()[0]).toMatchObject({
      event: 'plan:computed',
      data: { order: ['storage', 'gpu', 'model-a'] },
    })
  })

  it('reads an explicit --config path', () => {
    project.writeDeclaration([{ name: 'gpu' }], 'stack.json')

    expect(runPlanAction(options({ configPath: 'stack.json' }))).toBe(0)
    expect(output.stdout()).toContain('1. gpu')
  })

  it('exits 3 on a dependency cycle', () => {
    project.writeDeclaration([
      { name: 'a', depends_on: ['b'] },
      { name: 'b', depends_on: ['a'] },
    ])

    expect(runPlanAction(options())).toBe(3)
    expect(output.stderr()).toMatch(/^Error: Circular dependency detected between services: /)
  })

  it('reports a cycle as an error event in json mode', () => {
    project.writeDeclaration([
      { name: 'a', depends_on: ['b'] },
      { name: 'b', depends_on: ['a'] },
    ])

    expect(runPlanAction(options({ outputFormat: 'json' }))).toBe(3)
    expect(output.events()[0]).toMatchObject({
      event: 'error',
      data: { code: 'DEPENDENCY_CYCLE', context: { members: ['a', 'b'] } },
    })
  })

  it('exits 2 when no declaration exists', () => {
    expect(runPlanAction(options())).toBe(2)
    expect(output.stderr()).toContain('No service declaration found in')
  })

  it('exits 2 on an unknown dependency', () => {
    project.writeDeclaration([{ name: 'model-a', depends_on: ['storage'] }])
    expect(runPlanAction(options())).toBe(2)
  })
})
