/**
 * `svcward plan` command
 *
 * Validates the declaration and prints the startup order without starting
 * anything.
 *
 * Usage:
 *   svcward plan
 *   svcward plan --config stack.yaml --output-format json
 *
 * Exit codes:
 *   0 - Plan printed
 *   1 - Unexpected error
 *   2 - Declaration or settings error
 *   3 - Dependency cycle
 */

import type { Command } from 'commander'
import { computePlan } from '../../modules/orchestrator/dependency-planner.js'
import { createLogger } from '../../utils/logger.js'
import { renderPlan, toPlanEntries } from '../formatters/plan-formatter.js'
import { emitEvent, parseOutputFormat, type OutputFormat } from '../formatters/streaming.js'
import { EXIT_SUCCESS, exitCodeFor } from '../utils/exit-codes.js'
import { loadProjectContext } from '../utils/project.js'
import { reportError } from '../utils/report-error.js'

const logger = createLogger('plan-cmd')

export interface PlanActionOptions {
  projectRoot: string
  configPath?: string
  outputFormat: OutputFormat
  env?: NodeJS.ProcessEnv
}

export function runPlanAction(options: PlanActionOptions): number {
  const { outputFormat } = options
  try {
    const context = loadProjectContext(options)
    const plan = computePlan(context.registry.list())
    logger.debug({ config: context.configPath, services: plan.length }, 'Plan computed')

    if (outputFormat === 'json') {
      emitEvent('plan:computed', {
        config: context.configPath,
        order: plan.map((s) => s.name),
        services: toPlanEntries(plan),
      })
    } else {
      process.stdout.write(renderPlan(plan) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    reportError(err, outputFormat)
    return exitCodeFor(err)
  }
}

export function registerPlanCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd(),
): void {
  program
    .command('plan')
    .description('Validate the declaration and print the startup order (dry run)')
    .option('--config <path>', 'Service declaration file')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action((opts: { config?: string; outputFormat: string }) => {
      process.exitCode = runPlanAction({
        projectRoot,
        ...(opts.config !== undefined ? { configPath: opts.config } : {}),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
