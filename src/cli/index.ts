#!/usr/bin/env node
/**
 * svcward CLI - Main entry point
 * Provides the `svcward` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { isPlainObject } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { registerHealthCommand } from './commands/health.js'
import { registerPlanCommand } from './commands/plan.js'
import { registerResetCommand } from './commands/reset.js'
import { registerRestartCommand } from './commands/restart.js'
import { registerStartCommand } from './commands/start.js'
import { registerStatusCommand } from './commands/status.js'
import { registerStopCommand } from './commands/stop.js'

const logger = createLogger('cli')

/** Read the version from package.json, from dist/ or src/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (isPlainObject(pkg) && pkg['name'] === 'svcward' && typeof pkg['version'] === 'string') {
        return pkg['version']
      }
    } catch (err) {
      logger.debug({ err, pkgPath }, 'No readable package.json here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('svcward')
    .description('Dependency-ordered process supervision with health probing and crash-loop protection')
    .version(version, '-v, --version', 'Output the current version')

  registerStartCommand(program, version)
  registerStopCommand(program, version)
  registerStatusCommand(program, version)
  registerHealthCommand(program, version)
  registerRestartCommand(program, version)
  registerResetCommand(program, version)
  registerPlanCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
