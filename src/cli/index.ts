#!/usr/bin/env node
/**
 * phasewright CLI - Main entry point
 * Provides the `phasewright` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerStartCommand } from './commands/start.js'
import { registerResumeCommand } from './commands/resume.js'
import { registerApproveCommand } from './commands/approve.js'
import { registerStatusCommand } from './commands/status.js'
import { registerResetCommand } from './commands/reset.js'
import { registerOptimizeCommand } from './commands/optimize.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package version relative to this file (src/cli or dist/cli) */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = PackageJsonSchema.safeParse(JSON.parse(content))
    if (pkg.success && pkg.data.name === 'phasewright') {
      return pkg.data.version ?? '0.0.0'
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('phasewright')
    .description('phasewright - phase-sequenced build orchestration with resumable checkpoints')
    .version(version, '-v, --version', 'Output the current version')

  registerStartCommand(program)
  registerResumeCommand(program)
  registerApproveCommand(program)
  registerStatusCommand(program)
  registerResetCommand(program)
  registerOptimizeCommand(program)
  registerConfigCommand(program)

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

void main()
