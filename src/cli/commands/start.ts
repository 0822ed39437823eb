/**
 * `phasewright start` command
 *
 * Initialises a new project run from a natural-language request and executes
 * phases until the run completes or has to stop.
 *
 * Usage:
 *   phasewright start "Build a todo API with auth"
 *   phasewright start --name todo-api --fresh "Build a todo API"
 *
 * Exit codes:
 *   0 - Project complete
 *   1 - System error
 *   2 - Usage error (a checkpoint already exists, invalid config)
 *   3 - Awaiting approval
 *   4 - Verification diverged
 *   5 - Suspended (resume later)
 */

import type { Command } from 'commander'
import { EXIT_USAGE } from '../../core/exit-codes.js'
import { reportRunResult } from './run-output.js'
import { reportError, withOrchestrator, type BackendOverrides, type OutputFormat, type ProjectOptions } from './shared.js'

export interface StartActionOptions extends ProjectOptions {
  request: string
  name?: string
  fresh: boolean
  outputFormat: OutputFormat
  backends?: BackendOverrides
}

export async function runStartAction(options: StartActionOptions): Promise<number> {
  const request = options.request.trim()
  if (request === '') {
    process.stderr.write('Error: the project request must not be empty\n')
    return EXIT_USAGE
  }
  try {
    return await withOrchestrator(options, async ({ orchestrator }) => {
      const result = await orchestrator.start({
        request,
        fresh: options.fresh,
        ...(options.name !== undefined && { name: options.name }),
      })
      return reportRunResult(result, options.outputFormat)
    })
  } catch (err) {
    return reportError(err)
  }
}

export function registerStartCommand(program: Command): void {
  program
    .command('start <request...>')
    .description('Start a new project run from a natural-language request')
    .option('--name <name>', 'Project name (default: the project directory name)')
    .option('--fresh', 'Discard an existing checkpoint instead of refusing', false)
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        requestWords: string[],
        opts: { name?: string; fresh: boolean; projectRoot: string; outputFormat: string }
      ) => {
        const exitCode = await runStartAction({
          request: requestWords.join(' '),
          fresh: opts.fresh,
          projectRoot: opts.projectRoot,
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
          ...(opts.name !== undefined && { name: opts.name }),
        })
        process.exit(exitCode)
      }
    )
}
