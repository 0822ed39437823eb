/**
 * `phasewright reset` command
 *
 * Deletes the checkpoint so the next `start` begins a fresh run. Never runs
 * without `--yes`.
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS, EXIT_USAGE } from '../../core/exit-codes.js'
import { reportError, withOrchestrator, type BackendOverrides, type ProjectOptions } from './shared.js'

export interface ResetActionOptions extends ProjectOptions {
  yes: boolean
  backends?: BackendOverrides
}

export async function runResetAction(options: ResetActionOptions): Promise<number> {
  if (!options.yes) {
    process.stderr.write('Refusing to delete the checkpoint without confirmation. Re-run with --yes.\n')
    return EXIT_USAGE
  }
  try {
    return await withOrchestrator({ ...options, outputFormat: 'human' }, async ({ orchestrator }) => {
      const existing = await orchestrator.status()
      if (existing === null) {
        process.stdout.write('No checkpoint to delete.\n')
        return EXIT_SUCCESS
      }
      await orchestrator.reset()
      process.stdout.write(`Deleted the checkpoint of project "${existing.project.name}".\n`)
      return EXIT_SUCCESS
    })
  } catch (err) {
    return reportError(err)
  }
}

export function registerResetCommand(program: Command): void {
  program
    .command('reset')
    .description('Delete the checkpoint of the current project run')
    .option('--yes', 'Confirm the deletion', false)
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .action(async (opts: { yes: boolean; projectRoot: string }) => {
      const exitCode = await runResetAction({ yes: opts.yes, projectRoot: opts.projectRoot })
      process.exit(exitCode)
    })
}
