/**
 * `phasewright status` command
 *
 * Prints a snapshot of the checkpoint without taking the lock or touching
 * the tracker.
 *
 * Exit codes:
 *   0 - Snapshot printed
 *   1 - System error (unreadable checkpoint)
 *   2 - No project run exists
 */

import type { Command } from 'commander'
import { EXIT_SUCCESS, EXIT_USAGE } from '../../core/exit-codes.js'
import { createCheckpointStore } from '../../modules/checkpoint/checkpoint-store-impl.js'
import { resolveStateDir } from '../../modules/orchestrator/factory.js'
import { buildStatusSnapshot, renderStatusHuman } from '../formatters/status-formatter.js'
import { loadProjectConfig, projectRootOf, reportError, type OutputFormat, type ProjectOptions } from './shared.js'

export interface StatusActionOptions extends ProjectOptions {
  outputFormat: OutputFormat
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  try {
    const config = await loadProjectConfig(options)
    const store = createCheckpointStore({ stateDir: resolveStateDir(projectRootOf(options), config) })
    const checkpoint = await store.load()
    if (checkpoint === null) {
      if (options.outputFormat === 'json') {
        process.stdout.write(JSON.stringify({ project: null }) + '\n')
      } else {
        process.stdout.write('No project run found. Start one with `phasewright start <request>`.\n')
      }
      return EXIT_USAGE
    }
    const snapshot = buildStatusSnapshot(checkpoint)
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(snapshot, null, 2) + '\n')
    } else {
      process.stdout.write(renderStatusHuman(snapshot) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the checkpoint of the current project run')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { projectRoot: string; outputFormat: string }) => {
      const exitCode = await runStatusAction({
        projectRoot: opts.projectRoot,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
      })
      process.exit(exitCode)
    })
}
