/**
 * `phasewright resume` command
 *
 * Reconciles the checkpoint with the work tracker, prints what changed and
 * continues from the resumption point in a new session.
 *
 * Exit codes: as `start`; 2 when there is no project run to resume.
 */

import type { Command } from 'commander'
import { EXIT_USAGE } from '../../core/exit-codes.js'
import { PHASE_NAMES } from '../../core/types.js'
import { renderReconciliationLog } from '../../modules/resume/reconciliation.js'
import { emitEvent } from '../formatters/streaming.js'
import { reportRunResult } from './run-output.js'
import { reportError, withOrchestrator, type BackendOverrides, type OutputFormat, type ProjectOptions } from './shared.js'

export interface ResumeActionOptions extends ProjectOptions {
  outputFormat: OutputFormat
  backends?: BackendOverrides
}

export async function runResumeAction(options: ResumeActionOptions): Promise<number> {
  try {
    return await withOrchestrator(options, async ({ orchestrator }) => {
      const outcome = await orchestrator.resume((point, reconciliation) => {
        if (options.outputFormat === 'json') {
          emitEvent('run:resumed', { point, reconciliation })
        } else {
          process.stdout.write(renderReconciliationLog(reconciliation) + '\n')
          process.stdout.write(`Resumed at ${PHASE_NAMES[point.phase]}\n`)
        }
      })
      if (outcome.kind === 'new-project') {
        process.stderr.write('Error: no project run to resume. Start one with `phasewright start <request>`.\n')
        return EXIT_USAGE
      }
      return reportRunResult(outcome.result, options.outputFormat)
    })
  } catch (err) {
    return reportError(err)
  }
}

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Reconcile with the work tracker and continue the project run')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { projectRoot: string; outputFormat: string }) => {
      const exitCode = await runResumeAction({
        projectRoot: opts.projectRoot,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
      })
      process.exit(exitCode)
    })
}
