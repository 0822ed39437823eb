/**
 * `phasewright approve <decision>` command
 *
 * Resolves the pending approval of the current session and continues the
 * run in that session.
 */

import type { Command } from 'commander'
import { EXIT_USAGE } from '../../core/exit-codes.js'
import { APPROVAL_DECISIONS, type ApprovalDecision } from '../../modules/checkpoint/checkpoint-schema.js'
import { reportRunResult } from './run-output.js'
import { reportError, withOrchestrator, type BackendOverrides, type OutputFormat, type ProjectOptions } from './shared.js'

export interface ApproveActionOptions extends ProjectOptions {
  decision: string
  outputFormat: OutputFormat
  backends?: BackendOverrides
}

export function parseDecision(raw: string): ApprovalDecision | null {
  return APPROVAL_DECISIONS.find((decision) => decision === raw) ?? null
}

export async function runApproveAction(options: ApproveActionOptions): Promise<number> {
  const decision = parseDecision(options.decision)
  if (decision === null) {
    process.stderr.write(
      `Error: unknown decision "${options.decision}". Expected one of: ${APPROVAL_DECISIONS.join(', ')}\n`
    )
    return EXIT_USAGE
  }
  try {
    return await withOrchestrator(options, async ({ orchestrator }) => {
      const result = await orchestrator.approve(decision)
      return reportRunResult(result, options.outputFormat)
    })
  } catch (err) {
    return reportError(err)
  }
}

export function registerApproveCommand(program: Command): void {
  program
    .command('approve <decision>')
    .description(`Resolve a pending approval (${APPROVAL_DECISIONS.join(' | ')}) and continue`)
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (decision: string, opts: { projectRoot: string; outputFormat: string }) => {
      const exitCode = await runApproveAction({
        decision,
        projectRoot: opts.projectRoot,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
      })
      process.exit(exitCode)
    })
}
