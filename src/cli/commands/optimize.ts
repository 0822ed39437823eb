/**
 * `phasewright optimize` command group
 *
 *   - `phasewright optimize`                          print the threshold report
 *   - `phasewright optimize apply <parameter> --yes`  write one recommendation to the project config
 *
 * Recommendations are advisory; nothing changes without `apply --yes`.
 */

import type { Command } from 'commander'
import { join } from 'path'
import { EXIT_SUCCESS, EXIT_USAGE } from '../../core/exit-codes.js'
import { SqliteHistoryStore } from '../../persistence/history-store.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { historyPathOf } from '../../modules/orchestrator/factory.js'
import { createThresholdOptimizer, renderThresholdReport, requireSufficientSample } from '../../modules/threshold-optimizer/index.js'
import type { OptimizerResult } from '../../modules/threshold-optimizer/index.js'
import { loadProjectConfig, projectRootOf, reportError, type OutputFormat, type ProjectOptions } from './shared.js'

export interface OptimizeActionOptions extends ProjectOptions {
  outputFormat: OutputFormat
  /** History database to analyse instead of the project's own */
  history?: string
}

export interface OptimizeApplyOptions extends ProjectOptions {
  parameter: string
  yes: boolean
  history?: string
}

async function analyzeHistory(opts: ProjectOptions & { history?: string }): Promise<OptimizerResult> {
  const config = await loadProjectConfig(opts)
  const store = new SqliteHistoryStore(opts.history ?? historyPathOf(projectRootOf(opts), config))
  try {
    return createThresholdOptimizer(config).analyze(store.list())
  } finally {
    store.close()
  }
}

export async function runOptimizeAction(options: OptimizeActionOptions): Promise<number> {
  try {
    const result = await analyzeHistory(options)
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(result, null, 2) + '\n')
    } else {
      process.stdout.write(renderThresholdReport(result) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export async function runOptimizeApplyAction(options: OptimizeApplyOptions): Promise<number> {
  try {
    const result = requireSufficientSample(await analyzeHistory(options))
    const recommendation = result.recommendations.find((rec) => rec.parameterName === options.parameter)
    if (recommendation === undefined) {
      process.stderr.write(`Error: no recommendation for "${options.parameter}"\n`)
      return EXIT_USAGE
    }
    const change = `${recommendation.parameterName}: ${String(recommendation.oldValue)} -> ${String(recommendation.newValue)}`
    if (!options.yes) {
      process.stdout.write(`Would apply ${change}. Re-run with --yes to write it.\n`)
      return EXIT_USAGE
    }

    const system = createConfigSystem({
      projectConfigDir: join(projectRootOf(options), '.phasewright'),
      ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
      ...(options.env !== undefined && { env: options.env }),
    })
    await system.load()
    await system.set(recommendation.parameterName, recommendation.newValue)
    process.stdout.write(`Applied ${change}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerOptimizeCommand(program: Command): void {
  const optimizeCmd = program
    .command('optimize')
    .description('Analyse completed projects and recommend threshold changes')
    .option('--history <path>', 'History database to analyse (default: the project history)')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { history?: string; projectRoot: string; outputFormat: string }) => {
      const exitCode = await runOptimizeAction({
        projectRoot: opts.projectRoot,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
        ...(opts.history !== undefined && { history: opts.history }),
      })
      process.exit(exitCode)
    })

  optimizeCmd
    .command('apply <parameter>')
    .description('Write the recommended value of one parameter to the project config')
    .option('--yes', 'Confirm the change', false)
    .option('--history <path>', 'History database to analyse (default: the project history)')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .action(async (parameter: string, opts: { yes: boolean; history?: string; projectRoot: string }) => {
      const exitCode = await runOptimizeApplyAction({
        parameter,
        yes: opts.yes,
        projectRoot: opts.projectRoot,
        ...(opts.history !== undefined && { history: opts.history }),
      })
      process.exit(exitCode)
    })
}
