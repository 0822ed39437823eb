/**
 * `phasewright config` command group
 *
 * Subcommands:
 *   - `phasewright config show`              display merged config (credentials masked)
 *   - `phasewright config get <key>`         print one value by dot-notation key
 *   - `phasewright config set <key> <value>` update a project config value
 */

import type { Command } from 'commander'
import { join } from 'path'
import yaml from 'js-yaml'
import { createConfigSystem, coerceScalar } from '../../modules/config/config-system-impl.js'
import type { ConfigSystemImpl } from '../../modules/config/config-system-impl.js'
import { ConfigError } from '../../core/errors.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE } from '../../core/exit-codes.js'
import { createLogger } from '../../utils/logger.js'
import { deepMask } from '../utils/masking.js'
import { projectRootOf, type ProjectOptions } from './shared.js'

const logger = createLogger('config-cmd')

export interface ConfigCommandOptions extends ProjectOptions {
  format?: 'yaml' | 'json'
}

/** Load the config system, or print why it cannot be loaded */
async function loadSystem(opts: ProjectOptions): Promise<ConfigSystemImpl | number> {
  const system = createConfigSystem({
    projectConfigDir: join(projectRootOf(opts), '.phasewright'),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return EXIT_USAGE
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return EXIT_ERROR
  }
}

function printValue(value: unknown, format: 'yaml' | 'json'): void {
  if (format === 'json') {
    process.stdout.write(JSON.stringify(value, null, 2) + '\n')
  } else if (typeof value === 'object' && value !== null) {
    process.stdout.write(yaml.dump(value))
  } else {
    process.stdout.write(String(value) + '\n')
  }
}

// ---------------------------------------------------------------------------
// `config show`
// ---------------------------------------------------------------------------

export async function runConfigShow(opts: ConfigCommandOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  const format = opts.format ?? 'yaml'
  if (format === 'yaml') {
    process.stdout.write('# phasewright configuration (credentials masked)\n\n')
  }
  printValue(masked, format)
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get`
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value: unknown = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: unknown config key: ${key}\n`)
    return EXIT_USAGE
  }
  printValue(deepMask(value), opts.format ?? 'yaml')
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set`
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ProjectOptions = {}
): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return EXIT_USAGE
  }

  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = coerceScalar(rawValue.trim())
  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return EXIT_USAGE
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`  Error updating configuration: ${message}\n`)
    return EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

function formatOf(raw: string): 'yaml' | 'json' {
  return raw === 'json' ? 'json' : 'yaml'
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View and modify phasewright configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--global-config-dir <dir>', 'Path to the global .phasewright/ directory')
    .action(async (opts: { format: string; projectRoot: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigShow({
        format: formatOf(opts.format),
        projectRoot: opts.projectRoot,
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value (dot-notation key, e.g. budget.ceiling)')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--global-config-dir <dir>', 'Path to the global .phasewright/ directory')
    .action(async (key: string, opts: { format: string; projectRoot: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigGet(key, {
        format: formatOf(opts.format),
        projectRoot: opts.projectRoot,
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a value in the project config file')
    .option('--project-root <dir>', 'Project directory', process.cwd())
    .option('--global-config-dir <dir>', 'Path to the global .phasewright/ directory')
    .action(
      async (key: string, value: string, opts: { projectRoot: string; globalConfigDir?: string }) => {
        const exitCode = await runConfigSet(key, value, {
          projectRoot: opts.projectRoot,
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      }
    )
}
