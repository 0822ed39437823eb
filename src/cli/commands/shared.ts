/**
 * Helpers shared by the run commands: configuration loading, output wiring
 * and the mapping of errors to exit codes.
 */

import { join, resolve } from 'path'
import {
  ApprovalRequiredError,
  CheckpointExistsError,
  CheckpointLockedError,
  CheckpointNotFoundError,
  ConfigError,
  InsufficientSampleError,
  PhasewrightError,
  ReconciliationConflictError,
} from '../../core/errors.js'
import { EXIT_ERROR, EXIT_SUSPENDED, EXIT_USAGE } from '../../core/exit-codes.js'
import { createEventBus } from '../../core/event-bus.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PhasewrightConfig } from '../../modules/config/config-schema.js'
import {
  createOrchestrator,
  type CreateOrchestratorOptions,
  type OrchestratorHandle,
} from '../../modules/orchestrator/factory.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { maskSecrets } from '../utils/masking.js'
import { renderProgress } from '../formatters/progress.js'
import { streamEvents } from '../formatters/streaming.js'

const logger = createLogger('cli')

export type OutputFormat = 'human' | 'json'

export interface ProjectOptions {
  /** Project directory (default: cwd) */
  projectRoot?: string
  /** Path to the global .phasewright/ directory */
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

/** Backends a test can substitute for the configured ones */
export type BackendOverrides = Pick<CreateOrchestratorOptions, 'agent' | 'tracker' | 'inspector'>

export function projectRootOf(opts: ProjectOptions): string {
  return resolve(opts.projectRoot ?? process.cwd())
}

/**
 * Load the merged configuration for a project and apply its log level.
 *
 * @throws {ConfigError} if any layer is invalid
 */
export async function loadProjectConfig(opts: ProjectOptions): Promise<PhasewrightConfig> {
  const projectRoot = projectRootOf(opts)
  const system = createConfigSystem({
    projectConfigDir: join(projectRoot, '.phasewright'),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return config
}

/**
 * Build an orchestrator for the project with progress output attached, run
 * `fn`, then detach and close the history store.
 */
export async function withOrchestrator<T>(
  opts: ProjectOptions & { outputFormat: OutputFormat; backends?: BackendOverrides },
  fn: (handle: OrchestratorHandle) => Promise<T>
): Promise<T> {
  const projectRoot = projectRootOf(opts)
  const config = await loadProjectConfig(opts)
  const eventBus = createEventBus()
  const detach =
    opts.outputFormat === 'json'
      ? streamEvents(eventBus)
      : renderProgress(eventBus, (line) => {
          process.stdout.write(line + '\n')
        })
  const handle = createOrchestrator({
    projectRoot,
    config,
    eventBus,
    handleSignals: true,
    ...opts.backends,
  })
  try {
    return await fn(handle)
  } finally {
    detach()
    handle.history.close()
  }
}

/**
 * Print `err` to stderr and return the exit code it maps to.
 *
 * Usage errors (bad configuration, wrong decision, existing or missing
 * checkpoint) exit 2; a tracker that cannot be reconciled leaves the run
 * resumable and exits 5; everything else is a system error.
 */
export function reportError(err: unknown): number {
  const message = maskSecrets(err instanceof Error ? err.message : String(err))
  if (
    err instanceof ConfigError ||
    err instanceof CheckpointExistsError ||
    err instanceof CheckpointNotFoundError ||
    err instanceof ApprovalRequiredError ||
    err instanceof InsufficientSampleError
  ) {
    process.stderr.write(`Error: ${message}\n`)
    if (err instanceof CheckpointExistsError) {
      process.stderr.write('  Use `phasewright resume` to continue it, or `start --fresh` to discard it.\n')
    }
    return EXIT_USAGE
  }
  if (err instanceof ReconciliationConflictError) {
    process.stderr.write(`Error: ${message}\n  The checkpoint is intact; retry \`phasewright resume\` later.\n`)
    return EXIT_SUSPENDED
  }
  if (err instanceof CheckpointLockedError) {
    process.stderr.write(`Error: ${message}\n`)
    return EXIT_ERROR
  }
  if (err instanceof PhasewrightError) {
    logger.error({ code: err.code, context: err.context }, err.message)
  } else {
    logger.error({ err }, 'Unexpected error')
  }
  process.stderr.write(`Error: ${message}\n`)
  return EXIT_ERROR
}
