/**
 * AgentCapability that runs the configured agent CLI once per invocation.
 *
 * The request `{ capability, input }` is written to stdin as JSON; the result
 * is read from stdout (see output-parser.ts).
 */

import { ExternalCapabilityFailureError } from '../../core/errors.js'
import type { PhaseCapability } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { runCommand, type CommandRunner } from '../../utils/process.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { AgentConfig } from '../config/config-schema.js'
import type { AgentCapability } from './agent-capability.js'
import { CAPABILITY_OUTPUT_SCHEMAS, type CapabilityInputs, type CapabilityOutputs } from './capability-contracts.js'
import { parseAgentOutput } from './output-parser.js'

const logger = createLogger('agent:command')

export interface CommandAgentOptions {
  config: AgentConfig
  cwd: string
  runner?: CommandRunner
}

export class CommandAgentCapability implements AgentCapability {
  private readonly _config: AgentConfig
  private readonly _cwd: string
  private readonly _run: CommandRunner

  constructor(options: CommandAgentOptions) {
    this._config = options.config
    this._cwd = options.cwd
    this._run = options.runner ?? runCommand
  }

  async invoke<K extends PhaseCapability>(capability: K, input: CapabilityInputs[K]): Promise<CapabilityOutputs[K]> {
    const startedAt = Date.now()
    const request = JSON.stringify({ capability, input })
    logger.debug({ capability, command: this._config.command }, 'Invoking agent')

    const result = await this._run(this._config.command, [...this._config.args, '--capability', capability], {
      cwd: this._cwd,
      input: request,
      timeoutMs: this._config.timeout_ms,
    })

    if (result.timedOut) {
      throw new ExternalCapabilityFailureError(
        `Agent ${capability} timed out after ${String(this._config.timeout_ms)}ms`,
        { capability }
      )
    }
    if (result.code !== 0) {
      throw new ExternalCapabilityFailureError(`Agent ${capability} exited with code ${String(result.code)}`, {
        capability,
        stderr: maskSecrets(result.stderr).slice(0, 2000),
      })
    }

    const { parsed, error } = parseAgentOutput(result.stdout, CAPABILITY_OUTPUT_SCHEMAS[capability])
    if (parsed === null) {
      throw new ExternalCapabilityFailureError(`Agent ${capability} returned unusable output: ${error ?? 'unknown'}`, {
        capability,
      })
    }

    logger.debug({ capability, durationMs: Date.now() - startedAt }, 'Agent completed')
    return parsed
  }
}
