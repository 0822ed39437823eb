/**
 * Final output of a command that ran phases.
 */

import { exitCodeForStatus } from '../../core/exit-codes.js'
import type { RunResult } from '../../modules/phase-machine/types.js'
import { buildStatusSnapshot } from '../formatters/status-formatter.js'
import { renderRunResult } from '../formatters/run-formatter.js'
import { emitEvent } from '../formatters/streaming.js'
import type { OutputFormat } from './shared.js'

/** Print the outcome of a run and return its exit code */
export function reportRunResult(result: RunResult, outputFormat: OutputFormat): number {
  if (outputFormat === 'json') {
    emitEvent('run:result', {
      status: result.status,
      phase: result.phase,
      reason: result.reason,
      snapshot: buildStatusSnapshot(result.checkpoint),
    })
  } else {
    process.stdout.write('\n' + renderRunResult(result) + '\n')
  }
  return exitCodeForStatus(result.status)
}
