/**
 * Evaluation of one verification attempt, including the two self-healing
 * exceptions applied before a failure counts against the loop:
 *
 * - flaky tests: a test that failed in at least `flaky_min_failures` of the
 *   last `flaky_window` attempts while other tests passed is quarantined
 * - coverage within `coverage_tolerance` points below target is recorded as
 *   a disclosed gap instead of a failure
 */

import { unionOrdered } from '../../utils/helpers.js'
import type { CapabilityOutputs } from '../agent/capability-contracts.js'
import type { VerificationState } from '../checkpoint/checkpoint-schema.js'
import type { VerificationConfig } from '../config/config-schema.js'

export type VerificationOutput = CapabilityOutputs['verification']

export type CoverageOutcome = 'met' | 'gap' | 'failed'

export interface AttemptEvaluation {
  passed: boolean
  /** Failing tests that count against the gate */
  failures: string[]
  /** Tests quarantined by this attempt */
  newlyQuarantined: string[]
  /** All quarantined tests after this attempt */
  quarantined: string[]
  coverage: CoverageOutcome
  /** Recent runs including this one, trimmed to the flaky window */
  recentRuns: VerificationState['recentRuns']
  message: string
}

export function classifyCoverage(coverage: number, config: VerificationConfig): CoverageOutcome {
  if (coverage >= config.coverage_target) return 'met'
  if (coverage >= config.coverage_target - config.coverage_tolerance) return 'gap'
  return 'failed'
}

export function evaluateAttempt(
  state: VerificationState,
  attempt: number,
  output: VerificationOutput,
  config: VerificationConfig
): AttemptEvaluation {
  const { passed, failed } = output.tests
  const recentRuns = [...state.recentRuns, { attempt, passed: [...passed], failed: [...failed] }].slice(
    -config.flaky_window
  )

  const alreadyQuarantined = new Set(state.quarantinedTests)
  const newlyQuarantined =
    passed.length === 0
      ? []
      : failed.filter(
          (test) =>
            !alreadyQuarantined.has(test) &&
            recentRuns.filter((run) => run.failed.includes(test)).length >= config.flaky_min_failures
        )
  const quarantined = unionOrdered(state.quarantinedTests, newlyQuarantined)
  const excluded = new Set(quarantined)
  const failures = failed.filter((test) => !excluded.has(test))

  const coverage = classifyCoverage(output.coverage, config)
  const ok = failures.length === 0 && coverage !== 'failed'

  const problems: string[] = []
  if (failures.length > 0) problems.push(`${String(failures.length)} failing test(s): ${failures.join(', ')}`)
  if (coverage === 'failed') {
    problems.push(`coverage ${String(output.coverage)}% below target ${String(config.coverage_target)}%`)
  }
  const message = output.message !== '' ? output.message : ok ? 'verification passed' : problems.join('; ')

  return { passed: ok, failures, newlyQuarantined, quarantined, coverage, recentRuns, message }
}
