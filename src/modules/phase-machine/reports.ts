/**
 * Templated human-readable reports rendered next to the structured data.
 */

import type { Checkpoint } from '../checkpoint/checkpoint-schema.js'

/** Report shown when verification diverges */
export function renderDivergenceReport(checkpoint: Checkpoint): string {
  const { verification, pendingApproval } = checkpoint
  const lines = [
    'Verification divergence',
    `  Attempts: ${String(verification.attemptCount)} of ${String(verification.maxAttempts)}`,
  ]
  if (verification.failureHistory.length > 0) {
    lines.push('  Failure history:')
    for (const failure of verification.failureHistory) {
      lines.push(`    #${String(failure.attempt)} ${failure.timestamp}: ${failure.message}`)
      if (failure.failingTests.length > 0) lines.push(`       tests: ${failure.failingTests.join(', ')}`)
      if (failure.failingItems.length > 0) lines.push(`       items: ${failure.failingItems.join(', ')}`)
    }
  }
  if (pendingApproval !== null) {
    lines.push(`  Options: ${pendingApproval.options.join(' | ')}`)
    lines.push(`  Run: phasewright approve <${pendingApproval.options.join('|')}>`)
  }
  return lines.join('\n')
}

/** Compromises accepted along the way; empty when there are none */
export function renderDisclosures(checkpoint: Checkpoint): string {
  const { verification, workProgress } = checkpoint
  const lines: string[] = []
  if (verification.quarantinedTests.length > 0) {
    lines.push(`  Quarantined flaky tests: ${verification.quarantinedTests.join(', ')}`)
  }
  for (const gap of verification.disclosedGaps) {
    lines.push(
      `  Coverage gap: ${String(gap.actual)}% against a target of ${String(gap.target)}% (attempt ${String(gap.attempt)})`
    )
  }
  if (workProgress.deferredItems.length > 0) {
    lines.push(`  Deferred items: ${workProgress.deferredItems.map((id) => `#${id}`).join(', ')}`)
  }
  return lines.length === 0 ? '' : ['Disclosed compromises', ...lines].join('\n')
}
