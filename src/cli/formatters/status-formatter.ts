/**
 * Status formatter for the `phasewright status` command.
 */

import type { Checkpoint } from '../../modules/checkpoint/checkpoint-schema.js'
import type { StatusSnapshot } from '../types/status.js'

export function buildStatusSnapshot(checkpoint: Checkpoint): StatusSnapshot {
  const { workProgress, resourceTracking, verification, pendingApproval } = checkpoint
  return {
    project: checkpoint.project.name,
    request: checkpoint.project.request,
    sessionId: checkpoint.session.id,
    lastUpdated: checkpoint.project.lastUpdated,
    phase: {
      current: checkpoint.phase.current,
      name: checkpoint.phase.name,
      status: checkpoint.phase.status,
      startedAt: checkpoint.phase.startedAt,
    },
    phasesCompleted: checkpoint.phasesCompleted,
    items: {
      total: workProgress.totalItems,
      open: workProgress.openItems.length,
      completed: workProgress.completedItems.length,
      inProgress: workProgress.inProgressItem,
      flagged: workProgress.flaggedItems.length,
      deferred: workProgress.deferredItems.length,
    },
    resources: {
      used: resourceTracking.used,
      budget: resourceTracking.budget,
      cumulativeUsed: resourceTracking.cumulativeUsed,
      thresholdExceeded: resourceTracking.thresholdExceeded,
    },
    verification: {
      attemptCount: verification.attemptCount,
      maxAttempts: verification.maxAttempts,
      divergences: verification.divergences,
      quarantinedTests: verification.quarantinedTests,
    },
    qaCycles: checkpoint.qaCycles,
    pendingApproval:
      pendingApproval === null
        ? null
        : { kind: pendingApproval.kind, options: pendingApproval.options, reason: pendingApproval.reason },
    resumeHint: checkpoint.resumeHint,
  }
}

/**
 * Render a human-readable status report.
 *
 * Output sections:
 *  - Header: project name, phase and status
 *  - Item counts table: Open | Completed | Flagged | Deferred | Total
 *  - Resource usage and verification attempts
 *  - Pending approval, when there is one
 *  - Next step
 */
export function renderStatusHuman(snapshot: StatusSnapshot): string {
  const lines: string[] = []

  lines.push(`Project ${snapshot.project}  Phase: ${snapshot.phase.name}  Status: ${snapshot.phase.status}`)
  lines.push('')

  const headers = ['Open', 'Completed', 'Flagged', 'Deferred', 'Total']
  const values = [
    String(snapshot.items.open),
    String(snapshot.items.completed),
    String(snapshot.items.flagged),
    String(snapshot.items.deferred),
    String(snapshot.items.total),
  ]
  const colWidths = headers.map((h, i) => Math.max(h.length, values[i]?.length ?? 0))
  lines.push(headers.map((h, i) => h.padEnd(colWidths[i] ?? 0)).join('  ').trimEnd())
  lines.push(colWidths.map((w) => '-'.repeat(w)).join('  '))
  lines.push(values.map((v, i) => v.padEnd(colWidths[i] ?? 0)).join('  ').trimEnd())

  lines.push('')
  if (snapshot.items.inProgress !== null) {
    lines.push(`In progress: #${snapshot.items.inProgress}`)
  }
  lines.push(
    `Session resources: ${String(snapshot.resources.used)} / ${String(snapshot.resources.budget)}` +
      (snapshot.resources.thresholdExceeded ? ' (approaching limit)' : '')
  )
  lines.push(
    `Verification attempts: ${String(snapshot.verification.attemptCount)} / ${String(snapshot.verification.maxAttempts)}`
  )
  if (snapshot.verification.quarantinedTests.length > 0) {
    lines.push(`Quarantined tests: ${snapshot.verification.quarantinedTests.join(', ')}`)
  }

  if (snapshot.pendingApproval !== null) {
    lines.push('')
    lines.push(`Awaiting approval (${snapshot.pendingApproval.kind}): ${snapshot.pendingApproval.reason}`)
    lines.push(`  phasewright approve <${snapshot.pendingApproval.options.join('|')}>`)
  }

  lines.push('')
  lines.push(`Next: ${snapshot.resumeHint}`)
  return lines.join('\n')
}
