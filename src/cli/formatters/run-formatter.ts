/**
 * Summary printed when a run stops, plus the templated reports that go with
 * each outcome.
 */

import { PHASE_NAMES } from '../../core/types.js'
import { renderDisclosures, renderDivergenceReport } from '../../modules/phase-machine/reports.js'
import type { RunResult } from '../../modules/phase-machine/types.js'

export function renderRunResult(result: RunResult): string {
  const { checkpoint } = result
  switch (result.status) {
    case 'done': {
      const disclosures = renderDisclosures(checkpoint)
      const summary = `Project ${checkpoint.project.name} complete: ${String(checkpoint.workProgress.completedItems.length)} item(s) done.`
      return disclosures === '' ? summary : `${summary}\n\n${disclosures}`
    }
    case 'divergence':
      return renderDivergenceReport(checkpoint)
    case 'awaiting-approval': {
      const pending = checkpoint.pendingApproval
      const lines = [`Awaiting approval in ${PHASE_NAMES[result.phase]}: ${result.reason ?? 'approval required'}`]
      if (pending !== null) lines.push(`  Run: phasewright approve <${pending.options.join('|')}>`)
      return lines.join('\n')
    }
    case 'suspended':
      return [
        `Run suspended in ${PHASE_NAMES[result.phase]}: ${result.reason ?? 'unknown reason'}`,
        '  The checkpoint is intact. Run `phasewright resume` to continue.',
      ].join('\n')
  }
}
