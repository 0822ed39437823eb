/**
 * Human-readable threshold report.
 */

import type { OptimizerResult } from './types.js'

export function renderThresholdReport(result: OptimizerResult): string {
  if (result.status === 'insufficient-sample') {
    return [
      'Threshold report',
      `  Insufficient sample: ${String(result.sampleSize)} completed project(s), at least ${String(result.required)} required.`,
      '  No recommendations were computed.',
    ].join('\n')
  }

  const lines = ['Threshold report', `  Projects analysed: ${String(result.sampleSize)}`]

  if (result.metrics.length > 0) {
    lines.push('', '  Metrics')
    for (const m of result.metrics) {
      const excluded = m.excluded.length > 0 ? `, ${String(m.excluded.length)} outlier(s) excluded` : ''
      lines.push(
        `    ${m.parameterName}: ${m.metric} = ${(m.mean * 100).toFixed(1)}% ` +
          `(target ${(m.target * 100).toFixed(1)}%, ${String(m.observed)} project(s)${excluded}, confidence ${m.confidence})`
      )
    }
  }

  lines.push('')
  if (result.recommendations.length === 0) {
    lines.push('  No threshold changes recommended.')
    return lines.join('\n')
  }

  lines.push('  Recommendations (advisory; apply with `phasewright optimize apply <parameter> --yes`)')
  for (const rec of result.recommendations) {
    lines.push(`    ${rec.parameterName}: ${String(rec.oldValue)} -> ${String(rec.newValue)} [${rec.confidence}, n=${String(rec.sampleSize)}]`)
    lines.push(`      ${rec.reasoning}`)
  }
  return lines.join('\n')
}
