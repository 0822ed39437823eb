/**
 * Unit tests for ThresholdOptimizer
 */

import { describe, it, expect } from 'vitest'
import {
  ThresholdOptimizer,
  confidenceFor,
  roundToStep,
  requireSufficientSample,
} from '../threshold-optimizer.js'
import { renderThresholdReport } from '../report.js'
import { DEFAULT_BUDGET, DEFAULT_COMPLEXITY, DEFAULT_OPTIMIZER } from '../../config/defaults.js'
import { InsufficientSampleError } from '../../../core/errors.js'
import type { ItemOutcome, ProjectRecord } from '../../../core/types.js'

function outcome(overrides: Partial<ItemOutcome> = {}): ItemOutcome {
  return {
    itemId: '1',
    category: 'simple',
    complexityScore: 200,
    estimatedResource: 26_500,
    actualResource: null,
    requiredSplit: false,
    commitCount: 1,
    ...overrides,
  }
}

function record(index: number, items: ItemOutcome[]): ProjectRecord {
  return {
    id: `project-${String(index)}@2026-01-01T00:00:00.000Z`,
    projectName: `project-${String(index)}`,
    completedAt: '2026-01-02T00:00:00.000Z',
    durationMs: 86_400_000,
    verificationAttempts: 1,
    diverged: false,
    items,
    phases: [],
  }
}

/** Two near-boundary simple items, one of which split: rate 0.5 */
function halfSplit(index: number): ProjectRecord {
  return record(index, [
    outcome({ itemId: '1', complexityScore: 450, requiredSplit: true }),
    outcome({ itemId: '2', complexityScore: 480 }),
  ])
}

function makeOptimizer(overrides: { simple_max?: number; medium_max?: number } = {}): ThresholdOptimizer {
  return new ThresholdOptimizer({
    optimizer: DEFAULT_OPTIMIZER,
    complexity: { ...DEFAULT_COMPLEXITY, ...overrides },
    budget: DEFAULT_BUDGET,
  })
}

describe('ThresholdOptimizer sample gate', () => {
  it('computes nothing with 4 records', () => {
    const history = [1, 2, 3, 4].map(halfSplit)
    const result = makeOptimizer().analyze(history)
    expect(result).toEqual({
      status: 'insufficient-sample',
      sampleSize: 4,
      required: 5,
      recommendations: [],
      metrics: [],
    })
  })

  it('analyses 5 records', () => {
    const history = [1, 2, 3, 4, 5].map(halfSplit)
    const result = makeOptimizer().analyze(history)
    expect(result.status).toBe('ok')
    expect(result.sampleSize).toBe(5)
  })

  it('requireSufficientSample throws on an insufficient result', () => {
    const result = makeOptimizer().analyze([halfSplit(1)])
    expect(() => requireSufficientSample(result)).toThrow(InsufficientSampleError)
  })
})

describe('ThresholdOptimizer simple boundary', () => {
  it('excludes an outlier project and recommends a lower simple_max', () => {
    const outlier = record(5, [outcome({ complexityScore: 490, requiredSplit: true })])
    const history = [...[1, 2, 3, 4].map(halfSplit), outlier]

    const result = makeOptimizer().analyze(history)

    expect(result.metrics).toHaveLength(1)
    const metric = result.metrics[0]
    expect(metric?.parameterName).toBe('complexity.simple_max')
    expect(metric?.observed).toBe(5)
    expect(metric?.excluded).toEqual([1])
    expect(metric?.mean).toBe(0.5)
    expect(metric?.stddev).toBe(0)
    expect(metric?.confidence).toBe('low')

    expect(result.recommendations).toEqual([
      expect.objectContaining({
        parameterName: 'complexity.simple_max',
        oldValue: 500,
        newValue: 450,
        confidence: 'low',
        sampleSize: 4,
      }),
    ])
  })

  it('recommends nothing when the split rate is within target', () => {
    const history = [1, 2, 3, 4, 5].map((i) =>
      record(i, [outcome({ complexityScore: 450 }), outcome({ itemId: '2', complexityScore: 460 })])
    )
    const result = makeOptimizer().analyze(history)
    expect(result.metrics[0]?.mean).toBe(0)
    expect(result.recommendations).toEqual([])
  })

  it('ignores items below the boundary band', () => {
    // band is (400, 500]
    const history = [1, 2, 3, 4, 5].map((i) => record(i, [outcome({ complexityScore: 400, requiredSplit: true })]))
    const result = makeOptimizer().analyze(history)
    expect(result.metrics).toEqual([])
    expect(result.recommendations).toEqual([])
  })

  it('reports high confidence for 30 consistent projects', () => {
    const history = Array.from({ length: 30 }, (_, i) => halfSplit(i))
    const result = makeOptimizer().analyze(history)
    expect(result.recommendations[0]?.confidence).toBe('high')
  })
})

describe('ThresholdOptimizer medium boundary', () => {
  it('never proposes a medium_max at or below simple_max', () => {
    // band is (1480, 1500]; 1500 * 0.9 = 1350 <= 1400
    const history = [1, 2, 3, 4, 5].map((i) =>
      record(i, [outcome({ category: 'medium', complexityScore: 1490, commitCount: 3 })])
    )
    const result = makeOptimizer({ simple_max: 1400 }).analyze(history)
    expect(result.metrics.map((m) => m.parameterName)).toEqual(['complexity.medium_max'])
    expect(result.metrics[0]?.mean).toBe(1)
    expect(result.recommendations).toEqual([])
  })

  it('recommends a lower medium_max when too many boundary items needed extra commits', () => {
    // band is (1300, 1500]
    const history = [1, 2, 3, 4, 5].map((i) =>
      record(i, [outcome({ category: 'medium', complexityScore: 1450, commitCount: 4 })])
    )
    const result = makeOptimizer().analyze(history)
    expect(result.recommendations.map((r) => [r.parameterName, r.oldValue, r.newValue])).toEqual([
      ['complexity.medium_max', 1500, 1350],
    ])
  })
})

describe('ThresholdOptimizer budget parameters', () => {
  it('recommends a lower ceiling when items overflowed it', () => {
    const history = [1, 2, 3, 4, 5].map((i) =>
      record(i, [
        outcome({ itemId: '1', complexityScore: 900, estimatedResource: 120_000, actualResource: 160_000 }),
        outcome({ itemId: '2', complexityScore: 900, estimatedResource: 120_000, actualResource: 110_000 }),
      ])
    )
    const result = makeOptimizer().analyze(history)
    const ceiling = result.metrics.find((m) => m.parameterName === 'budget.ceiling')
    expect(ceiling?.mean).toBe(0.5)
    expect(result.metrics.find((m) => m.parameterName === 'budget.proceed_max')).toBeUndefined()
    expect(result.recommendations.map((r) => [r.parameterName, r.newValue])).toEqual([['budget.ceiling', 135_000]])
  })

  it('recommends a lower proceed_max when single-unit items ran over it', () => {
    const history = [1, 2, 3, 4, 5].map((i) =>
      record(i, [outcome({ estimatedResource: 90_000, actualResource: 105_000 })])
    )
    const result = makeOptimizer().analyze(history)
    expect(result.recommendations.map((r) => [r.parameterName, r.newValue])).toEqual([['budget.proceed_max', 90_000]])
  })

  it('makes no budget recommendation without overflow', () => {
    const history = [1, 2, 3, 4, 5].map((i) =>
      record(i, [outcome({ estimatedResource: 26_500, actualResource: 30_000 })])
    )
    const result = makeOptimizer().analyze(history)
    expect(result.metrics.map((m) => m.mean)).toEqual([0, 0])
    expect(result.recommendations).toEqual([])
  })
})

describe('confidenceFor', () => {
  it('applies the sample-size and variation thresholds', () => {
    expect(confidenceFor(30, 0.1)).toBe('high')
    expect(confidenceFor(30, 0.15)).toBe('medium')
    expect(confidenceFor(29, 0.1)).toBe('medium')
    expect(confidenceFor(10, 0.24)).toBe('medium')
    expect(confidenceFor(10, 0.25)).toBe('low')
    expect(confidenceFor(9, 0)).toBe('low')
  })
})

describe('roundToStep', () => {
  it('rounds to the nearest 50', () => {
    expect(roundToStep(1350)).toBe(1350)
    expect(roundToStep(1374)).toBe(1350)
    expect(roundToStep(1375)).toBe(1400)
  })
})

describe('renderThresholdReport', () => {
  it('states the sample shortfall', () => {
    const report = renderThresholdReport(makeOptimizer().analyze([halfSplit(1)]))
    expect(report.split('\n')).toEqual([
      'Threshold report',
      '  Insufficient sample: 1 completed project(s), at least 5 required.',
      '  No recommendations were computed.',
    ])
  })

  it('lists recommendations with their confidence', () => {
    const report = renderThresholdReport(makeOptimizer().analyze([1, 2, 3, 4, 5].map(halfSplit)))
    expect(report).toContain('    complexity.simple_max: 500 -> 450 [low, n=5]')
  })
})
