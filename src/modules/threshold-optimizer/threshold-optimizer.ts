/**
 * ThresholdOptimizer: offline analysis of completed projects that
 * recommends changes to the tunable thresholds.
 *
 * Each tunable has a per-project metric and a target. Per-project values are
 * filtered with the IQR rule before the mean is taken; a recommendation is
 * made only when the mean is above the target. Nothing here writes
 * configuration: recommendations are advisory and applied separately.
 */

import type { ConfidenceLevel, ItemOutcome, ProjectRecord, ThresholdRecommendation } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { InsufficientSampleError } from '../../core/errors.js'
import type { BudgetConfig, ComplexityConfig, OptimizerConfig } from '../config/config-schema.js'
import { coefficientOfVariation, mean, removeOutliersIqr, stddev } from './statistics.js'
import type { MetricSummary, OptimizerResult } from './types.js'

const logger = createLogger('optimizer')

/** Recommended values are rounded to this step */
const VALUE_STEP = 50

export interface ThresholdOptimizerOptions {
  optimizer: OptimizerConfig
  complexity: ComplexityConfig
  budget: BudgetConfig
}

/**
 * High: n >= 30 and cv < 0.15. Medium: n >= 10 and cv < 0.25. Low otherwise.
 */
export function confidenceFor(sampleSize: number, cv: number): ConfidenceLevel {
  if (sampleSize >= 30 && cv < 0.15) return 'high'
  if (sampleSize >= 10 && cv < 0.25) return 'medium'
  return 'low'
}

export function roundToStep(value: number, step = VALUE_STEP): number {
  return Math.round(value / step) * step
}

function rate(items: readonly ItemOutcome[], predicate: (item: ItemOutcome) => boolean): number | null {
  if (items.length === 0) return null
  return items.filter(predicate).length / items.length
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`
}

interface TunableAnalysis {
  parameterName: string
  metric: string
  target: number
  oldValue: number
  /** Metric value of one project; null when the project has no relevant items */
  valueOf: (record: ProjectRecord) => number | null
  /** Proposed value when the metric is above target; null when no valid change exists */
  propose: () => number | null
  explain: (observed: number, projects: number, newValue: number) => string
}

export class ThresholdOptimizer {
  private readonly _options: ThresholdOptimizerOptions

  constructor(options: ThresholdOptimizerOptions) {
    this._options = options
  }

  /**
   * Analyse `history`. Below `min_history` records nothing is computed and
   * the status is `insufficient-sample`.
   */
  analyze(history: readonly ProjectRecord[]): OptimizerResult {
    const required = this._options.optimizer.min_history
    if (history.length < required) {
      logger.info({ sampleSize: history.length, required }, 'Insufficient history for threshold analysis')
      return { status: 'insufficient-sample', sampleSize: history.length, required, recommendations: [], metrics: [] }
    }

    const metrics: MetricSummary[] = []
    const recommendations: ThresholdRecommendation[] = []

    for (const analysis of this._analyses()) {
      const values = history.map(analysis.valueOf).filter((v): v is number => v !== null)
      if (values.length === 0) continue

      const { kept, excluded } = removeOutliersIqr(values)
      const observed = mean(kept)
      const cv = coefficientOfVariation(kept)
      const confidence = confidenceFor(kept.length, cv)
      if (excluded.length > 0) {
        logger.info({ parameter: analysis.parameterName, excluded }, 'Outlier projects excluded')
      }
      metrics.push({
        parameterName: analysis.parameterName,
        metric: analysis.metric,
        observed: values.length,
        excluded,
        mean: observed,
        stddev: stddev(kept),
        coefficientOfVariation: cv,
        target: analysis.target,
        confidence,
      })

      if (observed <= analysis.target) continue
      const newValue = analysis.propose()
      if (newValue === null || newValue === analysis.oldValue) continue

      recommendations.push({
        parameterName: analysis.parameterName,
        oldValue: analysis.oldValue,
        newValue,
        confidence,
        sampleSize: kept.length,
        reasoning: analysis.explain(observed, kept.length, newValue),
      })
    }

    logger.info({ sampleSize: history.length, recommendations: recommendations.length }, 'Threshold analysis complete')
    return { status: 'ok', sampleSize: history.length, required, recommendations, metrics }
  }

  private _analyses(): TunableAnalysis[] {
    const { optimizer, complexity, budget } = this._options
    const step = optimizer.adjustment_step
    const band = optimizer.boundary_band

    const simpleFloor = complexity.simple_max * (1 - band)
    const mediumFloor = complexity.medium_max - band * (complexity.medium_max - complexity.simple_max)

    return [
      {
        parameterName: 'complexity.simple_max',
        metric: 'split rate of simple items near the boundary',
        target: optimizer.simple_split_target,
        oldValue: complexity.simple_max,
        valueOf: (record) =>
          rate(
            record.items.filter((i) => i.complexityScore > simpleFloor && i.complexityScore <= complexity.simple_max),
            (i) => i.requiredSplit
          ),
        propose: () => {
          const value = roundToStep(complexity.simple_max * (1 - step))
          return value > 0 ? value : null
        },
        explain: (observed, projects, newValue) =>
          `${percent(observed)} of simple items scoring above ${String(Math.round(simpleFloor))} needed a split ` +
          `(target ${percent(optimizer.simple_split_target)}) across ${String(projects)} project(s); ` +
          `lower complexity.simple_max from ${String(complexity.simple_max)} to ${String(newValue)}`,
      },
      {
        parameterName: 'complexity.medium_max',
        metric: `share of medium items near the boundary needing ${String(optimizer.medium_commit_threshold)}+ commits`,
        target: optimizer.medium_commit_target,
        oldValue: complexity.medium_max,
        valueOf: (record) =>
          rate(
            record.items.filter((i) => i.complexityScore > mediumFloor && i.complexityScore <= complexity.medium_max),
            (i) => i.commitCount >= optimizer.medium_commit_threshold
          ),
        propose: () => {
          const value = roundToStep(complexity.medium_max * (1 - step))
          return value > complexity.simple_max ? value : null
        },
        explain: (observed, projects, newValue) =>
          `${percent(observed)} of medium items scoring above ${String(Math.round(mediumFloor))} needed ` +
          `${String(optimizer.medium_commit_threshold)} or more commits (target ${percent(optimizer.medium_commit_target)}) ` +
          `across ${String(projects)} project(s); lower complexity.medium_max from ${String(complexity.medium_max)} to ${String(newValue)}`,
      },
      {
        parameterName: 'budget.ceiling',
        metric: 'rate of items whose actual usage exceeded the ceiling',
        target: 0,
        oldValue: budget.ceiling,
        valueOf: (record) =>
          rate(
            record.items.filter((i) => i.actualResource !== null),
            (i) => (i.actualResource ?? 0) > budget.ceiling
          ),
        propose: () => Math.max(budget.proceed_max, roundToStep(budget.ceiling * (1 - step))),
        explain: (observed, projects, newValue) =>
          `${percent(observed)} of implemented items overflowed the ceiling of ${String(budget.ceiling)} ` +
          `across ${String(projects)} project(s) (target 0%); lower budget.ceiling to ${String(newValue)}`,
      },
      {
        parameterName: 'budget.proceed_max',
        metric: 'rate of single-unit items whose actual usage exceeded proceed_max',
        target: 0,
        oldValue: budget.proceed_max,
        valueOf: (record) =>
          rate(
            record.items.filter((i) => i.actualResource !== null && i.estimatedResource < budget.proceed_max),
            (i) => (i.actualResource ?? 0) > budget.proceed_max
          ),
        propose: () => {
          const value = roundToStep(budget.proceed_max * (1 - step))
          return value > 0 ? value : null
        },
        explain: (observed, projects, newValue) =>
          `${percent(observed)} of items scheduled as one unit used more than ${String(budget.proceed_max)} ` +
          `across ${String(projects)} project(s) (target 0%); lower budget.proceed_max to ${String(newValue)}`,
      },
    ]
  }
}

/**
 * For callers that cannot proceed without a computed result.
 *
 * @throws {InsufficientSampleError} if the history was below the minimum
 */
export function requireSufficientSample(result: OptimizerResult): OptimizerResult {
  if (result.status === 'insufficient-sample') {
    throw new InsufficientSampleError(result.sampleSize, result.required)
  }
  return result
}

export function createThresholdOptimizer(options: ThresholdOptimizerOptions): ThresholdOptimizer {
  return new ThresholdOptimizer(options)
}
