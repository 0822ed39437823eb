/**
 * Types for the threshold optimizer.
 */

import type { ConfidenceLevel, ThresholdRecommendation } from '../../core/types.js'

export type OptimizerStatus = 'ok' | 'insufficient-sample'

/** Statistics of one per-project metric after outlier removal */
export interface MetricSummary {
  parameterName: string
  metric: string
  /** Projects that contributed a value */
  observed: number
  /** Values dropped by the IQR rule */
  excluded: number[]
  mean: number
  stddev: number
  coefficientOfVariation: number
  target: number
  confidence: ConfidenceLevel
}

export interface OptimizerResult {
  status: OptimizerStatus
  /** Number of project records analysed */
  sampleSize: number
  /** Records required before any analysis runs */
  required: number
  recommendations: ThresholdRecommendation[]
  metrics: MetricSummary[]
}
