export {
  ThresholdOptimizer,
  createThresholdOptimizer,
  confidenceFor,
  roundToStep,
  requireSufficientSample,
} from './threshold-optimizer.js'
export type { ThresholdOptimizerOptions } from './threshold-optimizer.js'
export { mean, stddev, coefficientOfVariation, quantile, removeOutliersIqr } from './statistics.js'
export type { IqrFilterResult } from './statistics.js'
export type { MetricSummary, OptimizerResult, OptimizerStatus } from './types.js'
export { renderThresholdReport } from './report.js'
