export { ComplexityAnalyzer } from './complexity-analyzer.js'
export type { ComplexityAnalyzerOptions } from './complexity-analyzer.js'
export type { ComplexityAssessment, DecompositionChild, ScoredChild, SplitRequest, Splitter } from './types.js'
