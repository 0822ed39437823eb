/**
 * ComplexityAnalyzer types
 */

import type { ComplexityCategory, WorkItemEstimate } from '../../core/types.js'

/** Result of scoring one estimate */
export interface ComplexityAssessment {
  score: number
  category: ComplexityCategory
  estimatedResource: number
  /** Present for complex items: validated children that each fit below the complex threshold */
  decompositionAdvice?: ScoredChild[]
}

/** A child proposed by the splitter. `dependsOn` holds indices of earlier children. */
export interface DecompositionChild {
  title: string
  estimate: WorkItemEstimate
  dependsOn: number[]
}

export interface ScoredChild extends DecompositionChild {
  score: number
  category: ComplexityCategory
  estimatedResource: number
}

/** What the splitter is asked to split, with the reasons an earlier proposal was rejected */
export interface SplitRequest {
  title: string
  estimate: WorkItemEstimate
  maxChildScore: number
  maxChildResource: number
  rejected?: string[]
}

/**
 * Produces a split proposal. In production this is the agent's
 * `decomposition` capability; the analyzer only validates what comes back.
 */
export type Splitter = (request: SplitRequest) => Promise<DecompositionChild[]>
