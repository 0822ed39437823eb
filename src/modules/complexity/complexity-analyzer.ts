/**
 * ComplexityAnalyzer: scores work-item estimates, classifies them and
 * validates decomposition proposals for items too large to schedule.
 *
 * Scoring and classification are pure. Decomposition delegates the split to
 * a Splitter and accepts the result only if every child fits below the
 * complex threshold and the resource ceiling; one re-request is allowed.
 */

import { createLogger } from '../../utils/logger.js'
import { DecompositionError } from '../../core/errors.js'
import type { ComplexityCategory, WorkItemEstimate } from '../../core/types.js'
import type { ComplexityConfig } from '../config/config-schema.js'
import type {
  ComplexityAssessment,
  DecompositionChild,
  ScoredChild,
  Splitter,
  SplitRequest,
} from './types.js'

const logger = createLogger('complexity')

export interface ComplexityAnalyzerOptions {
  complexity: ComplexityConfig
  /** Hard per-agent resource ceiling */
  ceiling: number
}

export class ComplexityAnalyzer {
  private readonly _config: ComplexityConfig
  private readonly _ceiling: number

  constructor(options: ComplexityAnalyzerOptions) {
    this._config = options.complexity
    this._ceiling = options.ceiling
  }

  /** `files * fileWeight + loc + dependencies * dependencyWeight` */
  computeScore(estimate: WorkItemEstimate): number {
    return (
      estimate.files * this._config.file_weight +
      estimate.loc +
      estimate.dependencies * this._config.dependency_weight
    )
  }

  /**
   * Partition of the non-negative integers: simple `[0, simple_max]`,
   * medium `(simple_max, medium_max]`, complex above.
   */
  classify(score: number): ComplexityCategory {
    if (score <= this._config.simple_max) return 'simple'
    if (score <= this._config.medium_max) return 'medium'
    return 'complex'
  }

  /**
   * Fixed per-unit cost model. Test LOC is derived from implementation LOC
   * by the configured ratio and rounded to a whole line.
   */
  estimateResource(estimate: WorkItemEstimate): number {
    const cost = this._config.resource
    const testLoc = Math.round(estimate.loc * cost.test_loc_ratio)
    return Math.round(
      cost.base_context +
        estimate.files * cost.file_read +
        estimate.loc * cost.implement_per_line +
        testLoc * cost.test_per_line +
        cost.fixed_review
    )
  }

  /** Score, category and resource estimate, without decomposition advice */
  score(estimate: WorkItemEstimate): ComplexityAssessment {
    const score = this.computeScore(estimate)
    return { score, category: this.classify(score), estimatedResource: this.estimateResource(estimate) }
  }

  /** Whether an estimate must be decomposed before it can be scheduled */
  requiresDecomposition(assessment: Pick<ComplexityAssessment, 'category' | 'estimatedResource'>): boolean {
    return assessment.category === 'complex' || assessment.estimatedResource > this._ceiling
  }

  /**
   * Score an item and, when it requires decomposition, attach validated
   * decomposition advice obtained from `splitter`.
   *
   * @throws {DecompositionError} if no valid split is produced after one retry
   */
  async scoreWithAdvice(title: string, estimate: WorkItemEstimate, splitter: Splitter): Promise<ComplexityAssessment> {
    const assessment = this.score(estimate)
    if (!this.requiresDecomposition(assessment)) return assessment
    return { ...assessment, decompositionAdvice: await this.decompose(title, estimate, splitter) }
  }

  /**
   * Return the list of reasons `children` is not an acceptable split of
   * `parent`; empty when valid.
   */
  validateDecomposition(parent: WorkItemEstimate, children: DecompositionChild[]): string[] {
    const problems: string[] = []
    if (children.length < 2) {
      problems.push(`a split needs at least 2 children, got ${String(children.length)}`)
    }

    children.forEach((child, index) => {
      const { score, category, estimatedResource } = this.score(child.estimate)
      if (category === 'complex') {
        problems.push(
          `child ${String(index)} "${child.title}" scores ${String(score)}, above ${String(this._config.medium_max)}`
        )
      }
      if (estimatedResource > this._ceiling) {
        problems.push(
          `child ${String(index)} "${child.title}" needs ${String(estimatedResource)}, above the ceiling ${String(this._ceiling)}`
        )
      }
      for (const dep of child.dependsOn) {
        if (!Number.isInteger(dep) || dep < 0 || dep >= index) {
          problems.push(`child ${String(index)} depends on ${String(dep)}, which is not an earlier child`)
        }
      }
    })

    const coveredLoc = children.reduce((sum, c) => sum + c.estimate.loc, 0)
    if (children.length > 0 && coveredLoc < parent.loc) {
      problems.push(`children cover ${String(coveredLoc)} LOC of the parent's ${String(parent.loc)}`)
    }
    return problems
  }

  /**
   * Obtain a split from `splitter` and validate it, re-requesting once with
   * the rejection reasons.
   *
   * @throws {DecompositionError} if the second proposal is also invalid
   */
  async decompose(title: string, estimate: WorkItemEstimate, splitter: Splitter): Promise<ScoredChild[]> {
    const request: SplitRequest = {
      title,
      estimate,
      maxChildScore: this._config.medium_max,
      maxChildResource: this._ceiling,
    }

    let rejected: string[] = []
    for (let attempt = 1; attempt <= 2; attempt++) {
      const children = await splitter(attempt === 1 ? request : { ...request, rejected })
      rejected = this.validateDecomposition(estimate, children)
      if (rejected.length === 0) {
        logger.info({ title, children: children.length, attempt }, 'Decomposition accepted')
        return children.map((child) => ({ ...child, ...this.score(child.estimate) }))
      }
      logger.warn({ title, attempt, problems: rejected }, 'Decomposition rejected')
    }

    throw new DecompositionError(
      `Work item "${title}" could not be decomposed below the complex threshold; its estimate is likely wrong`,
      { title, estimate, problems: rejected }
    )
  }
}
