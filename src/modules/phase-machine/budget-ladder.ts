/**
 * Budget ladder: decides how an item is scheduled from its resource estimate.
 *
 *   estimate <  proceed_max            one unit
 *   proceed_max <= estimate <= ceiling  2..max_sub_units checkpointed sub-units
 *   estimate >  ceiling, or complex    refused; routed to decomposition
 */

import { ResourceCeilingExceededError } from '../../core/errors.js'
import type { BudgetConfig } from '../config/config-schema.js'
import type { WorkItem } from '../checkpoint/checkpoint-schema.js'

export interface ItemPlan {
  subUnits: number
}

/**
 * @throws {ResourceCeilingExceededError} if the item must never be scheduled directly
 */
export function planItem(
  item: Pick<WorkItem, 'id' | 'estimatedResource' | 'complexityCategory'>,
  budget: BudgetConfig
): ItemPlan {
  const estimate = item.estimatedResource
  if (item.complexityCategory === 'complex') {
    throw new ResourceCeilingExceededError(item.id, estimate, budget.ceiling, { reason: 'complex' })
  }
  if (estimate > budget.ceiling) {
    throw new ResourceCeilingExceededError(item.id, estimate, budget.ceiling, { reason: 'estimate' })
  }
  if (estimate < budget.proceed_max) {
    return { subUnits: 1 }
  }
  const halfStep = budget.proceed_max / 2
  return { subUnits: Math.min(budget.max_sub_units, Math.max(2, Math.ceil(estimate / halfStep))) }
}
