/**
 * Built-in phase definitions in execution order.
 */

import type { WorkPhaseId } from '../../../core/types.js'
import type { PhaseDefinition } from '../types.js'
import { createArchitecturePhase } from './architecture.js'
import { createDecompositionPhase } from './decomposition.js'
import { createDefinitionPhase } from './definition.js'
import { createImplementationPhase } from './implementation.js'
import { createInfraPhase } from './infra.js'
import { createLearningPhase } from './learning.js'
import { createQaPhase } from './qa.js'
import { createVerificationPhase } from './verification.js'

export function createBuiltInPhases(): Record<WorkPhaseId, PhaseDefinition> {
  return {
    'phase0-infra': createInfraPhase(),
    'phase1-definition': createDefinitionPhase(),
    'phase1.5-decomposition': createDecompositionPhase(),
    'phase2-architecture': createArchitecturePhase(),
    'phase3-implementation': createImplementationPhase(),
    'phase4-qa': createQaPhase(),
    'phase5-verification': createVerificationPhase(),
    'phase6-learning': createLearningPhase(),
  }
}
