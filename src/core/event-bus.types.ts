/**
 * PhasewrightEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g., "phase:entered", "item:split")
 */

import type { ApprovalDecision } from '../modules/checkpoint/checkpoint-schema.js'
import type { ComplexityCategory, ItemId, PhaseId, WorkPhaseId } from './types.js'

export interface PhasewrightEvents {
  // -------------------------------------------------------------------------
  // Phase lifecycle
  // -------------------------------------------------------------------------

  'phase:entered': { phase: WorkPhaseId }

  'phase:completed': { phase: WorkPhaseId; durationMs: number }

  // -------------------------------------------------------------------------
  // Work items
  // -------------------------------------------------------------------------

  'item:started': { itemId: ItemId; title: string; subUnits: number; estimatedResource: number }

  'item:completed': { itemId: ItemId; actualResource: number }

  /** A mid-item split closed `itemId` early and created `continuationId` */
  'item:split': { itemId: ItemId; continuationId: ItemId; used: number }

  /** An item was replaced by smaller children */
  'item:decomposed': { itemId: ItemId; children: ItemId[]; category: ComplexityCategory }

  // -------------------------------------------------------------------------
  // Resources
  // -------------------------------------------------------------------------

  /** Session usage crossed the approaching-limit ratio */
  'resource:warning': { used: number; budget: number }

  // -------------------------------------------------------------------------
  // Verification
  // -------------------------------------------------------------------------

  'verification:attempt': { attempt: number; maxAttempts: number; passed: boolean; quarantined: string[] }

  'verification:divergence': { attemptCount: number; maxAttempts: number }

  // -------------------------------------------------------------------------
  // Run control
  // -------------------------------------------------------------------------

  'approval:required': { kind: 'time-budget' | 'divergence'; phase: WorkPhaseId; options: ApprovalDecision[] }

  'run:suspended': { phase: PhaseId; reason: string }
}
