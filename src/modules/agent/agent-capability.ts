/**
 * AgentCapability: the opaque, polymorphic agent the orchestrator delegates
 * creative work to. One variant per phase capability.
 */

import type { PhaseCapability } from '../../core/types.js'
import type { CapabilityInputs, CapabilityOutputs } from './capability-contracts.js'

export interface AgentCapability {
  /**
   * Run `capability` and return its validated output.
   * @throws {ExternalCapabilityFailureError} if the agent fails or its output is invalid
   */
  invoke<K extends PhaseCapability>(capability: K, input: CapabilityInputs[K]): Promise<CapabilityOutputs[K]>
}
