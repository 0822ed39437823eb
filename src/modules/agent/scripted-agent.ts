/**
 * AgentCapability driven by in-process handlers. Used by tests and for dry
 * runs; outputs still pass through the capability schemas.
 */

import { ExternalCapabilityFailureError } from '../../core/errors.js'
import type { PhaseCapability } from '../../core/types.js'
import type { AgentCapability } from './agent-capability.js'
import { CAPABILITY_OUTPUT_SCHEMAS, type CapabilityInputs, type CapabilityOutputs } from './capability-contracts.js'

export type CapabilityHandler<K extends PhaseCapability> = (input: CapabilityInputs[K]) => unknown

export type CapabilityHandlers = { [K in PhaseCapability]?: CapabilityHandler<K> }

export interface RecordedCall {
  capability: PhaseCapability
  input: unknown
}

export class ScriptedAgentCapability implements AgentCapability {
  readonly calls: RecordedCall[] = []

  constructor(private readonly _handlers: CapabilityHandlers = {}) {}

  /** Replace the handler for one capability */
  on<K extends PhaseCapability>(capability: K, handler: CapabilityHandler<K>): this {
    Object.assign(this._handlers, { [capability]: handler })
    return this
  }

  async invoke<K extends PhaseCapability>(capability: K, input: CapabilityInputs[K]): Promise<CapabilityOutputs[K]> {
    this.calls.push({ capability, input })
    const handler: CapabilityHandler<K> | undefined = this._handlers[capability]
    if (handler === undefined) {
      throw new ExternalCapabilityFailureError(`No handler scripted for ${capability}`, { capability })
    }
    const raw = await handler(input)
    const result = CAPABILITY_OUTPUT_SCHEMAS[capability].safeParse(raw)
    if (!result.success) {
      throw new ExternalCapabilityFailureError(`Scripted ${capability} output is invalid`, {
        capability,
        issues: result.error.issues,
      })
    }
    return result.data
  }

  /** Number of recorded invocations of `capability` */
  count(capability: PhaseCapability): number {
    return this.calls.filter((c) => c.capability === capability).length
  }
}
