/**
 * Human-readable progress lines rendered from the event bus during a run.
 */

import { PHASE_NAMES } from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { PhasewrightEvents } from '../../core/event-bus.types.js'
import { formatDuration } from '../../utils/helpers.js'
import { BUS_EVENTS, type LineWriter } from './streaming.js'

type Renderers = { [K in keyof PhasewrightEvents]: (payload: PhasewrightEvents[K]) => string }

export const PROGRESS_RENDERERS: Renderers = {
  'phase:entered': ({ phase }) => `▶ ${PHASE_NAMES[phase]}`,
  'phase:completed': ({ phase, durationMs }) => `✓ ${PHASE_NAMES[phase]} (${formatDuration(durationMs)})`,
  'item:started': ({ itemId, title, subUnits }) =>
    `  → #${itemId} ${title} (${String(subUnits)} sub-unit${subUnits === 1 ? '' : 's'})`,
  'item:completed': ({ itemId, actualResource }) => `  ✓ #${itemId} done (${String(actualResource)} used)`,
  'item:split': ({ itemId, continuationId }) => `  ⤷ #${itemId} split; remainder continues in #${continuationId}`,
  'item:decomposed': ({ itemId, children }) =>
    `  ⤷ #${itemId} decomposed into ${children.map((id) => `#${id}`).join(', ')}`,
  'resource:warning': ({ used, budget }) =>
    `  ! session resources at ${String(used)} of ${String(budget)}; no new item starts this session`,
  'verification:attempt': ({ attempt, maxAttempts, passed }) =>
    `  verification attempt ${String(attempt)}/${String(maxAttempts)}: ${passed ? 'passed' : 'failed'}`,
  'verification:divergence': ({ attemptCount, maxAttempts }) =>
    `✗ verification diverged after ${String(attemptCount)} of ${String(maxAttempts)} attempts`,
  'approval:required': ({ kind, options }) => `? ${kind} approval required: ${options.join(' | ')}`,
  'run:suspended': ({ reason }) => `‖ run suspended: ${reason}`,
}

function attach<K extends keyof PhasewrightEvents>(bus: TypedEventBus, event: K, write: LineWriter): () => void {
  const render: (payload: PhasewrightEvents[K]) => string = PROGRESS_RENDERERS[event]
  const handler = (payload: PhasewrightEvents[K]): void => {
    write(render(payload))
  }
  bus.on(event, handler)
  return () => {
    bus.off(event, handler)
  }
}

/** Print a progress line for every bus event; returns a detach function */
export function renderProgress(bus: TypedEventBus, write: LineWriter): () => void {
  const detachers = BUS_EVENTS.map((event) => attach(bus, event, write))
  return () => {
    for (const detach of detachers) detach()
  }
}
