/**
 * NDJSON event writer for `--output-format json` runs.
 *
 * Each event follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { PhasewrightEvents } from '../../core/event-bus.types.js'

export type LineWriter = (line: string) => void

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line + '\n')
}

export function emitEvent(event: string, data: object, write: LineWriter = stdoutWriter): void {
  write(JSON.stringify({ event, timestamp: new Date().toISOString(), data }))
}

/** Every event the bus carries */
export const BUS_EVENTS: ReadonlyArray<keyof PhasewrightEvents> = [
  'phase:entered',
  'phase:completed',
  'item:started',
  'item:completed',
  'item:split',
  'item:decomposed',
  'resource:warning',
  'verification:attempt',
  'verification:divergence',
  'approval:required',
  'run:suspended',
]

/** Forward every bus event as an NDJSON line; returns a detach function */
export function streamEvents(bus: TypedEventBus, write: LineWriter = stdoutWriter): () => void {
  const detachers = BUS_EVENTS.map((event) => {
    const handler = (payload: object): void => {
      emitEvent(event, payload, write)
    }
    bus.on(event, handler)
    return () => {
      bus.off(event, handler)
    }
  })
  return () => {
    for (const detach of detachers) detach()
  }
}
