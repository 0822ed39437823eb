/**
 * Unit tests for NDJSON event streaming
 */

import { describe, it, expect } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import { emitEvent, streamEvents } from '../streaming.js'

describe('emitEvent', () => {
  it('writes one JSON object with event, timestamp and data', () => {
    const lines: string[] = []
    emitEvent('run:resumed', { point: { phase: 'phase5-verification' } }, (line) => lines.push(line))

    expect(lines).toHaveLength(1)
    const parsed: unknown = JSON.parse(lines[0] ?? '')
    expect(parsed).toEqual({
      event: 'run:resumed',
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      data: { point: { phase: 'phase5-verification' } },
    })
  })
})

describe('streamEvents', () => {
  it('forwards bus events until detached', () => {
    const bus = createEventBus()
    const lines: string[] = []
    const detach = streamEvents(bus, (line) => lines.push(line))

    bus.emit('item:completed', { itemId: '2', actualResource: 41_000 })
    detach()
    bus.emit('item:completed', { itemId: '3', actualResource: 1 })

    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([
      { event: 'item:completed', timestamp: expect.any(String), data: { itemId: '2', actualResource: 41_000 } },
    ])
  })
})
