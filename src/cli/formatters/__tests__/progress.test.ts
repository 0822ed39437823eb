/**
 * Unit tests for progress rendering
 */

import { describe, it, expect } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import { renderProgress } from '../progress.js'

describe('renderProgress', () => {
  it('writes one line per bus event', () => {
    const bus = createEventBus()
    const lines: string[] = []
    renderProgress(bus, (line) => lines.push(line))

    bus.emit('phase:entered', { phase: 'phase3-implementation' })
    bus.emit('item:started', { itemId: '4', title: 'Todo CRUD', subUnits: 2, estimatedResource: 90_000 })
    bus.emit('item:split', { itemId: '4', continuationId: '9', used: 120_000 })
    bus.emit('item:decomposed', { itemId: '5', children: ['6', '7'], category: 'complex' })
    bus.emit('resource:warning', { used: 160_000, budget: 200_000 })
    bus.emit('item:completed', { itemId: '9', actualResource: 30_000 })
    bus.emit('phase:completed', { phase: 'phase3-implementation', durationMs: 90_500 })
    bus.emit('verification:attempt', { attempt: 2, maxAttempts: 3, passed: false, quarantined: [] })
    bus.emit('verification:divergence', { attemptCount: 3, maxAttempts: 3 })
    bus.emit('approval:required', { kind: 'time-budget', phase: 'phase4-qa', options: ['extend', 'proceed'] })
    bus.emit('run:suspended', { phase: 'phase4-qa', reason: 'Agent qa exited with code 1' })

    expect(lines).toEqual([
      '▶ Implementation',
      '  → #4 Todo CRUD (2 sub-units)',
      '  ⤷ #4 split; remainder continues in #9',
      '  ⤷ #5 decomposed into #6, #7',
      '  ! session resources at 160000 of 200000; no new item starts this session',
      '  ✓ #9 done (30000 used)',
      '✓ Implementation (1m 30s)',
      '  verification attempt 2/3: failed',
      '✗ verification diverged after 3 of 3 attempts',
      '? time-budget approval required: extend | proceed',
      '‖ run suspended: Agent qa exited with code 1',
    ])
  })

  it('stops writing once detached', () => {
    const bus = createEventBus()
    const lines: string[] = []
    const detach = renderProgress(bus, (line) => lines.push(line))
    detach()

    bus.emit('phase:entered', { phase: 'phase0-infra' })
    expect(lines).toEqual([])
  })
})
