/**
 * In-process fixtures for phase machine, resume and orchestrator tests:
 * a temp-dir checkpoint store, the memory tracker, a scripted agent, a
 * manual clock and an event recorder.
 */

import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { createEventBus, type EventName, type TypedEventBus } from '../../../core/event-bus.js'
import type { PhasewrightEvents } from '../../../core/event-bus.types.js'
import type { ProjectRecord } from '../../../core/types.js'
import { TrustingArtifactInspector } from '../../agent/artifact-inspector.js'
import { ScriptedAgentCapability, type CapabilityHandlers } from '../../agent/scripted-agent.js'
import { createCheckpointStore, type FileCheckpointStore } from '../../checkpoint/checkpoint-store-impl.js'
import { ComplexityAnalyzer } from '../../complexity/complexity-analyzer.js'
import type { PhasewrightConfig } from '../../config/config-schema.js'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import { InMemoryWorkItemTracker } from '../../work-tracker/memory-tracker.js'
import { PhaseStateMachine } from '../phase-machine.js'
import type { PhaseDefinition, RunRecorder } from '../types.js'
import type { WorkPhaseId } from '../../../core/types.js'

export const T0 = new Date('2026-01-05T09:00:00.000Z')

/** Clock that only moves when told to */
export class ManualClock {
  private _ms: number

  constructor(start: Date = T0) {
    this._ms = start.getTime()
  }

  now = (): Date => new Date(this._ms)

  advanceMinutes(minutes: number): void {
    this._ms += minutes * 60_000
  }
}

export class MemoryRecorder implements RunRecorder {
  readonly records: ProjectRecord[] = []

  record(record: ProjectRecord): void {
    this.records.push(record)
  }
}

/** Payloads by event name */
export type EventLog = { [K in EventName]: PhasewrightEvents[K][] }

const ALL_EVENTS: EventName[] = [
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

function subscribe<K extends EventName>(bus: TypedEventBus, log: EventLog, sequence: EventName[], name: K): void {
  bus.on(name, (payload) => {
    sequence.push(name)
    log[name].push(payload)
  })
}

/** Record every event emitted on `bus` */
export function recordEvents(bus: TypedEventBus, sequence: EventName[] = []): EventLog {
  const log: EventLog = {
    'phase:entered': [],
    'phase:completed': [],
    'item:started': [],
    'item:completed': [],
    'item:split': [],
    'item:decomposed': [],
    'resource:warning': [],
    'verification:attempt': [],
    'verification:divergence': [],
    'approval:required': [],
    'run:suspended': [],
  }
  for (const name of ALL_EVENTS) subscribe(bus, log, sequence, name)
  return log
}

/** Default config with the memory tracker */
export function testConfig(): PhasewrightConfig {
  const config = structuredClone(DEFAULT_CONFIG)
  config.tracker = { kind: 'memory', label: 'phasewright' }
  return config
}

/** Handlers for a project whose every phase succeeds on the first try */
export function happyPathHandlers(items: CapabilityHandlers['product-definition'] = () => ({
  artifacts: ['docs/prd.md'],
  items: [{ title: 'Login form', estimate: { files: 1, loc: 100, dependencies: 0 } }],
})): CapabilityHandlers {
  return {
    infra: () => ({ artifacts: ['package.json'] }),
    'product-definition': items,
    decomposition: ({ split }) => ({
      children: [
        { title: `${split.title} part 1`, estimate: { files: 2, loc: Math.ceil(split.estimate.loc / 2), dependencies: 0 } },
        { title: `${split.title} part 2`, estimate: { files: 2, loc: Math.ceil(split.estimate.loc / 2), dependencies: 0 }, dependsOn: [0] },
      ],
    }),
    architecture: () => ({ artifacts: ['docs/architecture.md'] }),
    implementation: ({ item, subUnit }) => ({ cost: 20_000, evidence: `commit-${item.id}-${String(subUnit)}` }),
    qa: () => ({ bugs: [] }),
    verification: () => ({ tests: { passed: ['suite'], failed: [] }, coverage: 90 }),
    learning: () => ({ notes: 'ok' }),
  }
}

export interface Harness {
  stateDir: string
  config: PhasewrightConfig
  store: FileCheckpointStore
  tracker: InMemoryWorkItemTracker
  agent: ScriptedAgentCapability
  analyzer: ComplexityAnalyzer
  eventBus: TypedEventBus
  /** Event names in emission order */
  sequence: EventName[]
  events: EventLog
  clock: ManualClock
  recorder: MemoryRecorder
  /** Machine over the harness, optionally with replaced phases */
  machine(phases?: Partial<Record<WorkPhaseId, PhaseDefinition>>): PhaseStateMachine
  /** Create the checkpoint of a new run */
  initialize(name?: string): Promise<void>
  cleanup(): Promise<void>
}

export async function createHarness(
  handlers: CapabilityHandlers = happyPathHandlers(),
  config: PhasewrightConfig = testConfig()
): Promise<Harness> {
  const stateDir = await mkdtemp(join(tmpdir(), 'phasewright-machine-'))
  const clock = new ManualClock()
  const store = createCheckpointStore({ stateDir, now: clock.now })
  const tracker = new InMemoryWorkItemTracker()
  const agent = new ScriptedAgentCapability(handlers)
  const analyzer = new ComplexityAnalyzer({ complexity: config.complexity, ceiling: config.budget.ceiling })
  const eventBus = createEventBus()
  const sequence: EventName[] = []
  const events = recordEvents(eventBus, sequence)
  const recorder = new MemoryRecorder()

  const harness: Harness = {
    stateDir,
    config,
    store,
    tracker,
    agent,
    analyzer,
    eventBus,
    sequence,
    events,
    clock,
    recorder,
    machine: (phases) =>
      new PhaseStateMachine({
        store,
        tracker,
        agent,
        analyzer,
        inspector: new TrustingArtifactInspector(),
        config,
        eventBus,
        projectRoot: stateDir,
        recorder,
        now: clock.now,
        ...(phases !== undefined ? { phases } : {}),
      }),
    initialize: async (name = 'todo-api') => {
      await store.initialize(
        { name, request: 'Build a todo API' },
        {
          sessionId: 'session-1',
          sessionBudget: config.budget.session_budget,
          maxVerificationAttempts: config.verification.max_attempts,
        }
      )
    },
    cleanup: async () => {
      await rm(stateDir, { recursive: true, force: true })
    },
  }
  return harness
}
