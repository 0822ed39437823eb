/**
 * Wire an Orchestrator to the configured backends of a project directory.
 */

import { join, resolve } from 'path'
import type { TypedEventBus } from '../../core/event-bus.js'
import { HISTORY_DB_FILE, SqliteHistoryStore } from '../../persistence/history-store.js'
import type { AgentCapability } from '../agent/agent-capability.js'
import { CommandAgentCapability } from '../agent/command-agent.js'
import { FileArtifactInspector, type ArtifactInspector } from '../agent/artifact-inspector.js'
import { createCheckpointStore } from '../checkpoint/checkpoint-store-impl.js'
import type { PhasewrightConfig } from '../config/config-schema.js'
import { createWorkItemTracker } from '../work-tracker/tracker-factory.js'
import type { WorkItemTracker } from '../work-tracker/work-tracker.js'
import { Orchestrator } from './orchestrator.js'

export interface CreateOrchestratorOptions {
  projectRoot: string
  config: PhasewrightConfig
  eventBus?: TypedEventBus
  handleSignals?: boolean
  /** Replace the configured backends */
  agent?: AgentCapability
  tracker?: WorkItemTracker
  inspector?: ArtifactInspector
}

export interface OrchestratorHandle {
  orchestrator: Orchestrator
  history: SqliteHistoryStore
  stateDir: string
}

export function resolveStateDir(projectRoot: string, config: PhasewrightConfig): string {
  return resolve(projectRoot, config.global.state_dir)
}

export function historyPathOf(projectRoot: string, config: PhasewrightConfig): string {
  return join(resolveStateDir(projectRoot, config), HISTORY_DB_FILE)
}

export function createOrchestrator(options: CreateOrchestratorOptions): OrchestratorHandle {
  const { projectRoot, config } = options
  const stateDir = resolveStateDir(projectRoot, config)
  const history = new SqliteHistoryStore(join(stateDir, HISTORY_DB_FILE))
  const orchestrator = new Orchestrator({
    projectRoot,
    config,
    store: createCheckpointStore({ stateDir }),
    tracker: options.tracker ?? createWorkItemTracker(config.tracker, projectRoot, stateDir),
    agent: options.agent ?? new CommandAgentCapability({ config: config.agent, cwd: projectRoot }),
    inspector: options.inspector ?? new FileArtifactInspector(projectRoot),
    recorder: history,
    ...(options.eventBus !== undefined ? { eventBus: options.eventBus } : {}),
    ...(options.handleSignals !== undefined ? { handleSignals: options.handleSignals } : {}),
  })
  return { orchestrator, history, stateDir }
}
