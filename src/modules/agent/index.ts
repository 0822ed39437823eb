export type { AgentCapability } from './agent-capability.js'
export * from './capability-contracts.js'
export { CommandAgentCapability } from './command-agent.js'
export type { CommandAgentOptions } from './command-agent.js'
export { ScriptedAgentCapability } from './scripted-agent.js'
export type { CapabilityHandler, CapabilityHandlers, RecordedCall } from './scripted-agent.js'
export { extractYamlBlock, parseAgentOutput } from './output-parser.js'
export { FileArtifactInspector, TrustingArtifactInspector } from './artifact-inspector.js'
export type { ArtifactInspector } from './artifact-inspector.js'
