/**
 * phasewright - Main module exports
 * Public API surface for embedding the orchestrator
 */

// Core types, errors and exit codes
export * from './core/types.js'
export * from './core/errors.js'
export * from './core/exit-codes.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'

// Event Bus
export type { TypedEventBus, EventName } from './core/event-bus.js'
export type { PhasewrightEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/checkpoint/index.js'
export * from './modules/complexity/index.js'
export * from './modules/agent/index.js'
export * from './modules/work-tracker/index.js'
export * from './modules/phase-machine/index.js'
export * from './modules/resume/index.js'
export * from './modules/threshold-optimizer/index.js'
export * from './modules/orchestrator/index.js'

// Persistence
export * from './persistence/index.js'
