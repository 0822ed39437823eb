/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  coerceScalar,
  getByPath,
  setByPath,
  ENV_VAR_MAP,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  PhasewrightConfigSchema,
  PartialPhasewrightConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  PhasewrightConfig,
  PartialPhasewrightConfig,
  ComplexityConfig,
  BudgetConfig,
  VerificationConfig,
  OptimizerConfig,
  PhasesConfig,
  TrackerConfig,
  AgentConfig,
  ResourceCostModel,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
