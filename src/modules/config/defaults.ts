/**
 * Built-in default values for the phasewright configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  PhasewrightConfig,
  GlobalSettings,
  ComplexityConfig,
  BudgetConfig,
  VerificationConfig,
  PhasesConfig,
  OptimizerConfig,
} from './config-schema.js'

// ---------------------------------------------------------------------------
// Section defaults
// ---------------------------------------------------------------------------

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
  state_dir: '.phasewright',
}

export const DEFAULT_COMPLEXITY: ComplexityConfig = {
  file_weight: 100,
  dependency_weight: 50,
  simple_max: 500,
  medium_max: 1500,
  resource: {
    base_context: 10_000,
    file_read: 2_000,
    implement_per_line: 50,
    test_per_line: 30,
    fixed_review: 5_000,
    test_loc_ratio: 1.5,
  },
  default_estimate: { files: 2, loc: 150, dependencies: 1 },
}

export const DEFAULT_BUDGET: BudgetConfig = {
  session_budget: 200_000,
  proceed_max: 100_000,
  ceiling: 150_000,
  split_ratio: 0.75,
  max_sub_units: 3,
}

export const DEFAULT_VERIFICATION: VerificationConfig = {
  max_attempts: 3,
  coverage_target: 80,
  coverage_tolerance: 5,
  flaky_window: 3,
  flaky_min_failures: 2,
}

export const DEFAULT_PHASES: PhasesConfig = {
  infra: { time_budget_minutes: 30 },
  'product-definition': { time_budget_minutes: 60 },
  decomposition: { time_budget_minutes: 30 },
  architecture: { time_budget_minutes: 60 },
  implementation: { time_budget_minutes: 480 },
  qa: { time_budget_minutes: 120 },
  verification: { time_budget_minutes: 120 },
  learning: { time_budget_minutes: 30 },
}

export const DEFAULT_OPTIMIZER: OptimizerConfig = {
  min_history: 5,
  simple_split_target: 0.05,
  medium_commit_target: 0.4,
  medium_commit_threshold: 3,
  boundary_band: 0.2,
  adjustment_step: 0.1,
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: PhasewrightConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  complexity: DEFAULT_COMPLEXITY,
  budget: DEFAULT_BUDGET,
  verification: DEFAULT_VERIFICATION,
  qa: { max_cycles: 3 },
  phases: DEFAULT_PHASES,
  optimizer: DEFAULT_OPTIMIZER,
  tracker: { kind: 'github', label: 'phasewright' },
  agent: { command: 'claude', args: ['-p', '--output-format', 'text'], timeout_ms: 1_800_000 },
}
