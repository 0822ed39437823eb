/**
 * Zod validation schemas for the phasewright configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - complexity scoring and resource cost model
 *  - budget ladder
 *  - verification loop policy
 *  - per-phase time budgets
 *  - threshold optimizer targets
 *  - tracker and agent backends
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory (relative to the project root) holding checkpoint, lock and history */
    state_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Complexity scoring
// ---------------------------------------------------------------------------

export const ResourceCostModelSchema = z
  .object({
    /** Fixed cost of reading shared project context */
    base_context: z.number().int().min(0),
    file_read: z.number().int().min(0),
    implement_per_line: z.number().min(0),
    test_per_line: z.number().min(0),
    fixed_review: z.number().int().min(0),
    /** Test LOC assumed per implementation LOC */
    test_loc_ratio: z.number().min(0),
  })
  .strict()

export type ResourceCostModel = z.infer<typeof ResourceCostModelSchema>

export const EstimateSchema = z
  .object({
    files: z.number().int().min(0),
    loc: z.number().int().min(0),
    dependencies: z.number().int().min(0),
  })
  .strict()

export const ComplexityConfigSchema = z
  .object({
    file_weight: z.number().int().min(0),
    dependency_weight: z.number().int().min(0),
    /** Inclusive upper bound of the simple category */
    simple_max: z.number().int().min(0),
    /** Inclusive upper bound of the medium category; complex starts above it */
    medium_max: z.number().int().min(1),
    resource: ResourceCostModelSchema,
    /** Estimate assumed for items created outside the orchestrator */
    default_estimate: EstimateSchema,
  })
  .strict()
  .refine((c) => c.medium_max > c.simple_max, {
    message: 'complexity.medium_max must be greater than complexity.simple_max',
    path: ['medium_max'],
  })

export type ComplexityConfig = z.infer<typeof ComplexityConfigSchema>

// ---------------------------------------------------------------------------
// Budget ladder
// ---------------------------------------------------------------------------

export const BudgetConfigSchema = z
  .object({
    /** Resource budget of one session */
    session_budget: z.number().int().positive(),
    /** Items estimated below this proceed as a single unit */
    proceed_max: z.number().int().positive(),
    /** Hard per-agent ceiling; estimates above it are never scheduled directly */
    ceiling: z.number().int().positive(),
    /** Fraction of budget/ceiling at which usage counts as approaching the limit */
    split_ratio: z.number().gt(0).lte(1),
    /** Upper bound on checkpointed sub-units planned for one item */
    max_sub_units: z.number().int().min(2),
  })
  .strict()
  .refine((b) => b.ceiling >= b.proceed_max, {
    message: 'budget.ceiling must be at least budget.proceed_max',
    path: ['ceiling'],
  })

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>

// ---------------------------------------------------------------------------
// Verification loop
// ---------------------------------------------------------------------------

export const VerificationConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1),
    /** Coverage percentage required to pass */
    coverage_target: z.number().min(0).max(100),
    /** Percentage points below target still accepted as a disclosed gap */
    coverage_tolerance: z.number().min(0).max(100),
    /** Number of most recent attempts inspected for flaky tests */
    flaky_window: z.number().int().min(1),
    /** Failures within the window that mark a test as flaky */
    flaky_min_failures: z.number().int().min(1),
  })
  .strict()

export type VerificationConfig = z.infer<typeof VerificationConfigSchema>

export const QaConfigSchema = z
  .object({
    /** How many times QA may send the run back to implementation */
    max_cycles: z.number().int().min(0),
  })
  .strict()

export type QaConfig = z.infer<typeof QaConfigSchema>

// ---------------------------------------------------------------------------
// Phase time budgets
// ---------------------------------------------------------------------------

export const PhaseBudgetSchema = z
  .object({
    /** Wall-clock budget; 0 disables the gate */
    time_budget_minutes: z.number().min(0),
  })
  .strict()

export const PhasesConfigSchema = z
  .object({
    infra: PhaseBudgetSchema,
    'product-definition': PhaseBudgetSchema,
    decomposition: PhaseBudgetSchema,
    architecture: PhaseBudgetSchema,
    implementation: PhaseBudgetSchema,
    qa: PhaseBudgetSchema,
    verification: PhaseBudgetSchema,
    learning: PhaseBudgetSchema,
  })
  .strict()

export type PhasesConfig = z.infer<typeof PhasesConfigSchema>

// ---------------------------------------------------------------------------
// Threshold optimizer
// ---------------------------------------------------------------------------

export const OptimizerConfigSchema = z
  .object({
    /** Minimum number of project records before any analysis runs */
    min_history: z.number().int().min(1),
    /** Acceptable split rate for near-boundary simple items */
    simple_split_target: z.number().min(0).max(1),
    /** Acceptable share of near-boundary medium items needing many commits */
    medium_commit_target: z.number().min(0).max(1),
    /** Commit count at which a medium item counts as "needing extra commits" */
    medium_commit_threshold: z.number().int().min(1),
    /** Upper fraction of a category's score range considered near its boundary */
    boundary_band: z.number().gt(0).lte(1),
    /** Relative step applied to a boundary when a change is recommended */
    adjustment_step: z.number().gt(0).lt(1),
  })
  .strict()

export type OptimizerConfig = z.infer<typeof OptimizerConfigSchema>

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export const TrackerConfigSchema = z
  .object({
    /** github: issues via the gh CLI; file: JSON file in the state dir; memory: this process only */
    kind: z.enum(['github', 'file', 'memory']),
    /** owner/name; defaults to the repository of the working directory */
    repo: z.string().optional(),
    /** Label attached to every item the orchestrator creates */
    label: z.string().min(1),
  })
  .strict()

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>

export const AgentConfigSchema = z
  .object({
    /** Executable invoked for every capability */
    command: z.string().min(1),
    args: z.array(z.string()),
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export type AgentConfig = z.infer<typeof AgentConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this build can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const PhasewrightConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    complexity: ComplexityConfigSchema,
    budget: BudgetConfigSchema,
    verification: VerificationConfigSchema,
    qa: QaConfigSchema,
    phases: PhasesConfigSchema,
    optimizer: OptimizerConfigSchema,
    tracker: TrackerConfigSchema,
    agent: AgentConfigSchema,
  })
  .strict()

export type PhasewrightConfig = z.infer<typeof PhasewrightConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env vars and CLI flags before merging)
// ---------------------------------------------------------------------------

export const PartialPhasewrightConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    complexity: z
      .object({
        file_weight: z.number().int().min(0),
        dependency_weight: z.number().int().min(0),
        simple_max: z.number().int().min(0),
        medium_max: z.number().int().min(1),
        resource: ResourceCostModelSchema.partial(),
        default_estimate: EstimateSchema.partial(),
      })
      .strict()
      .partial()
      .optional(),
    budget: z
      .object({
        session_budget: z.number().int().positive(),
        proceed_max: z.number().int().positive(),
        ceiling: z.number().int().positive(),
        split_ratio: z.number().gt(0).lte(1),
        max_sub_units: z.number().int().min(2),
      })
      .strict()
      .partial()
      .optional(),
    verification: VerificationConfigSchema.partial().optional(),
    qa: QaConfigSchema.partial().optional(),
    phases: z
      .object({
        infra: PhaseBudgetSchema.partial(),
        'product-definition': PhaseBudgetSchema.partial(),
        decomposition: PhaseBudgetSchema.partial(),
        architecture: PhaseBudgetSchema.partial(),
        implementation: PhaseBudgetSchema.partial(),
        qa: PhaseBudgetSchema.partial(),
        verification: PhaseBudgetSchema.partial(),
        learning: PhaseBudgetSchema.partial(),
      })
      .strict()
      .partial()
      .optional(),
    optimizer: OptimizerConfigSchema.partial().optional(),
    tracker: TrackerConfigSchema.partial().optional(),
    agent: AgentConfigSchema.partial().optional(),
  })
  .strict()

export type PartialPhasewrightConfig = z.infer<typeof PartialPhasewrightConfigSchema>
