/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PhasewrightConfig, PartialPhasewrightConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .phasewright/ directory (default: <cwd>/.phasewright) */
  projectConfigDir?: string
  /** Path to the global user-level .phasewright/ directory (default: ~/.phasewright) */
  globalConfigDir?: string
  /**
   * Values that override everything, including env vars.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialPhasewrightConfig
  /** Environment to read PHASEWRIGHT_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated phasewright configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): PhasewrightConfig

  /** Return a single value by dot-notation key (e.g. "budget.ceiling"), or undefined */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown or the value fails validation.
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential values masked; safe to print */
  getMasked(): unknown

  readonly isLoaded: boolean
}
