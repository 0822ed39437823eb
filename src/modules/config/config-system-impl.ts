/**
 * ConfigSystem implementation. Loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.phasewright/config.yaml)
 *     → project config      (./.phasewright/config.yaml)
 *     → environment vars    (PHASEWRIGHT_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, IncompatibleFormatError } from '../../core/errors.js'
import {
  PhasewrightConfigSchema,
  PartialPhasewrightConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type PhasewrightConfig,
  type PartialPhasewrightConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'
import type { ZodIssue } from 'zod'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of PHASEWRIGHT_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  PHASEWRIGHT_LOG_LEVEL: 'global.log_level',
  PHASEWRIGHT_STATE_DIR: 'global.state_dir',
  PHASEWRIGHT_SESSION_BUDGET: 'budget.session_budget',
  PHASEWRIGHT_RESOURCE_CEILING: 'budget.ceiling',
  PHASEWRIGHT_MAX_VERIFICATION_ATTEMPTS: 'verification.max_attempts',
  PHASEWRIGHT_COVERAGE_TARGET: 'verification.coverage_target',
  PHASEWRIGHT_TRACKER: 'tracker.kind',
  PHASEWRIGHT_TRACKER_REPO: 'tracker.repo',
  PHASEWRIGHT_AGENT_COMMAND: 'agent.command',
  PHASEWRIGHT_AGENT_TIMEOUT_MS: 'agent.timeout_ms',
}

/** Keys that may be absent from the merged config but can still be set */
const OPTIONAL_KEYS = new Set(['tracker.repo'])

/** Coerce a raw string (env var or CLI argument) to boolean, number or string */
export function coerceScalar(rawValue: string): string | number | boolean {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^-?\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^-?\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialPhasewrightConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
  }

  const parsed = PartialPhasewrightConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head = '', ...rest] = path.split('.')
  if (rest.length === 0) {
    return { ...obj, [head]: value }
  }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: PhasewrightConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPhasewrightConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.phasewright')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.phasewright')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigPath(): string {
    return join(this._projectConfigDir, 'config.yaml')
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, then project config
    for (const filePath of [join(this._globalConfigDir, 'config.yaml'), this.projectConfigPath]) {
      const fileConfig = await this._loadYamlFile(filePath)
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
      }
    }

    // 3. Environment variable overrides
    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    // 4. CLI flag overrides
    if (Object.keys(this._cliOverrides).length > 0) {
      merged = deepMerge(merged, this._cliOverrides)
    }

    this._config = this._validate(merged)
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): PhasewrightConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const current = this.getConfig()
    const existing = getByPath(current, key)

    // The key must resolve to something in the merged config
    if (existing === undefined && !OPTIONAL_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    // Whole sections cannot be replaced
    if (isPlainObject(existing) || Array.isArray(existing)) {
      throw new ConfigError(
        `Cannot set object key "${key}"; use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigRaw = (await this._loadYamlFile(this.projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialPhasewrightConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    // Cross-field rules (e.g. medium_max > simple_max) only hold on the merged document
    this._validate(setByPath(structuredClone(current), key, value))

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(this.projectConfigPath, yaml.dump(partial.data), 'utf-8')
    logger.info({ key, value }, 'Project config updated')

    await this.load()
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _validate(candidate: Record<string, unknown>): PhasewrightConfig {
    const result = PhasewrightConfigSchema.safeParse(candidate)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }
    return result.data
  }

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPhasewrightConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw) ?? {}
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (typeof version === 'string' && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
        throw new IncompatibleFormatError(
          `Config file ${filePath} uses format version "${version}"; supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version }
        )
      }
    }

    const result = PartialPhasewrightConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystemImpl {
  return new ConfigSystemImpl(options)
}
