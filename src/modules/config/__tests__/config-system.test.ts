/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - set() with project file update
 *  - Unsupported config format versions
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, readFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import { createConfigSystem, coerceScalar, setByPath } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError, IncompatibleFormatError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `phasewright-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.phasewright')
  globalConfigDir = join(testDir, 'global', '.phasewright')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns default config when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.config_format_version).toBe('1')
    expect(config.complexity.simple_max).toBe(500)
    expect(config.complexity.medium_max).toBe(1500)
    expect(config.budget.ceiling).toBe(150_000)
    expect(config.verification.max_attempts).toBe(3)
    expect(config.tracker.label).toBe('phasewright')
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'budget:\n  ceiling: 120000\n  proceed_max: 90000\n')
    await writeYaml(projectConfigDir, 'budget:\n  ceiling: 130000\n')

    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.budget.ceiling).toBe(130_000)
    expect(config.budget.proceed_max).toBe(90_000)
    expect(config.budget.session_budget).toBe(DEFAULT_CONFIG.budget.session_budget)
  })

  it('env var overrides project config', async () => {
    await writeYaml(projectConfigDir, 'verification:\n  max_attempts: 4\n')
    const system = createSystem({ env: { PHASEWRIGHT_MAX_VERIFICATION_ATTEMPTS: '5' } })
    await system.load()
    expect(system.get('verification.max_attempts')).toBe(5)
  })

  it('CLI overrides take highest priority', async () => {
    const system = createSystem({
      env: { PHASEWRIGHT_LOG_LEVEL: 'error' },
      cliOverrides: { global: { log_level: 'trace' } },
    })
    await system.load()
    expect(system.get('global.log_level')).toBe('trace')
  })

  it('ignores invalid env var values', async () => {
    const system = createSystem({ env: { PHASEWRIGHT_TRACKER: 'jira' } })
    await system.load()
    expect(system.get('tracker.kind')).toBe('github')
  })

  it('merges nested resource cost overrides', async () => {
    await writeYaml(projectConfigDir, 'complexity:\n  resource:\n    file_read: 2500\n')
    const system = createSystem()
    await system.load()
    expect(system.get('complexity.resource.file_read')).toBe(2500)
    expect(system.get('complexity.resource.base_context')).toBe(10_000)
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('rejects unknown keys in a config file', async () => {
    await writeYaml(projectConfigDir, 'budget:\n  unknown_knob: 1\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('rejects category boundaries that overlap', async () => {
    await writeYaml(projectConfigDir, 'complexity:\n  simple_max: 1600\n')
    await expect(createSystem().load()).rejects.toThrow(/medium_max must be greater/)
  })

  it('rejects an unsupported config format version', async () => {
    await writeYaml(projectConfigDir, "config_format_version: '7'\n")
    await expect(createSystem().load()).rejects.toThrow(IncompatibleFormatError)
  })
})

// ---------------------------------------------------------------------------
// get() / set()
// ---------------------------------------------------------------------------

describe('ConfigSystem - get() and set()', () => {
  it('returns undefined for a non-existent key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('budget.nope')).toBeUndefined()
  })

  it('persists a scalar value to the project config file', async () => {
    const system = createSystem()
    await system.load()
    await system.set('complexity.simple_max', 450)

    expect(system.get('complexity.simple_max')).toBe(450)
    const raw = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(raw).toEqual({ complexity: { simple_max: 450 } })

    const reloaded = createSystem()
    await reloaded.load()
    expect(reloaded.get('complexity.simple_max')).toBe(450)
  })

  it('sets an optional key that has no default', async () => {
    const system = createSystem()
    await system.load()
    await system.set('tracker.repo', 'example/widgets')
    expect(system.get('tracker.repo')).toBe('example/widgets')
  })

  it('rejects unknown keys', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('budget.nope', 1)).rejects.toThrow('Unknown config key: budget.nope')
  })

  it('rejects replacing a whole section', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('budget', 1)).rejects.toThrow(ConfigError)
  })

  it('rejects a value that breaks a cross-field rule without writing it', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('complexity.medium_max', 400)).rejects.toThrow(ConfigError)
    await expect(readFile(join(projectConfigDir, 'config.yaml'), 'utf-8')).rejects.toThrow()
  })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('coerceScalar', () => {
  it('coerces booleans, integers and decimals', () => {
    expect(coerceScalar('true')).toBe(true)
    expect(coerceScalar('false')).toBe(false)
    expect(coerceScalar('120000')).toBe(120000)
    expect(coerceScalar('0.75')).toBe(0.75)
    expect(coerceScalar('memory')).toBe('memory')
  })
})

describe('setByPath', () => {
  it('does not mutate the source object', () => {
    const source = { budget: { ceiling: 1 } }
    const updated = setByPath(source, 'budget.proceed_max', 2)
    expect(updated).toEqual({ budget: { ceiling: 1, proceed_max: 2 } })
    expect(source).toEqual({ budget: { ceiling: 1 } })
  })
})
