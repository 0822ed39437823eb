/**
 * Unit tests for `src/cli/commands/optimize.ts`
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { readFile } from 'fs/promises'
import { join } from 'path'
import { runOptimizeAction, runOptimizeApplyAction } from '../optimize.js'
import { EXIT_SUCCESS, EXIT_USAGE } from '../../../core/exit-codes.js'
import type { ItemOutcome, ProjectRecord } from '../../../core/types.js'
import { SqliteHistoryStore } from '../../../persistence/history-store.js'
import { captureOutput, createTestProject, type CapturedOutput, type TestProject } from './cli-test-helpers.js'

let project: TestProject
let output: CapturedOutput

beforeEach(async () => {
  project = await createTestProject()
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  vi.restoreAllMocks()
  await project.cleanup()
})

function simpleOutcome(itemId: string, complexityScore: number, requiredSplit: boolean): ItemOutcome {
  return {
    itemId,
    category: 'simple',
    complexityScore,
    estimatedResource: 30_000,
    actualResource: null,
    requiredSplit,
    commitCount: 1,
  }
}

/** Five projects in which half the near-boundary simple items split */
function seedHistory(): void {
  const store = new SqliteHistoryStore(join(project.projectRoot, '.phasewright', 'history.db'))
  try {
    for (const index of [1, 2, 3, 4, 5]) {
      const record: ProjectRecord = {
        id: `shop-${String(index)}@2026-02-0${String(index)}T00:00:00.000Z`,
        projectName: `shop-${String(index)}`,
        completedAt: `2026-02-0${String(index)}T08:00:00.000Z`,
        durationMs: 28_800_000,
        verificationAttempts: 1,
        diverged: false,
        items: [simpleOutcome('1', 450, true), simpleOutcome('2', 480, false)],
        phases: [],
      }
      store.record(record)
    }
  } finally {
    store.close()
  }
}

describe('runOptimizeAction', () => {
  it('reports an insufficient sample on an empty history', async () => {
    const code = await runOptimizeAction({ ...project, outputFormat: 'human' })

    expect(code).toBe(EXIT_SUCCESS)
    expect(output.getStdout()).toBe(
      [
        'Threshold report',
        '  Insufficient sample: 0 completed project(s), at least 5 required.',
        '  No recommendations were computed.',
        '',
      ].join('\n')
    )
  })

  it('prints metrics and recommendations once enough projects are recorded', async () => {
    seedHistory()
    await runOptimizeAction({ ...project, outputFormat: 'human' })

    expect(output.getStdout()).toBe(
      [
        'Threshold report',
        '  Projects analysed: 5',
        '',
        '  Metrics',
        '    complexity.simple_max: split rate of simple items near the boundary = 50.0% (target 5.0%, 5 project(s), confidence low)',
        '',
        '  Recommendations (advisory; apply with `phasewright optimize apply <parameter> --yes`)',
        '    complexity.simple_max: 500 -> 450 [low, n=5]',
        '      50.0% of simple items scoring above 400 needed a split (target 5.0%) across 5 project(s); lower complexity.simple_max from 500 to 450',
        '',
      ].join('\n')
    )
  })

  it('reads an explicit history database', async () => {
    seedHistory()
    const other = await createTestProject()
    try {
      await runOptimizeAction({
        ...other,
        outputFormat: 'json',
        history: join(project.projectRoot, '.phasewright', 'history.db'),
      })
      const result: unknown = JSON.parse(output.getStdout())
      expect(result).toMatchObject({ status: 'ok', sampleSize: 5 })
    } finally {
      await other.cleanup()
    }
  })
})

describe('runOptimizeApplyAction', () => {
  it('refuses without enough history', async () => {
    const code = await runOptimizeApplyAction({ ...project, parameter: 'complexity.simple_max', yes: true })

    expect(code).toBe(EXIT_USAGE)
    expect(output.getStderr()).toBe('Error: Insufficient history: 0 project(s), at least 5 required\n')
  })

  it('only previews the change without --yes', async () => {
    seedHistory()
    const code = await runOptimizeApplyAction({ ...project, parameter: 'complexity.simple_max', yes: false })

    expect(code).toBe(EXIT_USAGE)
    expect(output.getStdout()).toBe('Would apply complexity.simple_max: 500 -> 450. Re-run with --yes to write it.\n')
  })

  it('writes the recommended value to the project config with --yes', async () => {
    seedHistory()
    const code = await runOptimizeApplyAction({ ...project, parameter: 'complexity.simple_max', yes: true })

    expect(code).toBe(EXIT_SUCCESS)
    expect(output.getStdout()).toBe('Applied complexity.simple_max: 500 -> 450\n')
    const written = await readFile(join(project.projectRoot, '.phasewright', 'config.yaml'), 'utf-8')
    expect(written).toBe('complexity:\n  simple_max: 450\n')
  })

  it('rejects a parameter without a recommendation', async () => {
    seedHistory()
    const code = await runOptimizeApplyAction({ ...project, parameter: 'budget.ceiling', yes: true })

    expect(code).toBe(EXIT_USAGE)
    expect(output.getStderr()).toBe('Error: no recommendation for "budget.ceiling"\n')
  })
})
