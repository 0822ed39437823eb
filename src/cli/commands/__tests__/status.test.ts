/**
 * Unit tests for `src/cli/commands/status.ts`
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { runStatusAction } from '../status.js'
import { runStartAction } from '../start.js'
import { EXIT_SUCCESS, EXIT_USAGE } from '../../../core/exit-codes.js'
import { happyPathHandlers } from '../../../modules/phase-machine/__tests__/harness.js'
import { captureOutput, createTestBackends, createTestProject, type CapturedOutput, type TestProject } from './cli-test-helpers.js'

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

async function runProject(verification?: 'failing'): Promise<void> {
  const handlers = happyPathHandlers()
  if (verification === 'failing') {
    handlers.verification = () => ({ tests: { passed: [], failed: ['test_login'] }, coverage: 90, failingItems: ['1'] })
  }
  const { backends } = createTestBackends(handlers)
  await runStartAction({ ...project, request: 'Build a todo API', fresh: false, outputFormat: 'human', backends })
}

describe('runStatusAction', () => {
  it('exits 2 when no project run exists', async () => {
    const code = await runStatusAction({ ...project, outputFormat: 'human' })

    expect(code).toBe(EXIT_USAGE)
    expect(output.getStdout()).toBe('No project run found. Start one with `phasewright start <request>`.\n')
  })

  it('prints a null project in json mode when no run exists', async () => {
    const code = await runStatusAction({ ...project, outputFormat: 'json' })

    expect(code).toBe(EXIT_USAGE)
    expect(output.getStdout()).toBe('{"project":null}\n')
  })

  it('renders the snapshot of a finished run', async () => {
    await runProject()
    const before = output.getStdout().length

    const code = await runStatusAction({ ...project, outputFormat: 'human' })
    expect(code).toBe(EXIT_SUCCESS)
    expect(output.getStdout().slice(before)).toBe(
      [
        'Project todo-api  Phase: Done  Status: complete',
        '',
        'Open  Completed  Flagged  Deferred  Total',
        '----  ---------  -------  --------  -----',
        '0     1          0        0         1',
        '',
        'Session resources: 20000 / 200000',
        'Verification attempts: 0 / 3',
        '',
        'Next: Project complete',
        '',
      ].join('\n')
    )
  })

  it('shows the pending approval after a divergence', async () => {
    await runProject('failing')
    const before = output.getStdout().length

    await runStatusAction({ ...project, outputFormat: 'human' })
    const lines = output.getStdout().slice(before).split('\n')
    expect(lines[0]).toBe('Project todo-api  Phase: Verification  Status: divergence')
    expect(lines).toContain('  phasewright approve <narrow-scope|relax-threshold|manual-intervention>')
    expect(lines).toContain('Verification attempts: 3 / 3')
  })

  it('prints the snapshot as JSON', async () => {
    await runProject()
    const before = output.getStdout().length

    await runStatusAction({ ...project, outputFormat: 'json' })
    const snapshot: unknown = JSON.parse(output.getStdout().slice(before))
    expect(snapshot).toMatchObject({
      project: 'todo-api',
      request: 'Build a todo API',
      phase: { current: 'done', status: 'complete' },
      items: { total: 1, open: 0, completed: 1, inProgress: null },
      pendingApproval: null,
    })
  })
})
