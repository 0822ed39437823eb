/**
 * Unit tests for agent output extraction and parsing
 */

import { describe, it, expect } from 'vitest'
import { extractYamlBlock, parseAgentOutput } from '../output-parser.js'
import { ImplementationOutputSchema, InfraOutputSchema } from '../capability-contracts.js'

describe('extractYamlBlock', () => {
  it('returns null for empty output', () => {
    expect(extractYamlBlock('   \n')).toBeNull()
  })

  it('takes the last fenced block that contains a result', () => {
    const output = [
      'Plan:',
      '```yaml',
      'result:',
      '  artifacts: [draft.md]',
      '```',
      'Revised:',
      '```yaml',
      'result:',
      '  artifacts: [docs/prd.md]',
      '```',
    ].join('\n')
    expect(extractYamlBlock(output)).toBe('result:\n  artifacts: [docs/prd.md]')
  })

  it('ignores fenced blocks without a result anchor', () => {
    const output = '```yaml\nname: x\n```\nresult:\n  artifacts: []\n'
    expect(extractYamlBlock(output)).toBe('result:\n  artifacts: []')
  })

  it('returns null when there is no anchor', () => {
    expect(extractYamlBlock('All done, nothing to report.')).toBeNull()
  })
})

describe('parseAgentOutput', () => {
  it('parses a JSON document', () => {
    expect(parseAgentOutput('{"artifacts":["package.json"]}', InfraOutputSchema)).toEqual({
      parsed: { artifacts: ['package.json'] },
      error: null,
    })
  })

  it('unwraps a JSON result envelope', () => {
    expect(parseAgentOutput('{"result":{"artifacts":["tsconfig.json"]}}', InfraOutputSchema).parsed).toEqual({
      artifacts: ['tsconfig.json'],
    })
  })

  it('parses a trailing YAML result and applies schema defaults', () => {
    const output = 'Implemented the login form.\n\nresult:\n  cost: 1200\n  evidence: abc123\n'
    expect(parseAgentOutput(output, ImplementationOutputSchema)).toEqual({
      parsed: { cost: 1200, evidence: 'abc123', artifacts: [] },
      error: null,
    })
  })

  it('reports output without a result block', () => {
    expect(parseAgentOutput('I could not finish.', InfraOutputSchema)).toEqual({
      parsed: null,
      error: 'No result block found in agent output',
    })
  })

  it('reports an empty result', () => {
    expect(parseAgentOutput('{"result":null}', InfraOutputSchema).error).toBe('Agent result is empty')
  })

  it('reports malformed YAML', () => {
    const { parsed, error } = parseAgentOutput('result:\n  artifacts: [a,\n', InfraOutputSchema)
    expect(parsed).toBeNull()
    expect(error?.startsWith('YAML parse error: ')).toBe(true)
  })

  it('reports schema violations with their path', () => {
    expect(parseAgentOutput('{"cost":-1,"evidence":"abc123"}', ImplementationOutputSchema).error).toBe(
      'Schema validation error: cost: Number must be greater than or equal to 0'
    )
  })
})
