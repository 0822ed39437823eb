/**
 * Extraction and parsing of agent output.
 *
 * The agent prints its result either as a JSON document on stdout, or as a
 * YAML block rooted at `result:` at the END of free-form output.
 *
 * Extraction strategy:
 * 1. Whole stdout parsed as JSON
 * 2. Last fenced block (```yaml / ```json / ```) containing `result:`
 * 3. Unfenced lines from the last `result:` anchor to the end
 */

import yaml from 'js-yaml'
import type { z } from 'zod'
import { isPlainObject } from '../../utils/helpers.js'

const ANCHOR_KEY = 'result:'

/**
 * Extract the YAML result block from agent output, or null when none exists.
 */
export function extractYamlBlock(output: string): string | null {
  if (output.trim() === '') return null

  const fencePattern = /```(?:yaml|json)?\s*\n([\s\S]*?)```/g
  let lastFenced: string | null = null
  let match: RegExpExecArray | null
  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.includes(ANCHOR_KEY)) {
      lastFenced = content.trim()
    }
  }
  if (lastFenced !== null) return lastFenced

  const lines = output.split('\n')
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i]?.trim().startsWith(ANCHOR_KEY)) {
      const text = lines.slice(i).join('\n').trim()
      return text !== '' ? text : null
    }
  }
  return null
}

function unwrapResult(value: unknown): unknown {
  return isPlainObject(value) && 'result' in value ? value['result'] : value
}

/**
 * Parse agent stdout and validate it against `schema`.
 */
export function parseAgentOutput<T>(
  output: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { parsed: T | null; error: string | null } {
  let raw: unknown
  try {
    raw = JSON.parse(output)
  } catch {
    const block = extractYamlBlock(output)
    if (block === null) {
      return { parsed: null, error: 'No result block found in agent output' }
    }
    try {
      raw = yaml.load(block)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      return { parsed: null, error: `YAML parse error: ${message}` }
    }
  }

  const candidate = unwrapResult(raw)
  if (candidate === null || candidate === undefined) {
    return { parsed: null, error: 'Agent result is empty' }
  }

  const result = schema.safeParse(candidate)
  if (result.success) {
    return { parsed: result.data, error: null }
  }
  return {
    parsed: null,
    error: `Schema validation error: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
  }
}
