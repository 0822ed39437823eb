/**
 * Credential masking utilities for CLI output and pino logger redaction.
 *
 * Tracker tokens (GitHub) and agent credentials must never appear in logs,
 * status output or error messages.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify token values inside free text.
 */
export const TOKEN_PATTERNS: RegExp[] = [
  // GitHub classic and fine-grained tokens
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g,
  // Anthropic / OpenAI style keys passed through agent environments
  /sk-(?:ant-)?[A-Za-z0-9_-]{20,}/g,
]

/**
 * Pino redaction paths. Pass to `pino({ redact: ... })`.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  '*.token',
  'env.GH_TOKEN',
  'env.GITHUB_TOKEN',
  'env.ANTHROPIC_API_KEY',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known token patterns in a string with `***`.
 *
 * Used on stderr captured from the `gh` CLI and from agent processes before
 * it is echoed to the terminal.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of TOKEN_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set(['token', 'secret', 'password', 'api_key'])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
