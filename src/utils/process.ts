/**
 * Subprocess helper shared by the `gh` tracker and the command-backed agent.
 */

import { spawn } from 'child_process'
import { createLogger } from './logger.js'

const logger = createLogger('process')

export interface RunCommandOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Written to stdin, which is then closed */
  input?: string
  /** Kill the process with SIGTERM after this many milliseconds */
  timeoutMs?: number
}

export interface RunCommandResult {
  stdout: string
  stderr: string
  /** Exit code; 1 when the process could not be spawned */
  code: number
  timedOut: boolean
}

/** Signature of `runCommand`, injectable for tests */
export type CommandRunner = (binary: string, args: string[], options?: RunCommandOptions) => Promise<RunCommandResult>

/**
 * Spawn `binary` with `args` and collect its output. Never rejects: spawn
 * failures are reported through `code` and `stderr`.
 */
export function runCommand(
  binary: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<RunCommandResult> {
  return new Promise((resolve) => {
    logger.debug({ binary, args, cwd: options.cwd }, 'runCommand')

    const proc = spawn(binary, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    })

    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    let timedOut = false
    let settled = false

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true
            proc.kill('SIGTERM')
          }, options.timeoutMs)
        : null

    const finish = (result: Omit<RunCommandResult, 'timedOut'>): void => {
      if (settled) return
      settled = true
      if (timer !== null) clearTimeout(timer)
      resolve({ ...result, timedOut })
    }

    if (proc.stdin !== null && options.input !== undefined) {
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        // EPIPE: the process exited before reading stdin
        if (err.code !== 'EPIPE') {
          logger.warn({ binary, error: err.message }, 'stdin write error')
        }
      })
      proc.stdin.end(options.input)
    }

    proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk))
    proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk))

    proc.on('close', (code) => {
      finish({
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8').trim(),
        code: code ?? 1,
      })
    })

    proc.on('error', (err) => {
      finish({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}
