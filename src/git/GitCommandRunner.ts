import { spawn } from 'child_process'
import { InterruptedError } from '../errors'

export interface GitCommandResult {
  exitCode: number | null
  stdout: string
  stderr: string
  /** Set when the process was killed, e.g. by a timeout or an abort. */
  signal: NodeJS.Signals | null
}

export interface RunGitCommandOptions {
  cwd?: string
  args: string[]
  timeoutMs?: number
  signal?: AbortSignal
}

export type GitCommandRunner = (options: RunGitCommandOptions) => Promise<GitCommandResult>

/**
 * Raised when the git binary cannot be started at all.
 */
export class GitSpawnError extends Error {
  readonly name = 'GitSpawnError'

  constructor(readonly args: string[], readonly causeCode: string | undefined, message: string) {
    super(message)
  }
}

function spawnErrorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined
}

/**
 * Execute git without a shell and collect its output
 */
export const runGitCommand: GitCommandRunner = (options) => {
  return new Promise((resolve, reject) => {
    const child = spawn('git', options.args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      signal: options.signal,
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    child.stdout.on('data', (data: Buffer) => {
      stdout.push(data)
    })

    child.stderr.on('data', (data: Buffer) => {
      stderr.push(data)
    })

    child.on('error', (error) => {
      if (error.name === 'AbortError') {
        reject(new InterruptedError(`git ${options.args[0] ?? ''} was interrupted`))
        return
      }
      const code = spawnErrorCode(error)
      const message = code === 'ENOENT'
        ? 'git is not installed or not on PATH'
        : `git ${options.args[0] ?? ''} failed to start: ${error.message}`
      reject(new GitSpawnError(options.args, code, message))
    })

    child.on('close', (code, signal) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        signal,
      })
    })
  })
}
