import { EnvironmentError, InvalidReferenceError } from '../errors'
import { GitCommandResult, GitCommandRunner, GitSpawnError, runGitCommand } from './GitCommandRunner'
import { AttributeFileOptions, VersionControl } from './VersionControl'

export interface GitVersionControlOptions {
  cwd?: string
  ignoreWhitespace?: boolean
  attributionTimeoutMs?: number
  runGitCommand?: GitCommandRunner
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? ''
}

function describeFailure(result: GitCommandResult): string {
  if (result.signal) {
    return `terminated by ${result.signal}`
  }
  const detail = firstLine(result.stderr)
  return detail ? detail : `exit code ${result.exitCode}`
}

export class GitVersionControl implements VersionControl {
  private cwd: string
  private ignoreWhitespace: boolean
  private attributionTimeoutMs?: number
  private run: GitCommandRunner

  constructor(options: GitVersionControlOptions = {}) {
    this.cwd = options.cwd ?? process.cwd()
    this.ignoreWhitespace = options.ignoreWhitespace ?? true
    this.attributionTimeoutMs = options.attributionTimeoutMs
    this.run = options.runGitCommand ?? runGitCommand
  }

  /**
   * Build the blame invocation for a file
   */
  blameArgs(filePath: string): string[] {
    const args = ['blame', '--porcelain']
    if (this.ignoreWhitespace) {
      args.push('-w')
    }
    args.push('--', filePath)
    return args
  }

  async repositoryRoot(): Promise<string> {
    const result = await this.runForEnvironment(this.cwd, ['rev-parse', '--show-toplevel'])
    if (result.exitCode !== 0) {
      throw new EnvironmentError(`Not inside a git repository: ${describeFailure(result)}`)
    }
    return result.stdout.trim()
  }

  async resolveReference(reference: string, repoRoot: string): Promise<string> {
    const result = await this.runForEnvironment(repoRoot, [
      'rev-parse',
      '--verify',
      '--quiet',
      `${reference}^{commit}`,
    ])
    const commitId = result.stdout.trim()
    if (result.exitCode !== 0 || commitId.length === 0) {
      throw new InvalidReferenceError(reference, firstLine(result.stderr) || undefined)
    }
    return commitId
  }

  async listTrackedFiles(repoRoot: string): Promise<string[]> {
    // -z keeps paths with unusual characters unquoted
    const result = await this.runForEnvironment(repoRoot, ['ls-files', '-z'])
    if (result.exitCode !== 0) {
      throw new EnvironmentError(`Cannot list tracked files: ${describeFailure(result)}`)
    }
    return result.stdout.split('\0').filter(file => file.trim().length > 0)
  }

  async attributeFile(filePath: string, repoRoot: string, options: AttributeFileOptions = {}): Promise<string> {
    const result = await this.run({
      cwd: repoRoot,
      args: this.blameArgs(filePath),
      timeoutMs: this.attributionTimeoutMs,
      signal: options.signal,
    })
    if (result.exitCode !== 0) {
      throw new Error(describeFailure(result))
    }
    return result.stdout
  }

  private async runForEnvironment(cwd: string, args: string[]): Promise<GitCommandResult> {
    try {
      return await this.run({ cwd, args })
    } catch (error) {
      if (error instanceof GitSpawnError) {
        throw new EnvironmentError(error.message)
      }
      throw error
    }
  }
}
