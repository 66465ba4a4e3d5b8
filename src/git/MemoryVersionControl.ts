import { EnvironmentError, InvalidReferenceError } from '../errors'
import { AttributeFileOptions, VersionControl } from './VersionControl'

/** Per-line commit ids of a file, or the error git would report for it. */
export type MemoryFile = { commits: string[]; delayMs?: number } | { error: string; delayMs?: number }

export interface MemoryRepository {
  root: string
  /** Reference name (or id) to full commit id. */
  refs: Record<string, string>
  files: Record<string, MemoryFile>
}

/**
 * Render per-line commit ids the way `git blame --porcelain` prints them:
 * full metadata after the first header of each commit, a bare header after.
 */
export function toPorcelain(commits: string[], fileName: string = 'file'): string {
  const seen = new Set<string>()
  let output = ''
  commits.forEach((commit, i) => {
    const lineNumber = i + 1
    if (seen.has(commit)) {
      output += `${commit} ${lineNumber} ${lineNumber}\n`
    } else {
      seen.add(commit)
      output += `${commit} ${lineNumber} ${lineNumber} 1\n`
      output += 'author Test Author\n'
      output += 'author-mail <author@example.com>\n'
      output += 'author-time 1700000000\n'
      output += 'author-tz +0000\n'
      output += `summary change ${commit.slice(0, 7)}\n`
      output += `filename ${fileName}\n`
    }
    output += `\tline ${lineNumber}\n`
  })
  return output
}

/**
 * In-memory {@link VersionControl} for tests and dry runs. Records calls
 * and the highest number of concurrent attribution reads.
 */
export class MemoryVersionControl implements VersionControl {
  readonly attributeCalls: string[] = []
  maxInFlight = 0
  private inFlight = 0

  constructor(private repository: MemoryRepository | null) {}

  async repositoryRoot(): Promise<string> {
    if (!this.repository) {
      throw new EnvironmentError('Not inside a git repository: fatal: not a git repository')
    }
    return this.repository.root
  }

  async resolveReference(reference: string): Promise<string> {
    const commitId = this.repository?.refs[reference]
    if (!commitId) {
      throw new InvalidReferenceError(reference)
    }
    return commitId
  }

  async listTrackedFiles(): Promise<string[]> {
    return Object.keys(this.repository?.files ?? {})
  }

  async attributeFile(filePath: string, _repoRoot: string, options: AttributeFileOptions = {}): Promise<string> {
    this.attributeCalls.push(filePath)
    const file = this.repository?.files[filePath]
    if (!file) {
      throw new Error(`fatal: no such path '${filePath}' in HEAD`)
    }

    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      if (file.delayMs) {
        await delay(file.delayMs, options.signal)
      }
      if ('error' in file) {
        throw new Error(file.error)
      }
      return toPorcelain(file.commits, filePath)
    } finally {
      this.inFlight--
    }
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('aborted'))
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    const onAbort = () => {
      clearTimeout(timer)
      reject(new Error('aborted'))
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
