import { v4 as uuidv4 } from 'uuid'
import { FileAttributionResult, ScanMode } from '../contracts'
import { PerFileReadError, errorMessage } from '../errors'
import { AttributionRead, zeroedResult } from '../attribution/AttributionReader'
import { debugLog, WarningSink } from '../logging/debugLog'
import { WorkerPool } from './WorkerPool'

export const DEFAULT_WORKERS = 4
export const DEFAULT_PARALLEL_THRESHOLD = 10

export interface FileReader {
  read(path: string, signal?: AbortSignal): Promise<AttributionRead>
}

export interface ScanCoordinatorOptions {
  mode?: ScanMode
  workers?: number
  /** Parallel dispatch only kicks in above this many files. */
  parallelThreshold?: number
  onWarning?: WarningSink
  signal?: AbortSignal
}

export interface ScanOutcome {
  scanId: string
  /** One result per requested file, in the order the files were given. */
  results: FileAttributionResult[]
  failures: PerFileReadError[]
  concurrency: number
}

/**
 * Fans attribution reads out over a bounded pool and collects exactly one
 * result per file. Built per invocation; holds no state between scans.
 */
export class ScanCoordinator {
  private mode: ScanMode
  private workers: number
  private parallelThreshold: number
  private onWarning?: WarningSink
  private signal?: AbortSignal

  constructor(options: ScanCoordinatorOptions = {}) {
    this.mode = options.mode ?? 'parallel'
    this.workers = options.workers ?? DEFAULT_WORKERS
    this.parallelThreshold = options.parallelThreshold ?? DEFAULT_PARALLEL_THRESHOLD
    this.onWarning = options.onWarning
    this.signal = options.signal

    if (!Number.isInteger(this.workers) || this.workers < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${this.workers}`)
    }
  }

  /**
   * Concurrency actually used for a file count; small scans always run serially
   */
  concurrencyFor(fileCount: number): number {
    if (this.mode === 'parallel' && fileCount > this.parallelThreshold) {
      return this.workers
    }
    return 1
  }

  async scan(files: readonly string[], reader: FileReader): Promise<ScanOutcome> {
    const scanId = uuidv4()
    const concurrency = this.concurrencyFor(files.length)
    const pool = new WorkerPool(concurrency)
    const failures: PerFileReadError[] = []

    debugLog({
      event: 'scan_start',
      scanId,
      fileCount: files.length,
      mode: this.mode,
      concurrency,
    })

    const results = await pool.map(
      files,
      async (path) => {
        const read = await this.readSafely(reader, path)
        // Reads killed by an interrupt are not worth a warning each
        if (read.failure && !this.signal?.aborted) {
          failures.push(read.failure)
          this.onWarning?.(read.failure.message)
          debugLog({ event: 'file_failed', scanId, path, reason: read.failure.reason })
        }
        return read.result
      },
      this.signal
    )

    debugLog({
      event: 'scan_complete',
      scanId,
      fileCount: results.length,
      failureCount: failures.length,
    })

    return { scanId, results, failures, concurrency }
  }

  private async readSafely(reader: FileReader, path: string): Promise<AttributionRead> {
    try {
      return await reader.read(path, this.signal)
    } catch (error) {
      return {
        result: zeroedResult(path),
        failure: new PerFileReadError(path, errorMessage(error)),
      }
    }
  }
}
