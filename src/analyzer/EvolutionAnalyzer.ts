import path from 'path'
import { AnalyzeOptions, AnalyzeOptionsSchema, EvolveConfig, RepositorySummary } from '../contracts'
import { EnvironmentError, InterruptedError, InvalidReferenceError, errorMessage } from '../errors'
import { AttributionReader } from '../attribution/AttributionReader'
import { emptySummary, summarize } from '../aggregate/Aggregator'
import { ScanCoordinator } from '../scan/ScanCoordinator'
import { VersionControl } from '../git/VersionControl'
import { GitVersionControl } from '../git/GitVersionControl'
import { ConfigLoader } from '../config/ConfigLoader'
import { debugLog, stderrWarning, WarningSink } from '../logging/debugLog'

export interface EvolutionAnalyzerDeps {
  versionControl: VersionControl
  config: EvolveConfig
  onWarning?: WarningSink
}

/**
 * Compares the current tree's line attribution against one base commit.
 *
 * The base reference is resolved once, before any file is read, so every
 * attribution read compares against the same full commit id.
 */
export class EvolutionAnalyzer {
  private versionControl: VersionControl
  private config: EvolveConfig
  private onWarning: WarningSink

  constructor(deps: EvolutionAnalyzerDeps) {
    this.versionControl = deps.versionControl
    this.config = deps.config
    this.onWarning = deps.onWarning ?? stderrWarning
  }

  async analyze(options: AnalyzeOptions): Promise<RepositorySummary> {
    const parsed = AnalyzeOptionsSchema.safeParse(options)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      if (issue?.path[0] === 'base') {
        throw new InvalidReferenceError(options.base, 'must not be empty')
      }
      const field = issue?.path.join('.') ?? 'options'
      throw new EnvironmentError(`Invalid option ${field}: ${issue?.message ?? 'invalid value'}`)
    }
    const validated = parsed.data
    const { signal } = options
    const throwIfAborted = () => {
      if (signal?.aborted) throw new InterruptedError()
    }

    const repoRoot = await this.versionControl.repositoryRoot()
    throwIfAborted()
    const baseCommitFullId = await this.versionControl.resolveReference(validated.base, repoRoot)
    throwIfAborted()
    const files = await this.listFiles(repoRoot)
    throwIfAborted()

    const aggregateOptions = {
      baseCommitFullId,
      repositoryName: path.basename(repoRoot),
      fileBreakdown: validated.fileBreakdown ?? false,
      breakdownLimit: this.config.report.breakdownLimit,
    }

    debugLog({
      event: 'analyze_start',
      repoRoot,
      base: validated.base,
      baseCommitFullId,
      fileCount: files.length,
    })

    if (files.length === 0) {
      return emptySummary(aggregateOptions)
    }

    const coordinator = new ScanCoordinator({
      mode: (validated.parallel ?? this.config.scan.parallel) ? 'parallel' : 'serial',
      workers: validated.workers ?? this.config.scan.workers,
      parallelThreshold: this.config.scan.parallelThreshold,
      onWarning: this.onWarning,
      signal,
    })
    const reader = new AttributionReader(this.versionControl, baseCommitFullId, repoRoot)
    const outcome = await coordinator.scan(files, reader)

    return summarize(outcome.results, aggregateOptions)
  }

  private async listFiles(repoRoot: string): Promise<string[]> {
    try {
      return await this.versionControl.listTrackedFiles(repoRoot)
    } catch (error) {
      if (error instanceof EnvironmentError) throw error
      throw new EnvironmentError(`Cannot list tracked files: ${errorMessage(error)}`)
    }
  }
}

export interface CreateAnalyzerOptions {
  cwd?: string
  configPath?: string
  ignoreWhitespace?: boolean
  onWarning?: WarningSink
}

/**
 * Analyzer over the git binary with configuration from the nearest config file
 */
export function createAnalyzer(options: CreateAnalyzerOptions = {}): EvolutionAnalyzer {
  const config = new ConfigLoader(options.configPath, options.cwd).getConfig()
  const versionControl = new GitVersionControl({
    cwd: options.cwd,
    ignoreWhitespace: options.ignoreWhitespace ?? config.attribution.ignoreWhitespace,
    attributionTimeoutMs: config.scan.attributionTimeoutMs,
  })
  return new EvolutionAnalyzer({ versionControl, config, onWarning: options.onWarning })
}

export async function analyze(
  options: AnalyzeOptions,
  analyzerOptions: CreateAnalyzerOptions = {}
): Promise<RepositorySummary> {
  return createAnalyzer(analyzerOptions).analyze(options)
}
