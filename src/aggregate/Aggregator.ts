import { FileAttributionResult, FileEvolutionEntry, RepositorySummary } from '../contracts'

export const DEFAULT_BREAKDOWN_LIMIT = 20

export interface AggregateOptions {
  baseCommitFullId: string
  repositoryName: string
  fileBreakdown?: boolean
  breakdownLimit?: number
}

/**
 * Percentage of `evolved` in `total`, rounded half-up to two decimals.
 * An empty total is 0% rather than a division by zero.
 *
 * Scaling by 10000 before rounding keeps exact ties (x.xx5) exact in
 * floating point, so they always round up.
 */
export function evolutionPercent(evolved: number, total: number): number {
  if (total <= 0) return 0
  return Math.round((evolved * 10000) / total) / 100
}

export function survivalPercent(roundedEvolutionPercent: number): number {
  return Math.round((100 - roundedEvolutionPercent) * 100) / 100
}

/**
 * Per-file entries for files with content, highest evolution first. Ties
 * keep enumeration order (Array.prototype.sort is stable).
 */
export function buildFileBreakdown(
  results: readonly FileAttributionResult[],
  limit: number = DEFAULT_BREAKDOWN_LIMIT
): FileEvolutionEntry[] {
  return results
    .filter(result => result.totalLines > 0)
    .map(result => {
      const evolvedLines = result.totalLines - result.baseAttributedLines
      return {
        path: result.path,
        totalLines: result.totalLines,
        evolvedLines,
        evolutionPercent: evolutionPercent(evolvedLines, result.totalLines),
      }
    })
    .sort((a, b) => b.evolutionPercent - a.evolutionPercent)
    .slice(0, limit)
}

export function summarize(
  results: readonly FileAttributionResult[],
  options: AggregateOptions
): RepositorySummary {
  let totalLines = 0
  let baseLinesSurviving = 0
  for (const result of results) {
    totalLines += result.totalLines
    baseLinesSurviving += result.baseAttributedLines
  }

  const evolvedLines = totalLines - baseLinesSurviving
  const evolution = evolutionPercent(evolvedLines, totalLines)

  const summary: RepositorySummary = {
    baseCommitFullId: options.baseCommitFullId,
    totalLines,
    baseLinesSurviving,
    evolvedLines,
    evolutionPercent: evolution,
    survivalPercent: survivalPercent(evolution),
    filesAnalyzed: results.length,
    repositoryName: options.repositoryName,
  }

  if (options.fileBreakdown) {
    summary.fileBreakdown = buildFileBreakdown(results, options.breakdownLimit)
  }

  return summary
}

/**
 * Summary for a repository with nothing tracked. Carries a diagnostic so
 * consumers can tell it apart from "tracked, but nothing evolved".
 */
export function emptySummary(options: AggregateOptions): RepositorySummary {
  return {
    ...summarize([], options),
    diagnostic: 'no-tracked-files',
  }
}
