export type ScanMode = 'parallel' | 'serial'

export interface FileAttributionResult {
  path: string
  totalLines: number
  baseAttributedLines: number
}

export interface FileEvolutionEntry {
  path: string
  totalLines: number
  evolvedLines: number
  evolutionPercent: number
}

/**
 * Why a summary carries zero counts when it is not simply "nothing changed".
 */
export type SummaryDiagnostic = 'no-tracked-files'

export interface RepositorySummary {
  baseCommitFullId: string
  totalLines: number
  baseLinesSurviving: number
  evolvedLines: number
  evolutionPercent: number
  survivalPercent: number
  filesAnalyzed: number
  repositoryName: string
  fileBreakdown?: FileEvolutionEntry[]
  diagnostic?: SummaryDiagnostic
}

export interface AnalyzeOptions {
  base: string
  fileBreakdown?: boolean
  parallel?: boolean
  workers?: number
  signal?: AbortSignal
}

export interface EvolveConfig {
  scan: {
    parallel: boolean
    workers: number
    parallelThreshold: number
    attributionTimeoutMs?: number
  }
  attribution: {
    ignoreWhitespace: boolean
  }
  report: {
    breakdownLimit: number
  }
}

export type ReportFormat = 'text' | 'json' | 'quiet'
