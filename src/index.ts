export * from './contracts'
export * from './errors'
export { EvolutionAnalyzer, createAnalyzer, analyze } from './analyzer/EvolutionAnalyzer'
export type { EvolutionAnalyzerDeps, CreateAnalyzerOptions } from './analyzer/EvolutionAnalyzer'
export { AttributionReader, zeroedResult } from './attribution/AttributionReader'
export type { AttributionRead } from './attribution/AttributionReader'
export { countAttributedLines, parseHeaderCommit } from './attribution/BlamePorcelainParser'
export { ScanCoordinator } from './scan/ScanCoordinator'
export type { FileReader, ScanCoordinatorOptions, ScanOutcome } from './scan/ScanCoordinator'
export { WorkerPool } from './scan/WorkerPool'
export { summarize, buildFileBreakdown, emptySummary, evolutionPercent, survivalPercent } from './aggregate/Aggregator'
export { GitVersionControl } from './git/GitVersionControl'
export type { VersionControl, AttributeFileOptions } from './git/VersionControl'
export { runGitCommand, GitSpawnError } from './git/GitCommandRunner'
export type { GitCommandResult, GitCommandRunner, RunGitCommandOptions } from './git/GitCommandRunner'
export { ConfigLoader } from './config/ConfigLoader'
export { renderReport, renderText, renderJson, renderQuiet } from './formatting/ReportRenderer'
export { MemoryVersionControl, toPorcelain } from './git/MemoryVersionControl'
export type { MemoryFile, MemoryRepository } from './git/MemoryVersionControl'
