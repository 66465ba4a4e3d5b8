#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { ReportFormat, RepositorySummary, AnalyzeOptions, WorkerCountSchema } from '../contracts'
import { InterruptedError, toEvolveError, EXIT_CODE_BY_ERROR } from '../errors'
import { createAnalyzer, CreateAnalyzerOptions } from '../analyzer/EvolutionAnalyzer'
import { renderReport } from '../formatting/ReportRenderer'
import { debugLog } from '../logging/debugLog'
import packageJson from '../../package.json'

export const INTERRUPTED_EXIT_CODE = EXIT_CODE_BY_ERROR.INTERRUPTED

export type CliOptions = {
  base: string
  json?: boolean
  quiet?: boolean
  files?: boolean
  parallel: boolean
  workers?: number
  config?: string
  ignoreWhitespace: boolean
}

export interface CliIO {
  out: (text: string) => void
  err: (text: string) => void
}

interface Analyzer {
  analyze(options: AnalyzeOptions): Promise<RepositorySummary>
}

export interface RunDeps {
  io?: CliIO
  signal?: AbortSignal
  createAnalyzer?: (options: CreateAnalyzerOptions) => Analyzer
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
}

function parseWorkers(value: string): number {
  const parsed = WorkerCountSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed.data
}

export function buildProgram(io: CliIO): Command {
  return new Command()
    .name('git-evolve')
    .description('Analyze code evolution from a base commit.')
    .version(packageJson.version)
    .addHelpText('after', '\nExamples: git-evolve --base v1.0.0 | git-evolve --base HEAD~20 --files')
    .requiredOption('-b, --base <ref>', 'Base commit hash, tag, or reference')
    .option('--json', 'Output as JSON')
    .option('--quiet', 'Print only the evolution percentage')
    .option('--files', 'Show per-file breakdown')
    .option('--no-parallel', 'Disable parallel processing')
    .option('--workers <count>', 'Number of workers (default: 4)', parseWorkers)
    .option('--config <path>', 'Path to a git-evolve config file')
    .option('--no-ignore-whitespace', 'Attribute whitespace-only changes too')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
}

function reportFormat(options: CliOptions): ReportFormat {
  if (options.json) return 'json'
  if (options.quiet) return 'quiet'
  return 'text'
}

/**
 * Parse user arguments, run the analysis and print the report.
 * Resolves to the process exit code.
 */
export async function run(argv: string[], deps: RunDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO
  const program = buildProgram(io)

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }

  const options = program.opts<CliOptions>()
  // Flags given on the command line win over the config file; commander defaults do not
  const fromCli = (key: keyof CliOptions) => program.getOptionValueSource(key) === 'cli'

  const analyzer = (deps.createAnalyzer ?? createAnalyzer)({
    configPath: options.config,
    ignoreWhitespace: fromCli('ignoreWhitespace') ? options.ignoreWhitespace : undefined,
    onWarning: (message) => io.err(`git-evolve: warning: ${message}`),
  })

  try {
    const summary = await analyzer.analyze({
      base: options.base,
      fileBreakdown: options.files ?? false,
      parallel: fromCli('parallel') ? options.parallel : undefined,
      workers: options.workers,
      signal: deps.signal,
    })
    io.out(renderReport(summary, reportFormat(options)))
    return 0
  } catch (error) {
    const evolveError = toEvolveError(error)
    debugLog({ event: 'run_failed', code: evolveError.code, message: evolveError.message })
    if (evolveError instanceof InterruptedError) {
      io.err('Interrupted')
    } else {
      io.err(`git-evolve: ${evolveError.message}`)
    }
    return evolveError.exitCode
  }
}

// Only run if this is the main module
if (require.main === module) {
  const controller = new AbortController()
  const onSignal = () => {
    // A second interrupt does not wait for in-flight git processes
    if (controller.signal.aborted) process.exit(INTERRUPTED_EXIT_CODE)
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  run(process.argv.slice(2), { signal: controller.signal }).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error('git-evolve:', error)
      process.exit(1)
    }
  )
}
