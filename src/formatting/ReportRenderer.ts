import { FileEvolutionEntry, ReportFormat, RepositorySummary } from '../contracts'

const RULE_WIDTH = 60
const BAR_WIDTH = 50
const FILE_BAR_WIDTH = 20
const MAX_PATH_WIDTH = 40
export const TEXT_BREAKDOWN_ROWS = 10

export function formatNumber(value: number): string {
  return value.toLocaleString('en-US')
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`
}

export function asciiBar(percentage: number, width: number = BAR_WIDTH): string {
  const clamped = Math.min(Math.max(percentage, 0), 100)
  const filled = Math.floor((width * clamped) / 100)
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}]`
}

function shortenPath(filePath: string): string {
  if (filePath.length <= MAX_PATH_WIDTH) return filePath
  return '...' + filePath.slice(-(MAX_PATH_WIDTH - 3))
}

function header(text: string): string {
  const rule = '─'.repeat(RULE_WIDTH)
  return `${rule}\n  ${text}\n${rule}\n`
}

function statRow(label: string, value: number): string {
  return `  ${label.padEnd(25)} ${formatNumber(value)}\n`
}

function breakdownRows(entries: FileEvolutionEntry[]): string {
  let message = ''
  entries.slice(0, TEXT_BREAKDOWN_ROWS).forEach((entry, i) => {
    const filled = Math.floor((entry.evolutionPercent * FILE_BAR_WIDTH) / 100)
    const bar = '█'.repeat(filled) + '░'.repeat(FILE_BAR_WIDTH - filled)
    message += `  ${String(i + 1).padStart(2)}. ${shortenPath(entry.path)}\n`
    message += `      ${bar} ${formatPercent(entry.evolutionPercent)} (${formatNumber(entry.evolvedLines)} lines)\n`
  })
  return message
}

export function renderText(summary: RepositorySummary): string {
  let message = header(`Git Evolve Report: ${summary.repositoryName}`)
  message += `  Base commit: ${summary.baseCommitFullId.slice(0, 8)}\n\n`

  if (summary.diagnostic === 'no-tracked-files') {
    message += '  No tracked files found.\n'
    return message
  }

  message += '  Code Statistics\n'
  message += `  ${'─'.repeat(40)}\n`
  message += statRow('Total Lines', summary.totalLines)
  message += statRow('Base Lines Surviving', summary.baseLinesSurviving)
  message += statRow('Evolved Lines', summary.evolvedLines)
  message += statRow('Files Analyzed', summary.filesAnalyzed)
  message += '\n'
  message += `  Evolution: ${formatPercent(summary.evolutionPercent)} | Survival: ${formatPercent(summary.survivalPercent)}\n`
  message += `  ${asciiBar(summary.evolutionPercent)}\n`

  if (summary.fileBreakdown && summary.fileBreakdown.length > 0) {
    message += '\n'
    message += header('Top Evolved Files')
    message += breakdownRows(summary.fileBreakdown)
  }

  return message
}

export function renderJson(summary: RepositorySummary): string {
  return JSON.stringify(summary, null, 2)
}

export function renderQuiet(summary: RepositorySummary): string {
  return formatPercent(summary.evolutionPercent)
}

export function renderReport(summary: RepositorySummary, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return renderJson(summary)
    case 'quiet':
      return renderQuiet(summary)
    case 'text':
      return renderText(summary)
  }
}
