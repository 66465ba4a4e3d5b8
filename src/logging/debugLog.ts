import { appendFileSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when GIT_EVOLVE_DEBUG environment variable is set
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.GIT_EVOLVE_DEBUG === 'true' || env.GIT_EVOLVE_DEBUG === '1'
}

export function debugLogPath(): string {
  return join(homedir(), '.git-evolve', 'debug.log')
}

export function debugLog(message: Record<string, unknown>): void {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()
  mkdirSync(dirname(logPath), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export type WarningSink = (message: string) => void

export const stderrWarning: WarningSink = (message) => {
  console.error(`git-evolve: warning: ${message}`)
}
