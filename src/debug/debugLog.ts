import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when INVENTORY_WATCH_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.INVENTORY_WATCH_DEBUG === 'true' || process.env.INVENTORY_WATCH_DEBUG === '1'

export interface DebugEvent {
  event: string
  [key: string]: unknown
}

export const debugLog = (message: DebugEvent): void => {
  if (!isDebugEnabled()) return

  const logDir = join(homedir(), '.inventory-watch')
  const logPath = join(logDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(logDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
