import type { LoggingMode, OperationLogEntry, OperationsLogger } from './types.js'

/**
 * Console-based operations logger
 * Logs session operations to the console with formatted output
 */
export class ConsoleOperationsLogger implements OperationsLogger {
  constructor(public readonly mode: LoggingMode = 'standard') {}

  log(entry: OperationLogEntry): void {
    const timestamp = entry.timestamp.toISOString()
    const prefix = `[${timestamp}] [${entry.username}@${entry.host}]`
    const status = entry.success ? '✓' : '✗'
    const duration = `${entry.durationMs}ms`

    const mainLine = `${prefix} ${status} ${entry.operation}: ${this.truncate(entry.target, 200)} (${duration})`

    if (entry.success) {
      console.log(mainLine)
    } else {
      console.error(mainLine)
    }

    if (!entry.success && entry.error) {
      console.error(`  error${entry.errorCode ? ` [${entry.errorCode}]` : ''}: ${entry.error}`)
    }
  }

  /**
   * Truncate a string to a maximum length
   */
  private truncate(str: string, maxLength: number): string {
    const singleLine = str.replace(/\n/g, '\\n')
    if (singleLine.length <= maxLength) return singleLine
    return `${singleLine.substring(0, maxLength)}...`
  }
}
