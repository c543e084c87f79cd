import type { LoggingMode, OperationLogEntry, OperationsLogger } from './types.js'

/**
 * In-memory operations logger
 * Keeps every logged operation for later inspection (audit trails, tests)
 */
export class ArrayOperationsLogger implements OperationsLogger {
  private entries: OperationLogEntry[] = []

  constructor(public readonly mode: LoggingMode = 'standard') {}

  log(entry: OperationLogEntry): void {
    this.entries.push(entry)
  }

  getEntries(): ReadonlyArray<OperationLogEntry> {
    return this.entries
  }

  getEntriesByOperation(operation: OperationLogEntry['operation']): ReadonlyArray<OperationLogEntry> {
    return this.entries.filter((entry) => entry.operation === operation)
  }

  getEntriesByStatus(success: boolean): ReadonlyArray<OperationLogEntry> {
    return this.entries.filter((entry) => entry.success === success)
  }

  get length(): number {
    return this.entries.length
  }

  clear(): void {
    this.entries = []
  }
}
