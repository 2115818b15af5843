export type LogLevel = 'info' | 'warn' | 'error' | 'dim'

export interface Logger {
  log: (message: string, level?: LogLevel) => void
}

export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  log(message: string, level: LogLevel = 'info') {
    if (level === 'dim' && !this.verbose) return
    const t = new Date().toLocaleTimeString()
    const line = `${t} — ${message}`
    if (level === 'error' || level === 'warn') console.error(line)
    else console.log(line)
  }
}

/**
 * Keeps log lines in memory, for tests and for summaries
 */
export class MemoryLogger implements Logger {
  readonly lines: { message: string, level: LogLevel }[] = []

  log(message: string, level: LogLevel = 'info') {
    this.lines.push({ message, level })
  }

  messages(level?: LogLevel): string[] {
    return this.lines
      .filter(line => level === undefined || line.level === level)
      .map(line => line.message)
  }
}
