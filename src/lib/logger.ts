import type { LogLevel } from '../config'

export type EntryLevel = Exclude<LogLevel, 'silent'>

export interface LogEntry {
  level: EntryLevel
  step: string
  message: string
  data?: Record<string, unknown>
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 }

/** Keeps every entry of an analysis run; echoes those at or above `level` to the console. */
export class AnalysisLogger {
  readonly entries: LogEntry[] = []

  constructor(readonly level: LogLevel = 'warn') {}

  log(level: EntryLevel, step: string, message: string, data?: Record<string, unknown>): void {
    this.entries.push({ level, step, message, data })
    if (RANK[level] < RANK[this.level]) return
    const line = `[${step}] ${message}`
    const args = data ? [line, data] : [line]
    if (level === 'error') console.error(...args)
    else if (level === 'warn') console.warn(...args)
    else if (level === 'info') console.info(...args)
    else console.debug(...args)
  }

  debug(step: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', step, message, data)
  }
  info(step: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', step, message, data)
  }
  warn(step: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', step, message, data)
  }
  error(step: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', step, message, data)
  }

  byStep(step: string): LogEntry[] {
    return this.entries.filter((e) => e.step === step)
  }
}
