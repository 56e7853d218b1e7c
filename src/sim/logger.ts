export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogDetails = Record<string, string | number | boolean | null>

export interface LogEntry {
  level: LogLevel
  scope: string
  message: string
  details?: LogDetails
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, details?: LogDetails): void
  info(message: string, details?: LogDetails): void
  warn(message: string, details?: LogDetails): void
  error(message: string, details?: LogDetails): void
  isEnabled(level: LogLevel): boolean
  child(scope: string): Logger
}

export const consoleSink: LogSink = ({ level, scope, message, details }) => {
  const line = `[${scope}] ${message}`
  if (details) console[level](line, details)
  else console[level](line)
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const isEnabled = (entryLevel: LogLevel) => LOG_LEVELS.indexOf(entryLevel) >= threshold
  const emit = (entryLevel: LogLevel, message: string, details?: LogDetails) => {
    if (!isEnabled(entryLevel)) return
    sink(details ? { level: entryLevel, scope, message, details } : { level: entryLevel, scope, message })
  }
  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
    isEnabled,
    child: (childScope) => createLogger(childScope, level, sink),
  }
}

// Collects entries in memory instead of printing them.
export function createMemorySink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return { sink: (entry) => { entries.push(entry) }, entries }
}
