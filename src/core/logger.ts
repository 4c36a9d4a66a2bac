// src/core/logger.ts
import pino from 'pino'

export interface LoggerOptions {
  level?: string
  file?: string
  name?: string
}

export function createLogger(opts: LoggerOptions = {}): pino.Logger {
  const level = opts.level ?? process.env['LOG_LEVEL'] ?? 'info'
  const file = opts.file ?? (process.env['LOG_FILE'] || undefined)

  if (file) {
    return pino({ level, name: opts.name }, pino.destination(file))
  }

  // stderr only: stdout carries search results
  return pino({ level, name: opts.name }, process.stderr)
}
