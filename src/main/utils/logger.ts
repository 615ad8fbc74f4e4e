// src/main/utils/logger.ts
import { Console } from 'node:console'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

// stdout belongs to the terminal host
const sink = new Console({ stdout: process.stderr, stderr: process.stderr })

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value)
}

const envLevel = process.env.LOG_LEVEL
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel) {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: LogLevel) {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
}

export function createLogger(scope = 'App') {
  return {
    debug: (...args: unknown[]) => { if (enabled('debug')) sink.debug(`[${scope}]`, ...args) },
    info: (...args: unknown[]) => { if (enabled('info')) sink.info(`[${scope}]`, ...args) },
    warn: (...args: unknown[]) => { if (enabled('warn')) sink.warn(`[${scope}]`, ...args) },
    error: (...args: unknown[]) => { if (enabled('error')) sink.error(`[${scope}]`, ...args) },
  }
}

export type Logger = ReturnType<typeof createLogger>

/**
 * Shortens text for log lines: first `max` characters, newlines flattened.
 */
export function preview(text: string, max = 50): string {
  const flat = text.replace(/\r?\n/g, ' ')
  return flat.length > max ? `${flat.substring(0, max)}...` : flat
}
