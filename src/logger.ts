export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 }

export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.TEST

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS
}

const envLevel = process.env.LOG_LEVEL

let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEV_LOG ? 'debug' : 'info'

export function setLogLevel(level: LogLevel) {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

/**
 * Maps a repeated `-v` count onto a level: 1 error, 2 warn, 3 info, 4 or more debug.
 */
export function levelFromVerbosity(count: number): LogLevel {
  if (count <= 1) return 'error'
  if (count === 2) return 'warn'
  if (count === 3) return 'info'
  return 'debug'
}

function enabled(level: LogLevel) {
  return LEVELS[level] <= LEVELS[currentLevel]
}

export function debug(...args: unknown[]) {
  if (enabled('debug')) console.debug('[debug]', ...args)
}

export function info(...args: unknown[]) {
  if (enabled('info')) console.info('[info]', ...args)
}

export function warn(...args: unknown[]) {
  if (enabled('warn')) console.warn('[warn]', ...args)
}

export function error(...args: unknown[]) {
  console.error('[error]', ...args)
}
