import adze, { setup } from 'adze'

export type LogLevel = 'alert' | 'error' | 'warn' | 'info' | 'log' | 'debug' | 'verbose'

type LogFn = (...args: [unknown, ...unknown[]]) => void

/** Namespaced logger used across the engine. */
export interface Logger {
  error: LogFn
  warn: LogFn
  info: LogFn
  debug: LogFn
  verbose: LogFn
}

const LEVELS: readonly LogLevel[] = ['alert', 'error', 'warn', 'info', 'log', 'debug', 'verbose']

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value)
}

/** Resolve the active level from SANDBOX_LOG_LEVEL; tests stay quiet unless asked. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.SANDBOX_LOG_LEVEL?.trim().toLowerCase()
  if (requested) return isLogLevel(requested) ? requested : 'info'
  return env.NODE_ENV === 'test' ? 'warn' : 'info'
}

setup({
  activeLevel: resolveLogLevel(),
  withEmoji: false,
})

export function createLogger(namespace: string): Logger {
  const sealed = adze.ns(namespace).seal()
  return {
    error: (...args) => sealed.error(...args),
    warn: (...args) => sealed.warn(...args),
    info: (...args) => sealed.info(...args),
    debug: (...args) => sealed.debug(...args),
    verbose: (...args) => sealed.verbose(...args),
  }
}
