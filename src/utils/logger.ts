import {Logger} from 'tslog'

export type LogLevel = 'debug' | 'error' | 'fatal' | 'info' | 'silly' | 'trace' | 'warn'

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
}

export type AppLogger = Logger<unknown>

export function createLogger(name: string, options?: {level?: LogLevel; redact?: boolean}): AppLogger {
  const level = options?.level ?? 'info'
  const shouldRedact = options?.redact !== false

  return new Logger({
    minLevel: LOG_LEVEL_MAP[level],
    name,
    type: 'pretty',
    ...(shouldRedact && {
      maskPlaceholder: '[REDACTED]',
      maskValuesOfKeys: ['apiKey', 'api_key', 'authorization', 'password', 'secret', 'token', 'x-api-key'],
    }),
  })
}
