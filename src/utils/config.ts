import Conf from 'conf'

import type {LogLevel} from './logger.js'

import {ValidationError} from '../calculator/errors.js'
import {isSupported, supportedModels} from '../calculator/models.js'

export interface ConfigSchema {
  allowedOrigins: string[]
  defaultModel: string
  port: number
  preprocessMarkdown: boolean
}

export type ConfigStore = Conf<ConfigSchema>

export interface Settings extends ConfigSchema {
  logLevel: LogLevel
}

const LOG_LEVELS: readonly LogLevel[] = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']

let sharedStore: ConfigStore | undefined

/**
 * Persisted user settings. Pass `cwd` to keep the file somewhere other than
 * the user's config directory.
 */
export function createConfigStore(options: {cwd?: string} = {}): ConfigStore {
  return new Conf<ConfigSchema>({
    cwd: options.cwd,
    projectName: 'token-calc',
    schema: {
      allowedOrigins: {
        default: ['http://localhost:5000'],
        items: {type: 'string'},
        type: 'array',
      },
      defaultModel: {
        default: 'gpt-4',
        type: 'string',
      },
      port: {
        default: 5000,
        maximum: 65_535,
        minimum: 0,
        type: 'integer',
      },
      preprocessMarkdown: {
        default: true,
        type: 'boolean',
      },
    },
  })
}

export function getConfigStore(): ConfigStore {
  sharedStore ??= createConfigStore()
  return sharedStore
}

export function getConfigPath(store: ConfigStore = getConfigStore()): string {
  return store.path
}

export function getAnthropicApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.ANTHROPIC_API_KEY?.trim() || undefined
}

/**
 * Stored settings with environment overrides applied.
 */
export function resolveSettings(
  store: ConfigStore = getConfigStore(),
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const origins = env.ALLOWED_ORIGINS
    ?.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean)

  return {
    allowedOrigins: origins && origins.length > 0 ? origins : store.get('allowedOrigins'),
    defaultModel: store.get('defaultModel'),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    port: env.PORT ? parsePort(env.PORT) : store.get('port'),
    preprocessMarkdown: store.get('preprocessMarkdown'),
  }
}

/**
 * The settings `count` falls back to. Unlike resolveSettings this never
 * reads `$PORT`, so a bad port cannot break counting.
 */
export function countDefaults(
  store: ConfigStore = getConfigStore(),
): Pick<Settings, 'defaultModel' | 'preprocessMarkdown'> {
  return {
    defaultModel: store.get('defaultModel'),
    preprocessMarkdown: store.get('preprocessMarkdown'),
  }
}

export function setDefaultModel(model: string, store: ConfigStore = getConfigStore()): void {
  if (!isSupported(model)) {
    throw new ValidationError(`Unsupported model: ${model}. Use one of: ${supportedModels().join(', ')}`)
  }

  store.set('defaultModel', model)
}

export function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ValidationError(`Invalid port: ${value}`)
  }

  return port
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase()
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info'
}
