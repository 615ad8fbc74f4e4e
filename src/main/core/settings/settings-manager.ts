// src/main/core/settings/settings-manager.ts
import Conf, { type Schema } from 'conf'
import type { AssistantConfig } from '../../types'
import { createLogger, isLogLevel, type LogLevel } from '../../utils/logger'
import { DEFAULT_SYSTEM_PROMPT } from '../conversation/prompts'
const logger = createLogger('Settings')

export type StoredSettings = { [K in keyof AssistantConfig]: AssistantConfig[K] }

export const DEFAULT_MODEL = 'llama-3.3-70b-versatile'

export const DEFAULT_SETTINGS: StoredSettings = {
  apiKey: '',
  hotkey: '',
  modelName: DEFAULT_MODEL,
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
  temperature: 0.7,
  logLevel: 'info',
}

const schema: Schema<StoredSettings> = {
  apiKey: { type: 'string' },
  hotkey: { type: 'string' },
  modelName: { type: 'string', minLength: 1 },
  systemPrompt: { type: 'string' },
  temperature: { type: 'number', minimum: 0, maximum: 2 },
  logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
}

/** Environment variables that take precedence over stored values. */
export const ENV_OVERRIDES = {
  apiKey: 'GROQ_API_KEY',
  hotkey: 'SELECTION_CHAT_HOTKEY',
  modelName: 'SELECTION_CHAT_MODEL',
  logLevel: 'LOG_LEVEL',
} as const

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

let store: Conf<StoredSettings> | null = null

function getStore(): Conf<StoredSettings> {
  if (!store) {
    store = new Conf<StoredSettings>({
      projectName: 'selection-chat',
      defaults: DEFAULT_SETTINGS,
      schema,
    })
    logger.debug(`Settings file: ${store.path}`)
  }
  return store
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

export const settingsManager = {
  get<K extends keyof StoredSettings>(key: K): StoredSettings[K] {
    return getStore().get(key)
  },
  set<K extends keyof StoredSettings>(key: K, value: StoredSettings[K]) {
    getStore().set(key, value)
    logger.debug(`setting ${key} updated`)
  },
  getAll(): StoredSettings {
    return { ...DEFAULT_SETTINGS, ...getStore().store }
  },

  /**
   * Stored settings with environment overrides applied. Throws ConfigError
   * when a required value is missing or a value is out of range.
   */
  resolve(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
    const stored = this.getAll()

    const envLevel = readEnv(env, ENV_OVERRIDES.logLevel)
    let logLevel: LogLevel = stored.logLevel
    if (envLevel !== undefined) {
      if (isLogLevel(envLevel)) {
        logLevel = envLevel
      } else {
        logger.warn(`Ignoring unknown ${ENV_OVERRIDES.logLevel} "${envLevel}"`)
      }
    }

    const config: AssistantConfig = {
      apiKey: readEnv(env, ENV_OVERRIDES.apiKey) ?? stored.apiKey.trim(),
      hotkey: readEnv(env, ENV_OVERRIDES.hotkey) ?? stored.hotkey.trim(),
      modelName: readEnv(env, ENV_OVERRIDES.modelName) ?? stored.modelName,
      systemPrompt: stored.systemPrompt || DEFAULT_SYSTEM_PROMPT,
      temperature: stored.temperature,
      logLevel,
    }

    const missing: string[] = []
    if (!config.apiKey) missing.push(`apiKey (${ENV_OVERRIDES.apiKey})`)
    if (!config.hotkey) missing.push(`hotkey (${ENV_OVERRIDES.hotkey})`)
    if (missing.length > 0) {
      throw new ConfigError(`Missing required settings: ${missing.join(', ')}`)
    }

    if (!Number.isFinite(config.temperature) || config.temperature < 0 || config.temperature > 2) {
      throw new ConfigError(`temperature must be between 0 and 2, got ${config.temperature}`)
    }

    return config
  },
}

export type SettingsManager = typeof settingsManager
export default settingsManager
