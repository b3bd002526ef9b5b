// src/main/utils/config.ts
import { validateNumericInput, validateTextInput } from '../../utils/validation.js'
import { createLogger, isLogLevel } from './logger.js'
import type { LogLevel } from './logger.js'

const logger = createLogger('Config')

export interface AppConfig {
  logLevel: LogLevel
  logFile?: string
  translateTimeoutMs: number
  translateHost?: string
  clipboardSettleMs: number
  configDir?: string
}

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  translateTimeoutMs: 5000,
  clipboardSettleMs: 50,
}

type Env = Record<string, string | undefined>

function readNumber(env: Env, name: string, fallback: number, options: Parameters<typeof validateNumericInput>[1]): number {
  const raw = env[name]
  if (raw === undefined || raw === '') return fallback
  const result = validateNumericInput(raw, options)
  if (!result.valid) {
    logger.warn(`Ignoring ${name}=${raw}: ${result.error}`)
    return fallback
  }
  return Number(result.sanitized)
}

function readText(env: Env, name: string): string | undefined {
  const result = validateTextInput(env[name], { maxLength: 1024 })
  return result.valid && result.sanitized ? result.sanitized : undefined
}

/**
 * Reads COPY_TRANSLATE_* variables (dotenv has already merged .env into process.env).
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const level = readText(env, 'COPY_TRANSLATE_LOG_LEVEL')?.toLowerCase()
  let logLevel = DEFAULT_CONFIG.logLevel
  if (level) {
    if (isLogLevel(level)) {
      logLevel = level
    } else {
      logger.warn(`Ignoring COPY_TRANSLATE_LOG_LEVEL=${level}: expected debug, info, warn or error`)
    }
  }

  return {
    logLevel,
    logFile: readText(env, 'COPY_TRANSLATE_LOG_FILE'),
    translateTimeoutMs: readNumber(env, 'COPY_TRANSLATE_TIMEOUT_MS', DEFAULT_CONFIG.translateTimeoutMs, { min: 100, max: 120000, allowDecimal: false }),
    translateHost: readText(env, 'COPY_TRANSLATE_HOST'),
    clipboardSettleMs: readNumber(env, 'COPY_TRANSLATE_CLIPBOARD_DELAY_MS', DEFAULT_CONFIG.clipboardSettleMs, { min: 0, max: 5000, allowDecimal: false }),
    configDir: readText(env, 'COPY_TRANSLATE_CONFIG_DIR'),
  }
}
