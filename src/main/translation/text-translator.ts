// src/main/translation/text-translator.ts
import { translate } from '@vitalets/google-translate-api'
import type { LanguageCode, SourceLanguage, TranslationOutput, Translator } from '../types/index.js'
import {
  TranslationError,
  TranslationNetworkError,
  TranslationServiceError,
  errorMessage,
} from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'
import { RateLimiter, SimpleCache, withTimeout } from '../utils/network.js'

const logger = createLogger('Translator')

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
])

export type TranslateFn = (
  text: string,
  options: { from: string; to: string; host?: string }
) => Promise<{ text: string; raw?: { src?: string } }>

export interface TextTranslatorOptions {
  timeoutMs?: number
  host?: string
  requestsPerSecond?: number
  cacheTtlMs?: number
  /** Replaces the Google call, mainly for tests */
  translateFn?: TranslateFn
}

function readProperty(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined
}

/**
 * Map whatever the HTTP stack threw onto the three translation error kinds.
 */
export function classifyTranslationError(error: unknown): TranslationError {
  if (error instanceof TranslationError) return error

  const message = errorMessage(error)
  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code')
  const name = error instanceof Error ? error.name : ''

  if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) {
    return new TranslationNetworkError(`Network error while contacting the translation service (${code})`, { cause: error })
  }
  if (name === 'FetchError' || (name === 'TypeError' && /fetch failed/i.test(message))) {
    return new TranslationNetworkError(`Network error while contacting the translation service: ${message}`, { cause: error })
  }
  if (name === 'TooManyRequestsError' || typeof readProperty(error, 'statusCode') === 'number') {
    return new TranslationServiceError(`Translation service refused the request: ${message}`, { cause: error })
  }
  return new TranslationServiceError(`Translation failed: ${message}`, { cause: error })
}

/**
 * Google Translate client. Rate-limited, cached, and bounded by its own timeout.
 */
export class TextTranslator implements Translator {
  private readonly rateLimiter: RateLimiter
  private readonly cache: SimpleCache<TranslationOutput>
  private readonly timeoutMs: number
  private readonly host: string | undefined
  private readonly translateFn: TranslateFn

  constructor(options: TextTranslatorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000
    this.host = options.host
    this.rateLimiter = new RateLimiter(options.requestsPerSecond ?? 10)
    this.cache = new SimpleCache<TranslationOutput>(options.cacheTtlMs ?? 3600000)
    this.translateFn = options.translateFn ?? translate
  }

  async translate(text: string, sourceHint: SourceLanguage, dest: LanguageCode): Promise<TranslationOutput> {
    const input = text.trim()
    if (!input) {
      throw new TranslationServiceError('Cannot translate empty text')
    }

    const cacheKey = `${sourceHint}:${dest}:${input}`
    const cached = this.cache.get(cacheKey)
    if (cached) {
      logger.info('Translation cache hit')
      return cached
    }

    try {
      const result = await withTimeout(
        this.rateLimiter.execute(() => {
          logger.info('Translating to', dest)
          return this.translateFn(input, { from: sourceHint, to: dest, host: this.host })
        }),
        this.timeoutMs,
        'Translation'
      )

      const output: TranslationOutput = {
        translatedText: result.text,
        detectedLanguage: result.raw?.src || (sourceHint === 'auto' ? undefined : sourceHint),
      }

      logger.info('Translation successful', {
        from: output.detectedLanguage ?? 'unknown',
        to: dest,
        originalLength: input.length,
        translatedLength: output.translatedText.length
      })

      this.cache.set(cacheKey, output)
      return output
    } catch (err) {
      const failure = classifyTranslationError(err)
      logger.error(`Translation error (${failure.kind}):`, failure.message)
      throw failure
    }
  }
}
