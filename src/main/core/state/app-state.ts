// src/main/core/state/app-state.ts
import type { LanguageCode, LanguagePair, SourceLanguage, Translator, TranslatorFactory } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import { Mutex } from './mutex.js'

const logger = createLogger('State')

export const DEFAULT_LANGUAGE_SEQUENCE: readonly LanguageCode[] = ['ja', 'en']

export interface LanguageSnapshot extends LanguagePair {
  lastOriginalText?: string
}

export interface LanguageChange {
  changed: boolean
  snapshot: LanguageSnapshot
}

export interface AppStateOptions {
  source: SourceLanguage
  dest: LanguageCode
  translatorFactory: TranslatorFactory
  languageOptions?: readonly LanguageCode[]
}

/**
 * Language state and the lazily built translator.
 *
 * Two locks, always taken in this order when both are needed:
 * `stateLock` (language pair, last text) then `clientLock` (translator handle).
 * Nothing in here holds a lock across a translation call.
 */
export class AppState {
  readonly stateLock = new Mutex('state-lock', 1)
  readonly clientLock = new Mutex('client-lock', 2)

  private source: SourceLanguage
  private dest: LanguageCode
  private lastOriginalText: string | undefined
  private readonly languageOptions: LanguageCode[]

  private client: Translator | undefined
  private clientBuilds = 0
  private readonly translatorFactory: TranslatorFactory

  constructor(options: AppStateOptions) {
    this.source = options.source
    this.dest = options.dest
    this.translatorFactory = options.translatorFactory
    this.languageOptions = [...(options.languageOptions ?? DEFAULT_LANGUAGE_SEQUENCE)]
    if (!this.languageOptions.includes(this.dest)) {
      this.languageOptions.push(this.dest)
    }
  }

  snapshot(): Promise<LanguageSnapshot> {
    return this.stateLock.runExclusive(() => this.capture())
  }

  recordTranslation(originalText: string): Promise<void> {
    return this.stateLock.runExclusive(() => {
      this.lastOriginalText = originalText
    })
  }

  /**
   * Swap source and destination when the source is a concrete language,
   * otherwise step the destination through the language options.
   */
  toggleLanguage(): Promise<LanguageChange> {
    return this.stateLock.runExclusive(() => {
      if (this.source !== 'auto') {
        const previousSource = this.source
        this.source = this.dest
        this.dest = previousSource
      } else {
        const index = this.languageOptions.indexOf(this.dest)
        this.dest = this.languageOptions[(index + 1) % this.languageOptions.length]
      }
      logger.debug('Languages toggled', this.source, '->', this.dest)
      return { changed: true, snapshot: this.capture() }
    })
  }

  setSourceLanguage(language: SourceLanguage): Promise<LanguageChange> {
    return this.stateLock.runExclusive(() => {
      const changed = language !== this.source
      this.source = language
      return { changed, snapshot: this.capture() }
    })
  }

  setDestLanguage(language: LanguageCode): Promise<LanguageChange> {
    return this.stateLock.runExclusive(() => {
      const changed = language !== this.dest
      this.dest = language
      if (!this.languageOptions.includes(language)) {
        this.languageOptions.push(language)
      }
      return { changed, snapshot: this.capture() }
    })
  }

  /**
   * Returns the shared translator, building it on first use.
   * Double-checked: the fast path reads without the lock, the build happens once under clientLock.
   */
  async getClient(): Promise<Translator> {
    const existing = this.client
    if (existing) return existing

    return this.clientLock.runExclusive(async () => {
      if (this.client) return this.client
      const created = await this.translatorFactory()
      this.clientBuilds++
      this.client = created
      logger.info(`Translator client built (#${this.clientBuilds})`)
      return created
    })
  }

  resetClient(): Promise<void> {
    return this.clientLock.runExclusive(() => {
      if (this.client) {
        logger.info('Translator client released')
      }
      this.client = undefined
    })
  }

  hasClient(): boolean {
    return this.client !== undefined
  }

  /** How many times a translator has been constructed */
  get clientBuildCount(): number {
    return this.clientBuilds
  }

  // Caller must hold stateLock
  private capture(): LanguageSnapshot {
    return { source: this.source, dest: this.dest, lastOriginalText: this.lastOriginalText }
  }
}
