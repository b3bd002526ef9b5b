// src/main/types/index.ts
import type { TranslationErrorKind } from '../utils/errors.js'

export type LanguageCode = string
export type SourceLanguage = 'auto' | LanguageCode

export interface LanguagePair {
  source: SourceLanguage
  dest: LanguageCode
}

export type RequestOrigin = 'hotkey' | 'retranslate'

export interface TranslationRequest {
  readonly sourceText: string
  /** Seconds on the app clock */
  readonly requestedAt: number
  readonly sourceLanguageHint?: SourceLanguage
  readonly origin: RequestOrigin
}

export interface TranslationResult {
  readonly originalText: string
  readonly translatedText: string
  readonly detectedLanguage?: string
  readonly error?: TranslationErrorKind
  readonly origin: RequestOrigin
}

export interface TranslationOutput {
  translatedText: string
  detectedLanguage?: string
}

/** The network collaborator. Implementations enforce their own timeout. */
export interface Translator {
  translate(text: string, sourceHint: SourceLanguage, dest: LanguageCode): Promise<TranslationOutput>
}

export type TranslatorFactory = () => Promise<Translator> | Translator

export type HotkeyName = 'copy' | 'stateDump'

export interface HotkeySpec {
  name: HotkeyName
  /** Normalized key names, modifiers first, trigger key last */
  combo: readonly string[]
  display: string
  requiredPressCount: number
  windowSeconds: number
  minRetriggerSeconds: number
  allowRepeat: boolean
}

export interface KeyEvent {
  type: 'down' | 'up'
  key: string
  /** Seconds on the app clock */
  timestamp: number
}

/** Monotonic clock in seconds */
export type Clock = () => number

export interface LanguageActions {
  onToggleLanguage(): Promise<boolean>
  onSetSourceLanguage(language: SourceLanguage): Promise<boolean>
  onSetDestLanguage(language: LanguageCode): Promise<boolean>
}

export interface RenderSink {
  present(result: TranslationResult): void
  showLanguages(pair: LanguagePair): void
}

export interface ClipboardReader {
  readText(): Promise<string>
}
