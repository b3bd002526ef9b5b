// src/main/render/console-render-sink.ts
import { emitKeypressEvents } from 'readline'
import type { LanguageActions, LanguageCode, LanguagePair, RenderSink, SourceLanguage, TranslationResult } from '../types/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('Render')

const LANGUAGE_NAMES: Record<string, string> = {
  auto: 'Auto-detect',
  ja: 'Japanese',
  en: 'English',
}

export const SOURCE_CYCLE: readonly SourceLanguage[] = ['auto', 'ja', 'en']
export const DEST_CYCLE: readonly LanguageCode[] = ['ja', 'en']

export function languageLabel(code: string | undefined): string {
  if (!code) return LANGUAGE_NAMES.auto
  return LANGUAGE_NAMES[code] ?? code
}

export function nextInCycle<T>(cycle: readonly T[], current: T): T {
  const index = cycle.indexOf(current)
  return cycle[(index + 1) % cycle.length]
}

export function formatResult(result: TranslationResult): string {
  const header = result.error
    ? `--- translation failed (${result.error}) ---`
    : `--- ${languageLabel(result.detectedLanguage)} ---`
  return [header, result.originalText, '', result.translatedText, ''].join('\n')
}

interface Writable {
  write(chunk: string): unknown
}

type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean
  setRawMode?(mode: boolean): unknown
}

export interface KeyControlCallbacks {
  onRestart(): void
  onQuit(): void
}

/**
 * Terminal presentation: prints each result and the current language pair.
 * The UI state it shows is its own copy; changes go back through LanguageActions.
 */
export class ConsoleRenderSink implements RenderSink {
  private languages: LanguagePair

  constructor(initial: LanguagePair, private readonly out: Writable = process.stdout) {
    this.languages = { ...initial }
  }

  get currentLanguages(): LanguagePair {
    return { ...this.languages }
  }

  present(result: TranslationResult): void {
    this.out.write(`${formatResult(result)}\n`)
  }

  showLanguages(pair: LanguagePair): void {
    this.languages = { ...pair }
    this.out.write(`[${languageLabel(pair.source)} -> ${languageLabel(pair.dest)}]\n`)
  }

  /**
   * On a TTY: t = toggle, s = next source, d = next destination, r = restart, q = quit.
   * Returns a function that detaches the handler.
   */
  attachKeyControls(actions: LanguageActions, callbacks: KeyControlCallbacks, input: KeyInput = process.stdin): () => void {
    if (!input.isTTY) {
      logger.debug('stdin is not a TTY; key controls disabled')
      return () => undefined
    }

    const run = (label: string, action: () => Promise<boolean>) => {
      action().catch((error: unknown) => logger.error(`${label} failed:`, error))
    }

    const onKeypress = (_str: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
      if (!key?.name || key.ctrl) return
      switch (key.name) {
        case 't':
          run('Toggle language', () => actions.onToggleLanguage())
          break
        case 's':
          run('Set source language', () => actions.onSetSourceLanguage(nextInCycle(SOURCE_CYCLE, this.languages.source)))
          break
        case 'd':
          run('Set destination language', () => actions.onSetDestLanguage(nextInCycle(DEST_CYCLE, this.languages.dest)))
          break
        case 'r':
          callbacks.onRestart()
          break
        case 'q':
          callbacks.onQuit()
          break
      }
    }

    emitKeypressEvents(input)
    input.setRawMode?.(true)
    input.on('keypress', onKeypress)
    input.resume()
    this.out.write('Keys: [t] toggle  [s] source  [d] destination  [r] restart  [q] quit\n')

    return () => {
      input.off('keypress', onKeypress)
      input.setRawMode?.(false)
      input.pause()
    }
  }
}
