// src/main/render/console-render-sink.test.ts
import { PassThrough } from 'stream'
import { describe, expect, it, vi } from 'vitest'
import type { LanguageActions } from '../types/index.js'
import { ConsoleRenderSink, SOURCE_CYCLE, formatResult, languageLabel, nextInCycle } from './console-render-sink.js'

class StringOutput {
  text = ''
  write(chunk: string) {
    this.text += chunk
    return true
  }
}

function fakeActions() {
  return {
    onToggleLanguage: vi.fn(async () => true),
    onSetSourceLanguage: vi.fn(async (_language: string) => true),
    onSetDestLanguage: vi.fn(async (_language: string) => true),
  } satisfies LanguageActions
}

function fakeTty() {
  return Object.assign(new PassThrough(), { isTTY: true, setRawMode: vi.fn() })
}

describe('formatting', () => {
  it('labels known languages and passes others through', () => {
    expect(languageLabel('ja')).toBe('Japanese')
    expect(languageLabel(undefined)).toBe('Auto-detect')
    expect(languageLabel('fr')).toBe('fr')
  })

  it('cycles through a list and wraps', () => {
    expect(nextInCycle(SOURCE_CYCLE, 'auto')).toBe('ja')
    expect(nextInCycle(SOURCE_CYCLE, 'en')).toBe('auto')
    expect(nextInCycle(SOURCE_CYCLE, 'de')).toBe('auto')
  })

  it('formats a translation and a failure', () => {
    expect(formatResult({ originalText: 'hello', translatedText: 'konnichiwa', detectedLanguage: 'en', origin: 'hotkey' }))
      .toBe('--- English ---\nhello\n\nkonnichiwa\n')
    expect(formatResult({
      originalText: 'hello',
      translatedText: 'Error during translation: offline',
      error: 'network',
      origin: 'hotkey',
    })).toBe('--- translation failed (network) ---\nhello\n\nError during translation: offline\n')
  })
})

describe('ConsoleRenderSink', () => {
  it('prints results and language changes', () => {
    const out = new StringOutput()
    const sink = new ConsoleRenderSink({ source: 'auto', dest: 'ja' }, out)
    sink.showLanguages({ source: 'en', dest: 'ja' })
    sink.present({ originalText: 'hi', translatedText: 'yaa', detectedLanguage: 'en', origin: 'retranslate' })

    expect(out.text).toBe('[English -> Japanese]\n--- English ---\nhi\n\nyaa\n\n')
    expect(sink.currentLanguages).toEqual({ source: 'en', dest: 'ja' })
  })

  it('maps keys to language actions and lifecycle callbacks', () => {
    const out = new StringOutput()
    const sink = new ConsoleRenderSink({ source: 'auto', dest: 'ja' }, out)
    const actions = fakeActions()
    const callbacks = { onRestart: vi.fn(), onQuit: vi.fn() }
    const input = fakeTty()

    sink.attachKeyControls(actions, callbacks, input)
    expect(input.setRawMode).toHaveBeenCalledWith(true)
    expect(out.text).toBe('Keys: [t] toggle  [s] source  [d] destination  [r] restart  [q] quit\n')

    input.emit('keypress', 't', { name: 't' })
    input.emit('keypress', 's', { name: 's' })
    input.emit('keypress', 'd', { name: 'd' })
    input.emit('keypress', 'r', { name: 'r' })
    input.emit('keypress', 'q', { name: 'q' })
    input.emit('keypress', undefined, { name: 'c', ctrl: true })

    expect(actions.onToggleLanguage).toHaveBeenCalledTimes(1)
    expect(actions.onSetSourceLanguage).toHaveBeenCalledWith('ja')
    expect(actions.onSetDestLanguage).toHaveBeenCalledWith('en')
    expect(callbacks.onRestart).toHaveBeenCalledTimes(1)
    expect(callbacks.onQuit).toHaveBeenCalledTimes(1)
  })

  it('stops reacting after detach', () => {
    const sink = new ConsoleRenderSink({ source: 'auto', dest: 'ja' }, new StringOutput())
    const actions = fakeActions()
    const input = fakeTty()

    const detach = sink.attachKeyControls(actions, { onRestart: vi.fn(), onQuit: vi.fn() }, input)
    detach()
    input.emit('keypress', 't', { name: 't' })

    expect(actions.onToggleLanguage).not.toHaveBeenCalled()
    expect(input.setRawMode).toHaveBeenLastCalledWith(false)
  })

  it('leaves a non-interactive stdin alone', () => {
    const out = new StringOutput()
    const sink = new ConsoleRenderSink({ source: 'auto', dest: 'ja' }, out)
    const input = new PassThrough()
    const actions = fakeActions()

    sink.attachKeyControls(actions, { onRestart: vi.fn(), onQuit: vi.fn() }, input)
    input.emit('keypress', 't', { name: 't' })
    expect(actions.onToggleLanguage).not.toHaveBeenCalled()
    expect(out.text).toBe('')
  })
})
