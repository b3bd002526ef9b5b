// src/main/core/pipeline/translation-worker.test.ts
import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import type { RenderSink, TranslationOutput, TranslationRequest, TranslationResult, Translator } from '../../types/index.js'
import { TranslationNetworkError } from '../../utils/errors.js'
import { AppState } from '../state/app-state.js'
import { AsyncChannel } from './async-channel.js'
import { TranslationWorker } from './translation-worker.js'

class CollectingSink implements RenderSink {
  results: TranslationResult[] = []
  present(result: TranslationResult) {
    this.results.push(result)
  }
  showLanguages() { }
}

function request(sourceText: string, extra: Partial<TranslationRequest> = {}): TranslationRequest {
  return { sourceText, requestedAt: 0, origin: 'hotkey', ...extra }
}

describe('TranslationWorker', () => {
  let translate: Mock<[string, string, string], Promise<TranslationOutput>>
  let state: AppState
  let channel: AsyncChannel<TranslationRequest>
  let sink: CollectingSink

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    translate = vi.fn<[string, string, string], Promise<TranslationOutput>>(async (text: string, _source: string, dest: string) => ({
      translatedText: `${text.toUpperCase()}:${dest}`,
      detectedLanguage: 'en',
    }))
    const translator: Translator = { translate }
    state = new AppState({ source: 'auto', dest: 'ja', translatorFactory: () => translator })
    channel = new AsyncChannel<TranslationRequest>()
    sink = new CollectingSink()
  })

  it('publishes results in request order', async () => {
    const worker = new TranslationWorker(channel, state, sink)
    const done = worker.start()
    channel.enqueue(request('one'))
    channel.enqueue(request('two'))
    channel.enqueue(request('three'))

    await vi.waitFor(() => expect(sink.results).toHaveLength(3))
    expect(sink.results.map(r => r.translatedText)).toEqual(['ONE:ja', 'TWO:ja', 'THREE:ja'])
    expect(sink.results[0]).toEqual({
      originalText: 'one',
      translatedText: 'ONE:ja',
      detectedLanguage: 'en',
      origin: 'hotkey',
    })

    channel.close()
    await done
    expect(worker.processedCount).toBe(3)
  })

  it('uses the request hint over the current source and records the text', async () => {
    const worker = new TranslationWorker(channel, state, sink)
    const done = worker.start()
    channel.enqueue(request('hello', { sourceLanguageHint: 'en' }))

    await vi.waitFor(() => expect(sink.results).toHaveLength(1))
    expect(translate).toHaveBeenCalledWith('hello', 'en', 'ja')
    expect((await state.snapshot()).lastOriginalText).toBe('hello')

    channel.close()
    await done
  })

  it('turns a translation failure into an error result and keeps going', async () => {
    translate.mockRejectedValueOnce(new TranslationNetworkError('offline'))
    translate.mockRejectedValueOnce(new Error('unexpected'))
    const worker = new TranslationWorker(channel, state, sink)
    const done = worker.start()
    channel.enqueue(request('a'))
    channel.enqueue(request('b', { sourceLanguageHint: 'fr' }))
    channel.enqueue(request('c'))

    await vi.waitFor(() => expect(sink.results).toHaveLength(3))
    expect(sink.results[0]).toEqual({
      originalText: 'a',
      translatedText: 'Error during translation: offline',
      detectedLanguage: undefined,
      error: 'network',
      origin: 'hotkey',
    })
    expect(sink.results[1]).toEqual({
      originalText: 'b',
      translatedText: 'Error during translation: unexpected',
      detectedLanguage: 'fr',
      error: 'service',
      origin: 'hotkey',
    })
    expect(sink.results[2].translatedText).toBe('C:ja')
    expect((await state.snapshot()).lastOriginalText).toBe('c')

    channel.close()
    await done
  })

  it('publishes an error result when the translator cannot be built', async () => {
    state = new AppState({
      source: 'auto',
      dest: 'ja',
      translatorFactory: () => {
        throw new Error('no client')
      },
    })
    const worker = new TranslationWorker(channel, state, sink)
    const done = worker.start()
    channel.enqueue(request('a'))

    await vi.waitFor(() => expect(sink.results).toHaveLength(1))
    expect(sink.results[0].error).toBe('service')

    channel.close()
    await done
  })

  it('holds no lock while translating, so language changes go through', async () => {
    let release: () => void = () => undefined
    translate.mockImplementationOnce((text: string, _source: string, dest: string) => new Promise(resolve => {
      release = () => resolve({ translatedText: `${text}:${dest}` })
    }))
    const worker = new TranslationWorker(channel, state, sink)
    const done = worker.start()
    channel.enqueue(request('slow'))

    await vi.waitFor(() => expect(worker.currentRequest?.sourceText).toBe('slow'))
    expect(state.stateLock.isLocked).toBe(false)
    expect(state.clientLock.isLocked).toBe(false)

    const change = await state.toggleLanguage()
    expect(change.snapshot.dest).toBe('en')

    release()
    await vi.waitFor(() => expect(sink.results).toHaveLength(1))
    // Translated with the pair captured before the toggle
    expect(sink.results[0].translatedText).toBe('slow:ja')

    channel.close()
    await done
  })

  it('keeps running when the sink throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const present = vi.fn()
    present.mockImplementationOnce(() => {
      throw new Error('render failed')
    })
    const worker = new TranslationWorker(channel, state, { present, showLanguages: vi.fn() })
    const done = worker.start()
    channel.enqueue(request('a'))
    channel.enqueue(request('b'))

    await vi.waitFor(() => expect(present).toHaveBeenCalledTimes(2))
    channel.close()
    await done
    expect(worker.processedCount).toBe(2)
  })

  it('starts its loop only once', () => {
    const worker = new TranslationWorker(channel, state, sink)
    expect(worker.start()).toBe(worker.start())
    channel.close()
  })
})
