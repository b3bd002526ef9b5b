// src/main/core/pipeline/translation-worker.ts
import type { RenderSink, TranslationRequest, TranslationResult } from '../../types/index.js'
import { TranslationError, TranslationServiceError, errorMessage } from '../../utils/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { AppState } from '../state/app-state.js'
import type { AsyncChannel } from './async-channel.js'

const logger = createLogger('Worker')

/**
 * The single consumer of the request channel.
 * Snapshot under state-lock, release, translate with no lock held, then record and publish.
 */
export class TranslationWorker {
  private running: Promise<void> | undefined
  private processed = 0
  private inFlight: TranslationRequest | undefined

  constructor(
    private readonly channel: AsyncChannel<TranslationRequest>,
    private readonly state: AppState,
    private readonly sink: RenderSink,
  ) { }

  get processedCount(): number {
    return this.processed
  }

  get currentRequest(): TranslationRequest | undefined {
    return this.inFlight
  }

  /** Starts the loop once; the returned promise settles after the channel closes and the last request finishes */
  start(): Promise<void> {
    this.running ??= this.run()
    return this.running
  }

  private async run(): Promise<void> {
    logger.debug('Translation worker started')
    for (;;) {
      const next = await this.channel.dequeue()
      if (next.done) break
      this.inFlight = next.value
      try {
        await this.process(next.value)
      } catch (error) {
        // process() already contains translation failures; this is a bug elsewhere
        logger.error('Unexpected error while processing request:', error)
      } finally {
        this.inFlight = undefined
        this.processed++
      }
    }
    logger.debug(`Translation worker exited after ${this.processed} request(s)`)
  }

  private async process(request: TranslationRequest): Promise<void> {
    const snapshot = await this.state.snapshot()
    const source = request.sourceLanguageHint ?? snapshot.source
    const dest = snapshot.dest

    let result: TranslationResult
    try {
      const client = await this.state.getClient()
      const output = await client.translate(request.sourceText, source, dest)
      await this.state.recordTranslation(request.sourceText)
      result = {
        originalText: request.sourceText,
        translatedText: output.translatedText,
        detectedLanguage: output.detectedLanguage,
        origin: request.origin,
      }
      logger.info(`Translated ${request.sourceText.length} chars (${output.detectedLanguage ?? source} -> ${dest})`)
    } catch (error) {
      const failure = error instanceof TranslationError
        ? error
        : new TranslationServiceError(errorMessage(error), { cause: error })
      logger.warn(`Translation failed (${failure.kind}): ${failure.message}`)
      result = {
        originalText: request.sourceText,
        translatedText: `Error during translation: ${failure.message}`,
        detectedLanguage: source === 'auto' ? undefined : source,
        error: failure.kind,
        origin: request.origin,
      }
    }

    this.publish(result)
  }

  private publish(result: TranslationResult) {
    try {
      this.sink.present(result)
    } catch (error) {
      logger.error('Render sink failed to present result:', error)
    }
  }
}
