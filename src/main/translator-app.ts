// src/main/translator-app.ts
import type {
  ClipboardReader,
  Clock,
  HotkeyName,
  HotkeySpec,
  KeyEvent,
  LanguageActions,
  LanguageCode,
  RenderSink,
  SourceLanguage,
  TranslationRequest,
} from './types/index.js'
import { HotkeyMatcher } from './core/hotkeys/hotkey-matcher.js'
import type { InputEventSource } from './core/hotkeys/input-event-source.js'
import { PressPatternDetector } from './core/hotkeys/press-pattern-detector.js'
import { AsyncChannel } from './core/pipeline/async-channel.js'
import { TranslationWorker } from './core/pipeline/translation-worker.js'
import type { AppState, LanguageChange } from './core/state/app-state.js'
import type { LanguagePreferenceWriter } from './core/settings/settings-manager.js'
import { createLogger } from './utils/logger.js'

const logger = createLogger('Main')

export interface TranslatorAppOptions {
  state: AppState
  eventSource: InputEventSource
  hotkeys: readonly HotkeySpec[]
  clipboard: ClipboardReader
  sink: RenderSink
  preferences?: LanguagePreferenceWriter
  clock?: Clock
  /** Wait between the trigger and reading the clipboard, so the copy can land */
  clipboardSettleMs?: number
}

/**
 * Wires the pump, the detectors, the request channel and the worker together,
 * and exposes the language actions the render sink calls back into.
 */
export class TranslatorApp implements LanguageActions {
  private readonly state: AppState
  private readonly eventSource: InputEventSource
  private readonly hotkeys: readonly HotkeySpec[]
  private readonly clipboard: ClipboardReader
  private readonly sink: RenderSink
  private readonly preferences?: LanguagePreferenceWriter
  private readonly clock: Clock
  private readonly clipboardSettleMs: number

  private readonly matcher: HotkeyMatcher
  private readonly detectors: Map<HotkeyName, PressPatternDetector>

  private channel: AsyncChannel<TranslationRequest> | undefined
  private worker: TranslationWorker | undefined
  private workerDone: Promise<void> | undefined
  private captureChain: Promise<void> = Promise.resolve()
  private lastRetranslationKey: string | undefined
  private restarting = false

  constructor(options: TranslatorAppOptions) {
    this.state = options.state
    this.eventSource = options.eventSource
    this.hotkeys = options.hotkeys
    this.clipboard = options.clipboard
    this.sink = options.sink
    this.preferences = options.preferences
    this.clock = options.clock ?? (() => performance.now() / 1000)
    this.clipboardSettleMs = options.clipboardSettleMs ?? 50

    this.matcher = new HotkeyMatcher(this.hotkeys)
    this.detectors = new Map<HotkeyName, PressPatternDetector>(this.hotkeys.map(spec => [spec.name, new PressPatternDetector(spec)]))
  }

  get isRunning(): boolean {
    return this.channel !== undefined
  }

  /** Pending requests, not counting the one in flight */
  get queueLength(): number {
    return this.channel?.size ?? 0
  }

  start(): void {
    if (this.channel) {
      logger.debug('Start ignored: already running')
      return
    }
    const channel = new AsyncChannel<TranslationRequest>('request-channel')
    const worker = new TranslationWorker(channel, this.state, this.sink)
    this.channel = channel
    this.worker = worker
    this.workerDone = worker.start()

    this.eventSource.start(event => this.onKeyEvent(event))
    logger.info(`Running. Bindings: ${this.matcher.describe().join(', ')}`)
  }

  /**
   * Rejects new requests, stops the pump and waits for it, lets the in-flight
   * translation finish, then releases the translator.
   */
  async stop(): Promise<void> {
    const channel = this.channel
    if (!channel) return

    this.channel = undefined
    const discarded = channel.close()
    if (discarded > 0) {
      logger.info(`Discarded ${discarded} pending request(s)`)
    }

    await this.eventSource.stop()
    await this.workerDone
    this.worker = undefined
    this.workerDone = undefined
    await this.state.resetClient()
    this.matcher.reset()
    for (const detector of this.detectors.values()) detector.reset()
    logger.info('Stopped')
  }

  async restart(): Promise<void> {
    if (this.restarting) {
      logger.debug('Restart already in progress')
      return
    }
    this.restarting = true
    try {
      logger.info('Restarting')
      await this.stop()
      this.start()
    } finally {
      this.restarting = false
    }
  }

  /** Held-key tracking is stale once the hook was re-installed; key-ups may have been missed */
  resetHeldKeys(): void {
    this.matcher.reset()
  }

  /** Re-arm the keyboard hook without a full restart (input language or session changed) */
  rearmHotkeys(reason: string): boolean {
    return this.eventSource.reregister(reason)
  }

  onKeyEvent(event: KeyEvent): void {
    for (const name of this.matcher.handle(event)) {
      const detector = this.detectors.get(name)
      if (!detector || !detector.register(event.timestamp)) continue

      if (name === 'copy') {
        this.scheduleCapture(event.timestamp)
      } else {
        this.dumpState().catch((error: unknown) => logger.error('State dump failed:', error))
      }
    }
  }

  async onToggleLanguage(): Promise<boolean> {
    return this.applyLanguageChange(await this.state.toggleLanguage())
  }

  async onSetSourceLanguage(language: SourceLanguage): Promise<boolean> {
    return this.applyLanguageChange(await this.state.setSourceLanguage(language))
  }

  async onSetDestLanguage(language: LanguageCode): Promise<boolean> {
    return this.applyLanguageChange(await this.state.setDestLanguage(language))
  }

  /** Runs after the state-lock is released: display, persist, then maybe enqueue */
  private applyLanguageChange(change: LanguageChange): boolean {
    if (!change.changed) return false

    const { source, dest, lastOriginalText } = change.snapshot
    this.sink.showLanguages({ source, dest })
    try {
      this.preferences?.setDestLanguage(dest)
      this.preferences?.setSourceLanguage(source)
    } catch (error) {
      logger.warn('Failed to save language preferences:', error)
    }

    if (!lastOriginalText) return false
    const key = `${source}\u0000${dest}\u0000${lastOriginalText}`
    if (key === this.lastRetranslationKey) {
      logger.debug('Retranslation skipped: same text and language pair')
      return false
    }

    const queued = this.submit({
      sourceText: lastOriginalText,
      requestedAt: this.clock(),
      origin: 'retranslate',
    })
    if (queued) {
      this.lastRetranslationKey = key
    }
    return queued
  }

  private scheduleCapture(triggeredAt: number) {
    // Bound to the current session so a capture that outlives stop() lands in a closed channel
    const channel = this.channel
    if (!channel) return
    // Serialized so requests keep trigger order even though clipboard reads are async
    this.captureChain = this.captureChain
      .then(() => this.captureClipboard(channel, triggeredAt))
      .catch((error: unknown) => logger.error('Clipboard capture failed:', error))
  }

  private async captureClipboard(channel: AsyncChannel<TranslationRequest>, triggeredAt: number): Promise<void> {
    if (this.clipboardSettleMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.clipboardSettleMs))
    }
    const text = (await this.clipboard.readText()).trim()
    if (!text) {
      logger.debug('Trigger skipped: clipboard has no text')
      return
    }
    if (channel.some(request => request.sourceText === text)) {
      logger.debug('Trigger skipped: same text already queued')
      return
    }

    const { source } = await this.state.snapshot()
    this.submit({
      sourceText: text,
      requestedAt: triggeredAt,
      sourceLanguageHint: source === 'auto' ? undefined : source,
      origin: 'hotkey',
    }, channel)
  }

  private submit(request: TranslationRequest, channel = this.channel): boolean {
    if (!channel || !channel.offer(request)) {
      logger.debug('Request dropped: app is stopped')
      return false
    }
    logger.debug(`Queued ${request.origin} request (${channel.size} pending)`)
    return true
  }

  private async dumpState(): Promise<void> {
    const snapshot = await this.state.snapshot()
    const copyDetector = this.detectors.get('copy')
    const status = this.eventSource.status
    logger.info('Hotkey state dump', {
      bindings: this.matcher.describe(),
      active: status.active,
      registered: status.registered,
      reregistrations: status.reregistrations,
      pumpCrashes: status.crashes,
      queue: this.queueLength,
      inFlight: this.worker?.currentRequest !== undefined,
      processed: this.worker?.processedCount ?? 0,
      lastTrigger: copyDetector?.lastTriggerAt ?? null,
      restarting: this.restarting,
      client: this.state.hasClient(),
      languages: `${snapshot.source} -> ${snapshot.dest}`,
    })
  }
}
