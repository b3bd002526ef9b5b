// src/main/core/hotkeys/input-event-source.ts
import type { Clock, KeyEvent } from '../../types/index.js'
import { HookPumpCrash, HookRegistrationError, errorMessage } from '../../utils/errors.js'
import { createLogger } from '../../utils/logger.js'
import { AsyncChannel } from '../pipeline/async-channel.js'

const logger = createLogger('Hotkeys')

export interface RawKeyEvent {
  type: 'down' | 'up'
  /** Normalized key name (see normalizeKeyToken) */
  key: string
}

/**
 * The OS hook. `register` throws HookRegistrationError when the OS refuses;
 * `isHealthy` turns false when the backend can tell its hook is down. A backend
 * that cannot see silent drops leaves those to the clock-jump check and rearm().
 */
export interface KeyboardHookBackend {
  readonly name: string
  register(listener: (event: RawKeyEvent) => void): void
  unregister(): void
  isHealthy(): boolean
}

export interface InputEventSourceOptions {
  backend: KeyboardHookBackend
  clock?: Clock
  /** Wall clock in ms, used by the watchdog to notice sleep/resume */
  wallClock?: () => number
  watchdogIntervalMs?: number
  clockJumpToleranceMs?: number
  retryInitialDelayMs?: number
  retryMaxDelayMs?: number
  /** Called after the hook was re-registered; held-key state may be stale by then */
  onRearm?: () => void
}

export interface InputEventSourceStatus {
  active: boolean
  registered: boolean
  reregistrations: number
  crashes: number
}

interface PumpSession {
  id: number
  channel: AsyncChannel<KeyEvent>
  callback: (event: KeyEvent) => void
  registered: boolean
  retryAttempt: number
  retryTimer?: NodeJS.Timeout
  done: Promise<void>
}

/**
 * Owns the keyboard hook and the pump that drains its events.
 *
 * Hook callbacks only enqueue; the pump loop calls the consumer callback one
 * event at a time. `stop()` settles only once the pump has exited, so a
 * stop/start pair never leaves zero or two pumps running.
 */
export class InputEventSource {
  private readonly backend: KeyboardHookBackend
  private readonly clock: Clock
  private readonly wallClock: () => number
  private readonly watchdogIntervalMs: number
  private readonly clockJumpToleranceMs: number
  private readonly retryInitialDelayMs: number
  private readonly retryMaxDelayMs: number
  private readonly onRearm?: () => void

  private session: PumpSession | undefined
  private stopping: Promise<void> | undefined
  private sessionCounter = 0
  private watchdog: NodeJS.Timeout | undefined
  private lastTick = 0
  private reregistrations = 0
  private crashes = 0

  constructor(options: InputEventSourceOptions) {
    this.backend = options.backend
    this.clock = options.clock ?? (() => performance.now() / 1000)
    this.wallClock = options.wallClock ?? (() => Date.now())
    this.watchdogIntervalMs = options.watchdogIntervalMs ?? 5000
    this.clockJumpToleranceMs = options.clockJumpToleranceMs ?? 10000
    this.retryInitialDelayMs = options.retryInitialDelayMs ?? 500
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? 30000
    this.onRearm = options.onRearm
  }

  /** Starts the pump and returns immediately; registration failures are retried in the background */
  start(callback: (event: KeyEvent) => void): void {
    if (this.stopping) {
      logger.info('Start requested while stopping; deferring until the pump has exited')
      void this.stopping.then(() => this.start(callback))
      return
    }
    if (this.session) {
      logger.debug('Start ignored: pump already running')
      return
    }
    this.beginSession(callback)
    this.startWatchdog()
  }

  /** Resolves once the pump loop has fully exited */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping
    const session = this.session
    if (!session) return Promise.resolve()

    this.session = undefined
    this.stopWatchdog()
    this.teardown(session)
    this.stopping = session.done.finally(() => {
      this.stopping = undefined
      logger.info(`Hotkey pump #${session.id} stopped`)
    })
    return this.stopping
  }

  isActive(): boolean {
    const session = this.session
    return session !== undefined && session.registered && !session.channel.isClosed
  }

  get status(): InputEventSourceStatus {
    return {
      active: this.isActive(),
      registered: this.session?.registered ?? false,
      reregistrations: this.reregistrations,
      crashes: this.crashes,
    }
  }

  /**
   * Drop and re-install the hook on the running pump, without a stop/start cycle.
   * Returns whether the hook is registered afterwards; on failure a retry is scheduled.
   */
  reregister(reason: string): boolean {
    const session = this.session
    if (!session) {
      logger.warn(`Re-registration ignored (${reason}): source is stopped`)
      return false
    }

    logger.info(`Re-registering keyboard hook: ${reason}`)
    this.reregistrations++
    if (session.retryTimer) {
      clearTimeout(session.retryTimer)
      session.retryTimer = undefined
    }
    this.unregisterBackend(session)
    this.tryRegister(session)
    if (session.registered) {
      this.onRearm?.()
    }
    return session.registered
  }

  private beginSession(callback: (event: KeyEvent) => void): PumpSession {
    const session: PumpSession = {
      id: ++this.sessionCounter,
      channel: new AsyncChannel<KeyEvent>('key-events'),
      callback,
      registered: false,
      retryAttempt: 0,
      done: Promise.resolve(),
    }
    this.session = session
    session.done = this.runPump(session)
    this.tryRegister(session)
    return session
  }

  private async runPump(session: PumpSession): Promise<void> {
    try {
      for (;;) {
        const next = await session.channel.dequeue()
        if (next.done) return
        session.callback(next.value)
      }
    } catch (error) {
      const crash = new HookPumpCrash(`Hotkey pump #${session.id} crashed: ${errorMessage(error)}`, { cause: error })
      logger.error(crash.message, error)
      this.recoverFromCrash(session)
    }
  }

  private recoverFromCrash(session: PumpSession) {
    // stop() already took this session away
    if (this.session !== session) return
    this.crashes++
    this.teardown(session)
    logger.warn('Restarting hotkey adapter after pump crash')
    this.beginSession(session.callback)
  }

  private tryRegister(session: PumpSession) {
    session.retryTimer = undefined
    if (this.session !== session) return

    try {
      this.backend.register(event => this.deliver(session, event))
      session.registered = true
      session.retryAttempt = 0
      logger.info(`Keyboard hook registered (${this.backend.name}, pump #${session.id})`)
    } catch (error) {
      const failure = error instanceof HookRegistrationError
        ? error
        : new HookRegistrationError(`Keyboard hook registration failed: ${errorMessage(error)}`, { cause: error })
      const delay = Math.min(this.retryInitialDelayMs * 2 ** session.retryAttempt, this.retryMaxDelayMs)
      session.retryAttempt++
      logger.error(`${failure.message}; retry #${session.retryAttempt} in ${delay} ms`)
      session.retryTimer = setTimeout(() => this.tryRegister(session), delay)
    }
  }

  private deliver(session: PumpSession, event: RawKeyEvent) {
    // Events racing a teardown land on a closed channel and are dropped
    session.channel.offer({ type: event.type, key: event.key, timestamp: this.clock() })
  }

  private teardown(session: PumpSession) {
    if (session.retryTimer) {
      clearTimeout(session.retryTimer)
      session.retryTimer = undefined
    }
    session.channel.close()
    this.unregisterBackend(session)
  }

  private unregisterBackend(session: PumpSession) {
    if (!session.registered) return
    session.registered = false
    try {
      this.backend.unregister()
    } catch (error) {
      logger.warn('Keyboard hook unregister failed:', errorMessage(error))
    }
  }

  private startWatchdog() {
    if (this.watchdog) return
    this.lastTick = this.wallClock()
    this.watchdog = setInterval(() => this.watchdogTick(), this.watchdogIntervalMs)
    this.watchdog.unref()
  }

  private stopWatchdog() {
    if (this.watchdog) {
      clearInterval(this.watchdog)
      this.watchdog = undefined
    }
  }

  private watchdogTick() {
    const now = this.wallClock()
    const gap = now - this.lastTick
    this.lastTick = now

    const session = this.session
    if (!session || !session.registered) return

    if (gap > this.watchdogIntervalMs + this.clockJumpToleranceMs) {
      this.reregister(`clock jumped ${Math.round(gap / 1000)}s, system likely resumed from sleep`)
    } else if (!this.backend.isHealthy()) {
      this.reregister('hook reported unhealthy')
    }
  }
}
