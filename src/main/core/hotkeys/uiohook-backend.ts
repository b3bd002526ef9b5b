// src/main/core/hotkeys/uiohook-backend.ts
import { uIOhook, UiohookKey } from 'uiohook-napi'
import type { UiohookKeyboardEvent } from 'uiohook-napi'
import { HookRegistrationError, errorMessage } from '../../utils/errors.js'
import { createLogger } from '../../utils/logger.js'
import { isModifierKey, normalizeKeyToken } from './combo.js'
import type { KeyboardHookBackend, RawKeyEvent } from './input-event-source.js'

const logger = createLogger('Hotkeys')

// keycode -> normalized key name ("CtrlRight" -> "ctrl", "ArrowLeft" -> "left")
const KEY_NAMES = new Map<number, string>()
for (const [name, code] of Object.entries(UiohookKey)) {
  const base = name.endsWith('Right') && isModifierKey(name.slice(0, -5).toLowerCase())
    ? name.slice(0, -5)
    : name
  if (!KEY_NAMES.has(code)) {
    KEY_NAMES.set(code, normalizeKeyToken(base) ?? base.toLowerCase())
  }
}

export function keyNameForCode(keycode: number): string {
  return KEY_NAMES.get(keycode) ?? `code-${keycode}`
}

/**
 * Global keyboard hook through libuiohook. The hook runs on its own native
 * thread and posts events back to the event loop.
 *
 * libuiohook gives no signal when the OS silently stops feeding the hook
 * (session switch, some sleep/resume paths), so `isHealthy` only reports
 * whether the hook is started. Those drops are recovered by the watchdog's
 * clock-jump check or an explicit rearm.
 */
export class UiohookBackend implements KeyboardHookBackend {
  readonly name = 'uiohook'
  private onDown: ((e: UiohookKeyboardEvent) => void) | undefined
  private onUp: ((e: UiohookKeyboardEvent) => void) | undefined
  private running = false

  register(listener: (event: RawKeyEvent) => void): void {
    if (this.running) {
      this.unregister()
    }

    const onDown = (e: UiohookKeyboardEvent) => listener({ type: 'down', key: keyNameForCode(e.keycode) })
    const onUp = (e: UiohookKeyboardEvent) => listener({ type: 'up', key: keyNameForCode(e.keycode) })
    uIOhook.on('keydown', onDown)
    uIOhook.on('keyup', onUp)
    this.onDown = onDown
    this.onUp = onUp

    try {
      uIOhook.start()
    } catch (error) {
      this.detachListeners()
      throw new HookRegistrationError(`uiohook failed to start: ${errorMessage(error)}`, { cause: error })
    }
    this.running = true
  }

  unregister(): void {
    this.detachListeners()
    if (!this.running) return
    this.running = false
    try {
      uIOhook.stop()
    } catch (error) {
      logger.warn('uiohook stop failed:', errorMessage(error))
    }
  }

  isHealthy(): boolean {
    return this.running
  }

  private detachListeners() {
    if (this.onDown) uIOhook.removeListener('keydown', this.onDown)
    if (this.onUp) uIOhook.removeListener('keyup', this.onUp)
    this.onDown = undefined
    this.onUp = undefined
  }
}
