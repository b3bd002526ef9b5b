// src/main/core/hotkeys/hotkey-matcher.ts
import type { HotkeyName, HotkeySpec, KeyEvent } from '../../types/index.js'

/**
 * Turns raw key-down/key-up events into binding presses.
 * A binding is pressed when its last key goes down while every other key is held.
 */
export class HotkeyMatcher {
  private readonly pressed = new Set<string>()

  constructor(private readonly bindings: readonly HotkeySpec[]) { }

  handle(event: KeyEvent): HotkeyName[] {
    if (event.type === 'up') {
      this.pressed.delete(event.key)
      return []
    }

    const isRepeat = this.pressed.has(event.key)
    this.pressed.add(event.key)

    const matched: HotkeyName[] = []
    for (const binding of this.bindings) {
      if (binding.combo[binding.combo.length - 1] !== event.key) continue
      if (isRepeat && !binding.allowRepeat) continue
      if (binding.combo.every(key => this.pressed.has(key))) {
        matched.push(binding.name)
      }
    }
    return matched
  }

  /** Forget held keys, e.g. after the hook was re-registered and key-ups may have been lost */
  reset() {
    this.pressed.clear()
  }

  describe(): string[] {
    return this.bindings.map(b => `${b.name}: ${b.display} x${b.requiredPressCount}`)
  }
}
