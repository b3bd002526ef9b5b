// src/main/core/hotkeys/press-pattern-detector.ts
import type { HotkeySpec } from '../../types/index.js'

export type DetectorPhase = 'IDLE' | 'ARMED'

/**
 * Fires when `requiredPressCount` presses land inside a rolling `windowSeconds` span.
 * Pure with respect to the timestamps it is given; only the pump callback calls it.
 */
export class PressPatternDetector {
  private pressTimestamps: number[] = []
  private lastFiredAt = Number.NEGATIVE_INFINITY

  constructor(
    private readonly spec: Pick<HotkeySpec, 'requiredPressCount' | 'windowSeconds' | 'minRetriggerSeconds'>
  ) {
    if (!Number.isInteger(spec.requiredPressCount) || spec.requiredPressCount < 1) {
      throw new RangeError(`requiredPressCount must be an integer >= 1, got ${spec.requiredPressCount}`)
    }
    if (!(spec.windowSeconds > 0)) {
      throw new RangeError(`windowSeconds must be > 0, got ${spec.windowSeconds}`)
    }
    if (!(spec.minRetriggerSeconds >= 0)) {
      throw new RangeError(`minRetriggerSeconds must be >= 0, got ${spec.minRetriggerSeconds}`)
    }
  }

  get phase(): DetectorPhase {
    return this.pressTimestamps.length > 0 ? 'ARMED' : 'IDLE'
  }

  /** Timestamp of the last trigger, or undefined if it never fired */
  get lastTriggerAt(): number | undefined {
    return Number.isFinite(this.lastFiredAt) ? this.lastFiredAt : undefined
  }

  /** Register a press; returns true when it completes the pattern */
  register(timestamp: number): boolean {
    const { requiredPressCount, windowSeconds, minRetriggerSeconds } = this.spec

    // Boundary inclusive: a press exactly windowSeconds ago still counts
    this.pressTimestamps = this.pressTimestamps.filter(ts => timestamp - ts <= windowSeconds)
    // Never grows past requiredPressCount: reaching it clears the list below
    this.pressTimestamps.push(timestamp)

    if (this.pressTimestamps.length < requiredPressCount) {
      return false
    }

    this.pressTimestamps = []
    if (timestamp - this.lastFiredAt < minRetriggerSeconds) {
      return false
    }
    this.lastFiredAt = timestamp
    return true
  }

  reset() {
    this.pressTimestamps = []
  }
}
