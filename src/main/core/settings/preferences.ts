// src/main/core/settings/preferences.ts
import type { HotkeySpec, LanguageCode, SourceLanguage } from '../../types/index.js'
import { validateLanguageCode, validateNumericInput, validateTextInput } from '../../../utils/validation.js'
import { errorMessage } from '../../utils/errors.js'
import { createLogger } from '../../utils/logger.js'
import { parseCombo } from '../hotkeys/combo.js'

const logger = createLogger('Settings')

export interface HotkeyBindingPreference {
  combo: string
  pressCount: number
}

export interface HotkeyPreferences {
  copy: HotkeyBindingPreference
  stateDump: HotkeyBindingPreference
  /** Seconds allowed between presses of one gesture */
  doublePressInterval: number
  /** Seconds a fired gesture suppresses the next one */
  minTriggerInterval: number
}

export const DEFAULT_HOTKEY_PREFERENCES: HotkeyPreferences = {
  copy: { combo: 'Ctrl+C', pressCount: 2 },
  stateDump: { combo: 'F8', pressCount: 1 },
  doublePressInterval: 0.25,
  minTriggerInterval: 0.15,
}

export const DEFAULT_DEST_LANGUAGE: LanguageCode = 'ja'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function resolveCombo(raw: unknown, fallback: string): string {
  const combo = validateTextInput(raw, { allowEmpty: false, maxLength: 64 })
  if (!combo.valid || !combo.sanitized) return fallback

  try {
    parseCombo(combo.sanitized)
    return combo.sanitized
  } catch (error) {
    logger.warn(`Ignoring hotkey "${combo.sanitized}" (${errorMessage(error)}), using ${fallback}`)
    return fallback
  }
}

function mergeBinding(raw: unknown, fallback: HotkeyBindingPreference): HotkeyBindingPreference {
  if (!isRecord(raw)) return { ...fallback }

  const pressCount = validateNumericInput(raw.pressCount, { min: 1, allowDecimal: false })
  return {
    combo: resolveCombo(raw.combo, fallback.combo),
    pressCount: pressCount.valid ? Number(pressCount.sanitized) : fallback.pressCount,
  }
}

/**
 * Merge a stored (possibly hand-edited) hotkeys object over the defaults, field by field.
 */
export function resolveHotkeyPreferences(raw: unknown): HotkeyPreferences {
  const source = isRecord(raw) ? raw : {}
  const interval = validateNumericInput(source.doublePressInterval, { min: 0, exclusiveMin: true })
  const minTrigger = validateNumericInput(source.minTriggerInterval, { min: 0 })

  return {
    copy: mergeBinding(source.copy, DEFAULT_HOTKEY_PREFERENCES.copy),
    stateDump: mergeBinding(source.stateDump, DEFAULT_HOTKEY_PREFERENCES.stateDump),
    doublePressInterval: interval.valid ? Number(interval.sanitized) : DEFAULT_HOTKEY_PREFERENCES.doublePressInterval,
    minTriggerInterval: minTrigger.valid ? Number(minTrigger.sanitized) : DEFAULT_HOTKEY_PREFERENCES.minTriggerInterval,
  }
}

/**
 * Build the two hotkey specs. The copy gesture ignores auto-repeat so holding
 * Ctrl+C does not count as many presses; the state dump allows it.
 */
export function buildHotkeySpecs(prefs: HotkeyPreferences): HotkeySpec[] {
  const copy = parseCombo(prefs.copy.combo)
  const dump = parseCombo(prefs.stateDump.combo)
  return [
    {
      name: 'copy',
      combo: copy.keys,
      display: copy.display,
      requiredPressCount: prefs.copy.pressCount,
      windowSeconds: prefs.doublePressInterval,
      minRetriggerSeconds: prefs.minTriggerInterval,
      allowRepeat: false,
    },
    {
      name: 'stateDump',
      combo: dump.keys,
      display: dump.display,
      requiredPressCount: prefs.stateDump.pressCount,
      windowSeconds: prefs.doublePressInterval,
      minRetriggerSeconds: 0,
      allowRepeat: true,
    },
  ]
}

export function resolveDestLanguage(raw: unknown, fallback: LanguageCode = DEFAULT_DEST_LANGUAGE): LanguageCode {
  const result = validateLanguageCode(raw)
  return result.valid && result.sanitized ? result.sanitized : fallback
}

export function resolveSourceLanguage(raw: unknown): SourceLanguage {
  const result = validateLanguageCode(raw, { allowAuto: true })
  return result.valid && result.sanitized ? result.sanitized : 'auto'
}
