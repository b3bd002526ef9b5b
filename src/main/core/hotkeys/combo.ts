// src/main/core/hotkeys/combo.ts

export const MODIFIER_KEYS = ['ctrl', 'alt', 'shift', 'meta'] as const
export type ModifierKey = typeof MODIFIER_KEYS[number]

const MODIFIER_ALIASES: Record<string, ModifierKey> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  shift: 'shift',
  meta: 'meta',
  win: 'meta',
  windows: 'meta',
  cmd: 'meta',
  command: 'meta',
}

const NAMED_KEY_ALIASES: Record<string, string> = {
  esc: 'escape',
  escape: 'escape',
  tab: 'tab',
  space: 'space',
  enter: 'enter',
  return: 'enter',
  backspace: 'backspace',
  delete: 'delete',
  del: 'delete',
  insert: 'insert',
  home: 'home',
  end: 'end',
  pageup: 'pageup',
  pagedown: 'pagedown',
  left: 'left',
  right: 'right',
  up: 'up',
  down: 'down',
  arrowleft: 'left',
  arrowright: 'right',
  arrowup: 'up',
  arrowdown: 'down',
}

const DISPLAY_NAMES: Record<ModifierKey, string> = {
  ctrl: 'Ctrl',
  alt: 'Alt',
  shift: 'Shift',
  meta: 'Win',
}

export interface ParsedCombo {
  keys: string[]
  display: string
}

const MODIFIER_NAMES: ReadonlySet<string> = new Set(MODIFIER_KEYS)

export function isModifierKey(key: string): key is ModifierKey {
  return MODIFIER_NAMES.has(key)
}

/**
 * Normalize a key token (from a combo string or a hook backend) to the
 * lowercase name used for matching. Returns undefined for unknown tokens.
 */
export function normalizeKeyToken(token: string): string | undefined {
  const lower = token.trim().toLowerCase()
  if (!lower) return undefined
  if (Object.hasOwn(MODIFIER_ALIASES, lower)) return MODIFIER_ALIASES[lower]
  if (Object.hasOwn(NAMED_KEY_ALIASES, lower)) return NAMED_KEY_ALIASES[lower]
  if (/^[a-z0-9]$/.test(lower)) return lower
  const fn = /^f(\d{1,2})$/.exec(lower)
  if (fn && Number(fn[1]) >= 1 && Number(fn[1]) <= 24) return lower
  return undefined
}

/**
 * Parse "Ctrl+C", "ctrl-shift-f8", "F8" into normalized keys, modifiers first.
 */
export function parseCombo(combo: string): ParsedCombo {
  const tokens = combo.replace(/-/g, '+').split('+').map(t => t.trim()).filter(Boolean)
  if (tokens.length === 0) {
    throw new Error(`Invalid hotkey definition: "${combo}"`)
  }

  const modifiers: ModifierKey[] = []
  let trigger: string | undefined
  for (const token of tokens) {
    const key = normalizeKeyToken(token)
    if (!key) {
      throw new Error(`Unknown key token: "${token}"`)
    }
    if (isModifierKey(key)) {
      if (!modifiers.includes(key)) modifiers.push(key)
    } else if (trigger && trigger !== key) {
      throw new Error(`Hotkey combination has more than one non-modifier key: "${combo}"`)
    } else {
      trigger = key
    }
  }

  if (!trigger) {
    throw new Error(`Hotkey combination is missing a non-modifier key: "${combo}"`)
  }

  const display = [...modifiers.map(m => DISPLAY_NAMES[m]), trigger.toUpperCase()].join('+')
  return { keys: [...modifiers, trigger], display }
}
