// src/main/core/settings/settings-manager.ts
import Conf from 'conf'
import type { LanguageCode, SourceLanguage } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import {
  DEFAULT_DEST_LANGUAGE,
  DEFAULT_HOTKEY_PREFERENCES,
  resolveDestLanguage,
  resolveHotkeyPreferences,
  resolveSourceLanguage,
} from './preferences.js'
import type { HotkeyPreferences } from './preferences.js'

const logger = createLogger('Settings')

type Schema = {
  destLanguage: string
  sourceLanguage: string
  hotkeys: Record<string, unknown>
}

export interface SettingsManagerOptions {
  /** Directory holding the preference file; defaults to the per-user config directory */
  cwd?: string
  configName?: string
}

/**
 * Preference file access. Synchronous and quick; callers keep it outside the core locks.
 */
export function createSettingsManager(options: SettingsManagerOptions = {}) {
  const store = new Conf<Schema>({
    projectName: 'copy-translate',
    cwd: options.cwd,
    configName: options.configName,
    defaults: {
      destLanguage: DEFAULT_DEST_LANGUAGE,
      sourceLanguage: 'auto',
      hotkeys: { ...DEFAULT_HOTKEY_PREFERENCES },
    },
  })
  logger.debug('Preferences loaded from', store.path)

  return {
    get path(): string {
      return store.path
    },

    getDestLanguage(): LanguageCode {
      return resolveDestLanguage(store.get('destLanguage'))
    },

    setDestLanguage(language: LanguageCode) {
      store.set('destLanguage', language)
      logger.debug(`destLanguage -> ${language}`)
    },

    getSourceLanguage(): SourceLanguage {
      return resolveSourceLanguage(store.get('sourceLanguage'))
    },

    setSourceLanguage(language: SourceLanguage) {
      store.set('sourceLanguage', language)
      logger.debug(`sourceLanguage -> ${language}`)
    },

    getHotkeyPreferences(): HotkeyPreferences {
      return resolveHotkeyPreferences(store.get('hotkeys'))
    },
  }
}

export type SettingsManager = ReturnType<typeof createSettingsManager>

/** What the app needs from preferences at run time */
export type LanguagePreferenceWriter = Pick<SettingsManager, 'setDestLanguage' | 'setSourceLanguage'>
