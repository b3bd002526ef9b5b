#!/usr/bin/env node
// src/main/main.ts
import 'dotenv/config'
import { parseCliArgs, USAGE } from './cli.js'
import type { CliOptions } from './cli.js'
import { InputEventSource } from './core/hotkeys/input-event-source.js'
import type { KeyboardHookBackend } from './core/hotkeys/input-event-source.js'
import { SingleInstanceGuard } from './core/instance/single-instance.js'
import { buildHotkeySpecs } from './core/settings/preferences.js'
import { createSettingsManager } from './core/settings/settings-manager.js'
import { AppState } from './core/state/app-state.js'
import { ConsoleRenderSink } from './render/console-render-sink.js'
import { TranslatorApp } from './translator-app.js'
import type { ClipboardReader, TranslatorFactory } from './types/index.js'
import { loadConfig } from './utils/config.js'
import type { AppConfig } from './utils/config.js'
import { CopyTranslateError, SingleInstanceError, StartupDependencyMissing, errorMessage } from './utils/errors.js'
import { configureLogging, createLogger } from './utils/logger.js'

const logger = createLogger('Main')

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error)
})

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', reason)
})

interface NativeCollaborators {
  backend: KeyboardHookBackend
  clipboard: ClipboardReader
  translatorFactory: TranslatorFactory
}

/**
 * The hook, clipboard and HTTP packages load native binaries or platform tools.
 * Load them up front so a broken install fails before any actor starts.
 */
async function loadCollaborators(config: AppConfig): Promise<NativeCollaborators> {
  let backend: KeyboardHookBackend
  try {
    const { UiohookBackend } = await import('./core/hotkeys/uiohook-backend.js')
    backend = new UiohookBackend()
  } catch (error) {
    throw new StartupDependencyMissing('uiohook-napi', { cause: error })
  }

  let clipboard: ClipboardReader
  try {
    const { SystemClipboardReader } = await import('./core/clipboard/clipboard-reader.js')
    clipboard = new SystemClipboardReader()
  } catch (error) {
    throw new StartupDependencyMissing('clipboardy', { cause: error })
  }

  let translatorFactory: TranslatorFactory
  try {
    const { TextTranslator } = await import('./translation/text-translator.js')
    translatorFactory = () => new TextTranslator({ timeoutMs: config.translateTimeoutMs, host: config.translateHost })
  } catch (error) {
    throw new StartupDependencyMissing('@vitalets/google-translate-api', { cause: error })
  }

  return { backend, clipboard, translatorFactory }
}

async function main(): Promise<void> {
  const config = loadConfig()
  configureLogging({ level: config.logLevel, file: config.logFile })

  const settings = createSettingsManager({ cwd: config.configDir })
  let cli: CliOptions
  try {
    cli = parseCliArgs(process.argv.slice(2), {
      dest: settings.getDestLanguage(),
      source: settings.getSourceLanguage(),
    })
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n\n${USAGE}`)
    process.exitCode = 2
    return
  }
  if (cli.help) {
    process.stdout.write(USAGE)
    return
  }

  const guard = new SingleInstanceGuard('copy-translate')
  if (!guard.acquire()) {
    throw new SingleInstanceError('copy-translate is already running')
  }

  try {
    settings.setDestLanguage(cli.dest)
    settings.setSourceLanguage(cli.source)

    const hotkeys = buildHotkeySpecs(settings.getHotkeyPreferences())
    const { backend, clipboard, translatorFactory } = await loadCollaborators(config)

    const state = new AppState({ source: cli.source, dest: cli.dest, translatorFactory })
    const sink = new ConsoleRenderSink({ source: cli.source, dest: cli.dest })
    const eventSource = new InputEventSource({
      backend,
      onRearm: () => app.resetHeldKeys(),
    })
    const app = new TranslatorApp({
      state,
      eventSource,
      hotkeys,
      clipboard,
      sink,
      preferences: settings,
      clipboardSettleMs: config.clipboardSettleMs,
    })

    let shuttingDown = false
    const shutdown = async (reason: string) => {
      if (shuttingDown) return
      shuttingDown = true
      logger.info(`Shutting down (${reason})`)
      detachKeys()
      await app.stop()
      guard.release()
      process.exit(0)
    }
    const requestShutdown = (reason: string) => {
      shutdown(reason).catch((error: unknown) => {
        logger.error('Shutdown failed:', error)
        guard.release()
        process.exit(1)
      })
    }

    const detachKeys = sink.attachKeyControls(app, {
      onRestart: () => {
        app.restart().catch((error: unknown) => logger.error('Restart failed:', error))
      },
      onQuit: () => requestShutdown('quit requested'),
    })
    process.on('SIGINT', () => requestShutdown('SIGINT'))
    process.on('SIGTERM', () => requestShutdown('SIGTERM'))
    if (process.platform !== 'win32') {
      // External re-arm request, e.g. from a session or keyboard-layout change script
      process.on('SIGUSR2', () => app.rearmHotkeys('SIGUSR2 received'))
    }

    sink.showLanguages({ source: cli.source, dest: cli.dest })
    app.start()
    const copyBinding = hotkeys.find(h => h.name === 'copy')
    if (copyBinding) {
      logger.info(`Press ${copyBinding.display} x${copyBinding.requiredPressCount} on selected text to translate.`)
    }
  } catch (error) {
    guard.release()
    throw error
  }
}

main().catch((error: unknown) => {
  if (error instanceof CopyTranslateError) {
    logger.error(error.message)
    if (error.cause) logger.debug('Cause:', error.cause)
  } else {
    logger.error('Fatal error:', error)
  }
  process.exit(1)
})
