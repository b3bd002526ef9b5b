// src/main/utils/logger.test.ts
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { configureLogging, createLogger, isLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    configureLogging({ level: 'info' })
  })

  it('filters messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const logger = createLogger('Test')

    logger.debug('hidden')
    expect(debug).not.toHaveBeenCalled()

    configureLogging({ level: 'debug' })
    logger.debug('shown', 42)
    expect(debug).toHaveBeenCalledWith('[Test]', 'shown', 42)
  })

  it('appends lines to the log file', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const dir = mkdtempSync(join(tmpdir(), 'copy-translate-log-'))
    const file = join(dir, 'app.log')
    try {
      configureLogging({ level: 'info', file })
      createLogger('Test').warn('disk', { free: 0 })
      expect(readFileSync(file, 'utf8')).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z \[WARN\] \[Test\] disk \{"free":0\}\n$/)
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true)
    expect(isLogLevel('toString')).toBe(false)
  })
})
