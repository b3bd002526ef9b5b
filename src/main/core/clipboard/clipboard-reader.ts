// src/main/core/clipboard/clipboard-reader.ts
import clipboard from 'clipboardy'
import type { ClipboardReader } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('Clipboard')

export class SystemClipboardReader implements ClipboardReader {
  async readText(): Promise<string> {
    try {
      return await clipboard.read()
    } catch (error) {
      // Non-text content (images, files) makes the platform tool fail
      logger.debug('Failed to read clipboard text (may contain non-text data):', error)
      return ''
    }
  }
}
