// src/main/cli.ts
import { parseArgs } from 'util'
import type { LanguageCode, SourceLanguage } from './types/index.js'
import { validateLanguageCode } from '../utils/validation.js'

export interface CliOptions {
  dest: LanguageCode
  source: SourceLanguage
  help: boolean
}

export const USAGE = `Usage: copy-translate [--dest <lang>] [--src <lang>]

Translate selected text after a double Ctrl+C.

  --dest <lang>  Destination language (default: last saved, or ja)
  --src <lang>   Source language (default: auto-detect)
  -h, --help     Show this help
`

/**
 * Parse argv (without node and script). Throws on unknown flags or bad language codes.
 */
export function parseCliArgs(argv: string[], defaults: { dest: LanguageCode; source: SourceLanguage }): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      dest: { type: 'string' },
      src: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  })

  let dest = defaults.dest
  if (values.dest !== undefined) {
    const result = validateLanguageCode(values.dest)
    if (!result.valid || !result.sanitized) throw new Error(`--dest: ${result.error}`)
    dest = result.sanitized
  }

  let source = defaults.source
  if (values.src !== undefined) {
    const result = validateLanguageCode(values.src, { allowAuto: true })
    if (!result.valid || !result.sanitized) throw new Error(`--src: ${result.error}`)
    source = result.sanitized
  }

  return { dest, source, help: values.help === true }
}
