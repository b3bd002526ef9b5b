// src/main/utils/logger.ts
import { appendFileSync } from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

let threshold: LogLevel = 'info'
let logFile: string | undefined

export function configureLogging(options: { level?: LogLevel; file?: string }) {
  threshold = options.level ?? threshold
  logFile = options.file
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message
  if (typeof arg === 'string') return arg
  try {
    return JSON.stringify(arg)
  } catch {
    return String(arg)
  }
}

function writeToFile(level: LogLevel, scope: string, args: unknown[]) {
  if (!logFile) return
  const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${scope}] ${args.map(formatArg).join(' ')}\n`
  try {
    appendFileSync(logFile, line, 'utf8')
  } catch (error) {
    // Console still has the line; drop the file sink rather than fail every call
    console.error('[Logger]', `Cannot write to ${logFile}, file logging disabled:`, error)
    logFile = undefined
  }
}

export function createLogger(scope = 'App') {
  const emit = (level: LogLevel, write: (...args: unknown[]) => void, args: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return
    write(`[${scope}]`, ...args)
    writeToFile(level, scope, args)
  }

  return {
    info: (...args: unknown[]) => emit('info', console.info, args),
    warn: (...args: unknown[]) => emit('warn', console.warn, args),
    error: (...args: unknown[]) => emit('error', console.error, args),
    debug: (...args: unknown[]) => emit('debug', console.debug, args),
  }
}
