// src/main/utils/errors.ts

export type ErrorKind =
  | 'hook-registration'
  | 'hook-pump-crash'
  | 'network'
  | 'timeout'
  | 'service'
  | 'startup-dependency'
  | 'channel-closed'
  | 'lock-order'
  | 'single-instance'

/** Translation failures that reach the render sink. */
export type TranslationErrorKind = Extract<ErrorKind, 'network' | 'timeout' | 'service'>

export abstract class CopyTranslateError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class HookRegistrationError extends CopyTranslateError {
  readonly kind = 'hook-registration'
}

export class HookPumpCrash extends CopyTranslateError {
  readonly kind = 'hook-pump-crash'
}

export abstract class TranslationError extends CopyTranslateError {
  abstract override readonly kind: TranslationErrorKind
}

export class TranslationNetworkError extends TranslationError {
  readonly kind = 'network'
}

export class TranslationTimeoutError extends TranslationError {
  readonly kind = 'timeout'
}

export class TranslationServiceError extends TranslationError {
  readonly kind = 'service'
}

export class StartupDependencyMissing extends CopyTranslateError {
  readonly kind = 'startup-dependency'

  constructor(readonly dependency: string, options?: { cause?: unknown }) {
    super(`Required dependency "${dependency}" could not be loaded. Reinstall the application dependencies (npm install).`, options)
  }
}

export class ChannelClosedError extends CopyTranslateError {
  readonly kind = 'channel-closed'
}

export class LockOrderError extends CopyTranslateError {
  readonly kind = 'lock-order'
}

export class SingleInstanceError extends CopyTranslateError {
  readonly kind = 'single-instance'
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
