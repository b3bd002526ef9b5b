// src/main/utils/network.ts
import { TranslationTimeoutError } from './errors.js'

/**
 * Settles with the task's outcome, or rejects with TranslationTimeoutError after `timeoutMs`.
 * The task itself is not cancelled; its late result is ignored.
 */
export function withTimeout<T>(task: Promise<T>, timeoutMs: number, label = 'Request'): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TranslationTimeoutError(`${label} timed out after ${timeoutMs} ms`))
    }, timeoutMs)

    task.then(
      value => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      }
    )
  })
}

/**
 * Simple rate limiter to prevent API abuse.
 * Only start times are spaced; a call that never settles does not hold up the ones behind it.
 */
export class RateLimiter {
  private queue: Array<() => void> = []
  private processing = false
  private lastRequest = 0
  private minInterval: number

  constructor(requestsPerSecond: number = 10) {
    this.minInterval = 1000 / requestsPerSecond
  }

  execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.queue.push(() => {
        this.lastRequest = Date.now()
        Promise.resolve().then(fn).then(resolve, reject)
      })

      // Starting a task cannot throw, so the drain loop cannot fail
      void this.processQueue()
    })
  }

  private async processQueue() {
    if (this.processing) {
      return
    }

    this.processing = true

    while (this.queue.length > 0) {
      const wait = Math.max(0, this.minInterval - (Date.now() - this.lastRequest))
      if (wait > 0) {
        await new Promise(r => setTimeout(r, wait))
      }

      const start = this.queue.shift()
      if (start) {
        start()
      }
    }

    this.processing = false
  }
}

/**
 * Simple in-memory cache with TTL
 */
export class SimpleCache<T> {
  private cache = new Map<string, { value: T; timestamp: number }>()
  private maxAge: number

  constructor(maxAgeMs: number = 3600000) { // Default 1 hour
    this.maxAge = maxAgeMs
  }

  get(key: string): T | null {
    const cached = this.cache.get(key)
    if (!cached) return null

    if (Date.now() - cached.timestamp > this.maxAge) {
      this.cache.delete(key)
      return null
    }

    return cached.value
  }

  set(key: string, value: T): void {
    const now = Date.now()
    for (const [storedKey, entry] of this.cache) {
      if (now - entry.timestamp > this.maxAge) {
        this.cache.delete(storedKey)
      }
    }
    this.cache.set(key, { value, timestamp: now })
  }
}
