// src/main/core/state/mutex.ts
import { AsyncLocalStorage } from 'async_hooks'
import { LockOrderError } from '../../utils/errors.js'

// Locks held by the current async call chain
const heldLocks = new AsyncLocalStorage<readonly Mutex[]>()

/**
 * Non-reentrant async lock with a rank.
 * Locks must be taken in increasing rank order; an out-of-order or re-entrant
 * acquisition throws LockOrderError instead of hanging.
 */
export class Mutex {
  private locked = false
  private waiters: Array<() => void> = []

  constructor(readonly name: string, readonly rank: number) { }

  get isLocked(): boolean {
    return this.locked
  }

  /** True when the calling async context is inside runExclusive of this lock */
  isHeldByCaller(): boolean {
    return (heldLocks.getStore() ?? []).includes(this)
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const held = heldLocks.getStore() ?? []
    this.checkOrder(held)

    await this.acquire()
    try {
      return await heldLocks.run([...held, this], fn)
    } finally {
      this.release()
    }
  }

  private checkOrder(held: readonly Mutex[]) {
    if (held.includes(this)) {
      throw new LockOrderError(`${this.name} is not re-entrant`)
    }
    const higher = held.find(lock => lock.rank >= this.rank)
    if (higher) {
      throw new LockOrderError(`Cannot acquire ${this.name} while holding ${higher.name}`)
    }
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve()
    }
    return new Promise(resolve => this.waiters.push(resolve))
  }

  private release() {
    const next = this.waiters.shift()
    if (next) {
      // Ownership passes straight to the next waiter
      next()
      return
    }
    this.locked = false
  }
}
