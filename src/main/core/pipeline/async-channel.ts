// src/main/core/pipeline/async-channel.ts
import { ChannelClosedError } from '../../utils/errors.js'

export type DequeueResult<T> = { done: false; value: T } | { done: true }

/**
 * Unbounded FIFO between producers and a single consumer.
 * `enqueue` never waits; `dequeue` waits until an item arrives or the channel closes.
 */
export class AsyncChannel<T> {
  private items: T[] = []
  private waiters: Array<(result: DequeueResult<T>) => void> = []
  private closed = false

  constructor(readonly name = 'channel') { }

  get size(): number {
    return this.items.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  enqueue(item: T): void {
    if (this.closed) {
      throw new ChannelClosedError(`Cannot enqueue on closed ${this.name}`)
    }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ done: false, value: item })
      return
    }
    this.items.push(item)
  }

  /** Like enqueue, but reports a closed channel instead of throwing */
  offer(item: T): boolean {
    if (this.closed) return false
    this.enqueue(item)
    return true
  }

  dequeue(): Promise<DequeueResult<T>> {
    if (this.closed) {
      return Promise.resolve<DequeueResult<T>>({ done: true })
    }
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1)
      return Promise.resolve<DequeueResult<T>>({ done: false, value: item })
    }
    return new Promise(resolve => this.waiters.push(resolve))
  }

  some(predicate: (item: T) => boolean): boolean {
    return this.items.some(predicate)
  }

  /**
   * Rejects further enqueues and wakes every waiting consumer with the shutdown marker.
   * Returns the number of discarded items.
   */
  close(): number {
    if (this.closed) return 0
    this.closed = true
    const discarded = this.items.length
    this.items = []
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true })
    }
    return discarded
  }
}
