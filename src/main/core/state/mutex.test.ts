// src/main/core/state/mutex.test.ts
import { describe, expect, it } from 'vitest'
import { LockOrderError } from '../../utils/errors.js'
import { Mutex } from './mutex.js'

function deferred() {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>(r => { resolve = r })
  return { promise, resolve }
}

describe('Mutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const lock = new Mutex('test', 1)
    const gate = deferred()
    const events: string[] = []

    const first = lock.runExclusive(async () => {
      events.push('first:start')
      await gate.promise
      events.push('first:end')
    })
    const second = lock.runExclusive(() => {
      events.push('second')
    })

    await new Promise(resolve => setTimeout(resolve, 0))
    expect(lock.isLocked).toBe(true)
    expect(events).toEqual(['first:start'])

    gate.resolve()
    await Promise.all([first, second])
    expect(events).toEqual(['first:start', 'first:end', 'second'])
    expect(lock.isLocked).toBe(false)
  })

  it('returns the value of the critical section and releases on error', async () => {
    const lock = new Mutex('test', 1)
    await expect(lock.runExclusive(() => 42)).resolves.toBe(42)
    await expect(lock.runExclusive(() => { throw new Error('boom') })).rejects.toThrow('boom')
    expect(lock.isLocked).toBe(false)
  })

  it('allows taking locks in increasing rank order', async () => {
    const outer = new Mutex('state-lock', 1)
    const inner = new Mutex('client-lock', 2)
    const result = await outer.runExclusive(() => inner.runExclusive(() => {
      expect(outer.isHeldByCaller()).toBe(true)
      expect(inner.isHeldByCaller()).toBe(true)
      return 'nested'
    }))
    expect(result).toBe('nested')
    expect(outer.isHeldByCaller()).toBe(false)
  })

  it('rejects taking a lower-ranked lock while holding a higher one', async () => {
    const outer = new Mutex('state-lock', 1)
    const inner = new Mutex('client-lock', 2)
    await expect(inner.runExclusive(() => outer.runExclusive(() => 'never')))
      .rejects.toThrow('Cannot acquire state-lock while holding client-lock')
    expect(inner.isLocked).toBe(false)
    expect(outer.isLocked).toBe(false)
  })

  it('rejects re-entrant acquisition instead of hanging', async () => {
    const lock = new Mutex('state-lock', 1)
    const attempt = lock.runExclusive(() => lock.runExclusive(() => 'never'))
    await expect(attempt).rejects.toBeInstanceOf(LockOrderError)
    await expect(lock.runExclusive(() => 'free')).resolves.toBe('free')
  })
})
