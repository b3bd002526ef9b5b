// src/main/core/instance/single-instance.test.ts
import { existsSync, mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { SingleInstanceGuard } from './single-instance.js'

describe('SingleInstanceGuard', () => {
  let dir: string

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    dir = mkdtempSync(join(tmpdir(), 'copy-translate-lock-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes its pid into the lock file and removes it on release', () => {
    const guard = new SingleInstanceGuard('app', dir)
    expect(guard.acquire()).toBe(true)
    expect(readFileSync(guard.lockPath, 'utf8')).toBe(String(process.pid))

    guard.release()
    expect(existsSync(guard.lockPath)).toBe(false)
  })

  it('refuses while another live process holds the lock', () => {
    const guard = new SingleInstanceGuard('app', dir)
    writeFileSync(guard.lockPath, String(process.ppid))
    expect(guard.acquire()).toBe(false)
    expect(readFileSync(guard.lockPath, 'utf8')).toBe(String(process.ppid))

    guard.release()
    expect(existsSync(guard.lockPath)).toBe(true)
  })

  it('replaces a lock left behind by a dead process', () => {
    const guard = new SingleInstanceGuard('app', dir)
    writeFileSync(guard.lockPath, '2147483647')
    expect(guard.acquire()).toBe(true)
    expect(readFileSync(guard.lockPath, 'utf8')).toBe(String(process.pid))
  })

  it('replaces an old unreadable lock file', () => {
    const guard = new SingleInstanceGuard('app', dir)
    writeFileSync(guard.lockPath, 'garbage')
    const past = new Date(Date.now() - 60_000)
    utimesSync(guard.lockPath, past, past)
    expect(guard.acquire()).toBe(true)
    expect(readFileSync(guard.lockPath, 'utf8')).toBe(String(process.pid))
  })

  it('treats a fresh empty lock file as held by an instance still starting', () => {
    const guard = new SingleInstanceGuard('app', dir)
    writeFileSync(guard.lockPath, '')
    expect(guard.acquire()).toBe(false)
    expect(existsSync(guard.lockPath)).toBe(true)
    expect(readFileSync(guard.lockPath, 'utf8')).toBe('')
  })
})
