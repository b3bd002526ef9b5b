// src/main/core/instance/single-instance.ts
import { closeSync, openSync, readFileSync, statSync, unlinkSync, writeSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('Instance')

// A lock without a readable pid this young may belong to an instance that has not written it yet
const UNWRITTEN_LOCK_GRACE_MS = 2000

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM'
  }
}

/**
 * One live instance per user, via an exclusive lock file holding our PID.
 * A lock file left behind by a dead process, or an unreadable one older than
 * a short grace period, is replaced.
 */
export class SingleInstanceGuard {
  readonly lockPath: string
  private held = false

  constructor(name: string, directory = tmpdir()) {
    this.lockPath = join(directory, `${name}.lock`)
  }

  acquire(): boolean {
    if (this.held) return true

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const fd = openSync(this.lockPath, 'wx')
        writeSync(fd, String(process.pid))
        closeSync(fd)
        this.held = true
        logger.debug('Instance lock acquired:', this.lockPath)
        return true
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw error
        }
      }

      const owner = this.readOwner()
      if (owner === undefined) {
        const age = this.lockAgeMs()
        if (age !== undefined && age < UNWRITTEN_LOCK_GRACE_MS) {
          logger.info('Another instance is starting')
          return false
        }
      } else if (owner !== process.pid && isProcessAlive(owner)) {
        logger.info(`Another instance is running (pid ${owner})`)
        return false
      }
      logger.warn('Removing stale instance lock', this.lockPath)
      this.removeLockFile()
    }
    return false
  }

  release(): void {
    if (!this.held) return
    this.held = false
    this.removeLockFile()
  }

  private readOwner(): number | undefined {
    try {
      const pid = Number.parseInt(readFileSync(this.lockPath, 'utf8').trim(), 10)
      return Number.isInteger(pid) && pid > 0 ? pid : undefined
    } catch {
      return undefined
    }
  }

  private lockAgeMs(): number | undefined {
    try {
      return Date.now() - statSync(this.lockPath).mtimeMs
    } catch {
      return undefined
    }
  }

  private removeLockFile() {
    try {
      unlinkSync(this.lockPath)
    } catch (error) {
      logger.debug('Instance lock already gone:', error)
    }
  }
}
