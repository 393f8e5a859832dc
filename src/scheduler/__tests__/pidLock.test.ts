/**
 * pidLock 测试
 *
 * 测试 PID 锁的获取、释放和冲突检测
 * 使用隔离的临时数据目录
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import { getPidLock, acquirePidLock, releasePidLock, isLockHeld, isProcessRunning } from '../pidLock.js'
import { getPidFilePath } from '../../shared/paths.js'

// DATA_DIR is set to temp dir by vitest.config.ts env SENTINEL_DATA_DIR

/** 一个几乎不可能存在的 PID */
const DEAD_PID = 2147483646

function writeLockFile(name: 'monitor' | 'restart', content: string): void {
  const file = getPidFilePath(name)
  mkdirSync(dirname(file), { recursive: true })
  writeFileSync(file, content, 'utf-8')
}

describe('pidLock', () => {
  beforeEach(() => {
    releasePidLock('monitor')
    releasePidLock('restart')
  })

  afterEach(() => {
    releasePidLock('monitor')
    releasePidLock('restart')
  })

  describe('getPidLock', () => {
    it('should return null when no lock file exists', () => {
      expect(getPidLock('monitor')).toBeNull()
    })

    it('should return lock info after acquiring', () => {
      expect(acquirePidLock('monitor').success).toBe(true)

      const lock = getPidLock('monitor')
      expect(lock?.pid).toBe(process.pid)
      expect(lock?.cwd).toBe(process.cwd())
    })

    it('should ignore malformed lock files', () => {
      writeLockFile('monitor', '{"pid":"not-a-number"}')
      expect(getPidLock('monitor')).toBeNull()

      writeLockFile('monitor', 'garbage')
      expect(getPidLock('monitor')).toBeNull()
    })
  })

  describe('acquirePidLock', () => {
    it('should fail while a live process holds the lock', () => {
      expect(acquirePidLock('monitor').success).toBe(true)

      const second = acquirePidLock('monitor')
      expect(second.success).toBe(false)
      if (!second.success) {
        expect(second.existingLock.pid).toBe(process.pid)
      }
    })

    it('should keep locks independent', () => {
      expect(acquirePidLock('monitor').success).toBe(true)
      expect(acquirePidLock('restart').success).toBe(true)
    })

    it('should take over a stale lock', () => {
      writeLockFile(
        'restart',
        JSON.stringify({ pid: DEAD_PID, startedAt: '2024-01-01T00:00:00.000Z', cwd: '/', command: 'sentinel tick' })
      )

      expect(acquirePidLock('restart').success).toBe(true)
      expect(getPidLock('restart')?.pid).toBe(process.pid)
    })
  })

  describe('releasePidLock', () => {
    it('should remove the lock and tolerate a missing file', () => {
      acquirePidLock('monitor')
      releasePidLock('monitor')
      expect(getPidLock('monitor')).toBeNull()

      expect(() => releasePidLock('monitor')).not.toThrow()
    })
  })

  describe('isLockHeld', () => {
    it('should report the holder', () => {
      expect(isLockHeld('monitor')).toEqual({ running: false })

      acquirePidLock('monitor')
      const held = isLockHeld('monitor')
      expect(held.running).toBe(true)
      expect(held.lock?.pid).toBe(process.pid)
    })
  })

  describe('isProcessRunning', () => {
    it('should detect the current process', () => {
      expect(isProcessRunning(process.pid)).toBe(true)
      expect(isProcessRunning(DEAD_PID)).toBe(false)
    })
  })
})
