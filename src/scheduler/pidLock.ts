/**
 * PID 文件锁
 *
 * - monitor: 同一时间只允许一个常驻监控进程
 * - restart: 一次性 tick 重启期间持有，避免外部调度重叠触发第二次重启
 */

import { dirname } from 'path'
import { existsSync, mkdirSync, readFileSync, writeFileSync, unlinkSync } from 'fs'
import { z } from 'zod'
import { getPidFilePath } from '../shared/paths.js'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('pid-lock')

export type LockName = 'monitor' | 'restart'

const pidLockInfoSchema = z.object({
  pid: z.number().int(),
  startedAt: z.string(),
  cwd: z.string(),
  command: z.string(),
})

export type PidLockInfo = z.infer<typeof pidLockInfoSchema>

/**
 * 检查进程是否在运行
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // 信号 0 只检查进程是否存在
    process.kill(pid, 0)
    return true
  } catch {
    return false
  }
}

/**
 * 获取 PID 锁信息，文件不存在或内容损坏时返回 null
 */
export function getPidLock(name: LockName): PidLockInfo | null {
  const pidFile = getPidFilePath(name)
  if (!existsSync(pidFile)) {
    return null
  }

  try {
    const parsed = pidLockInfoSchema.safeParse(JSON.parse(readFileSync(pidFile, 'utf-8')))
    if (parsed.success) return parsed.data
    logger.warn(`Ignoring malformed PID file: ${pidFile}`)
    return null
  } catch (error) {
    logger.warn(`Failed to read PID file: ${getErrorMessage(error)}`)
    return null
  }
}

/**
 * 尝试获取锁
 * 已有存活进程持有时失败；持有者已退出的陈旧锁会被清理
 */
export function acquirePidLock(
  name: LockName
): { success: true } | { success: false; existingLock: PidLockInfo } {
  const existingLock = getPidLock(name)

  if (existingLock) {
    if (isProcessRunning(existingLock.pid)) {
      logger.warn(`${name} lock is held by PID ${existingLock.pid}`)
      return { success: false, existingLock }
    }
    logger.info(`Cleaning up stale ${name} lock (PID: ${existingLock.pid} is not running)`)
    releasePidLock(name)
  }

  const lockInfo: PidLockInfo = {
    pid: process.pid,
    startedAt: new Date().toISOString(),
    cwd: process.cwd(),
    command: process.argv.join(' '),
  }

  const pidFile = getPidFilePath(name)
  mkdirSync(dirname(pidFile), { recursive: true })
  writeFileSync(pidFile, JSON.stringify(lockInfo, null, 2), 'utf-8')
  logger.debug(`PID lock acquired: ${pidFile}`)
  return { success: true }
}

/**
 * 释放锁
 */
export function releasePidLock(name: LockName): void {
  const pidFile = getPidFilePath(name)
  if (!existsSync(pidFile)) return
  try {
    unlinkSync(pidFile)
    logger.debug(`${name} lock released`)
  } catch (error) {
    logger.warn(`Failed to delete PID file: ${getErrorMessage(error)}`)
  }
}

/**
 * 检查指定锁是否由存活进程持有
 */
export function isLockHeld(name: LockName): { running: boolean; lock?: PidLockInfo } {
  const lock = getPidLock(name)
  if (!lock) {
    return { running: false }
  }
  return { running: isProcessRunning(lock.pid), lock }
}
