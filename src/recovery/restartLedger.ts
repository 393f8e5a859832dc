/**
 * 重启记录
 *
 * 只保存最近一次成功重启的时间，供冷却判断使用：
 * - MemoryRestartLedger: 常驻 monitor 进程内使用
 * - FileRestartLedger: 一次性 tick（由系统 cron 调用）跨进程共享
 */

import { dirname } from 'path'
import { existsSync } from 'fs'
import { mkdir, readFile, writeFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('restart-ledger')

export interface RestartLedger {
  /** 最近一次重启的毫秒时间戳，从未重启过时为 null */
  lastRestartAt(): Promise<number | null>
  recordRestart(at: number): Promise<void>
}

export class MemoryRestartLedger implements RestartLedger {
  private last: number | null = null

  async lastRestartAt(): Promise<number | null> {
    return this.last
  }

  async recordRestart(at: number): Promise<void> {
    this.last = at
  }
}

const recoveryStateSchema = z.object({
  lastRestartAt: z.string().datetime(),
})

export class FileRestartLedger implements RestartLedger {
  constructor(private readonly filePath: string) {}

  async lastRestartAt(): Promise<number | null> {
    if (!existsSync(this.filePath)) return null

    try {
      const raw: unknown = JSON.parse(await readFile(this.filePath, 'utf-8'))
      const parsed = recoveryStateSchema.safeParse(raw)
      if (!parsed.success) {
        logger.warn(`Ignoring malformed recovery state: ${this.filePath}`)
        return null
      }
      return Date.parse(parsed.data.lastRestartAt)
    } catch (error) {
      logger.warn(`Failed to read recovery state: ${getErrorMessage(error)}`)
      return null
    }
  }

  async recordRestart(at: number): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true })
    const state = { lastRestartAt: new Date(at).toISOString() }
    await writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf-8')
  }
}
