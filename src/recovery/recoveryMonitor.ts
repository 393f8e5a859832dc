/**
 * Recovery Monitor
 *
 * 每个 tick 在目标容器内执行一次存活判定（默认 nvidia-smi）：
 * - 成功：记录 healthy，不做任何事
 * - 失败：重启整个服务组（粗粒度恢复，不做单服务恢复）
 *
 * 冷却窗口内的第二次失败只告警不重启。上一个 tick（判定或重启）未结束时到达的
 * tick 直接返回 busy；配置了跨进程重启锁时，锁被其他进程持有也返回 busy。
 * 判定命令超时按失败处理。重启命令本身失败时抛出，由外部调度决定下一轮是否再试。
 */

import { AppError } from '../shared/error.js'
import { ensureError } from '../shared/assertError.js'
import { formatDuration, formatTimestamp } from '../shared/formatTime.js'
import { createLogger, logError } from '../shared/logger.js'
import type { CommandResult, ContainerRuntime } from '../runtime/types.js'
import { MemoryRestartLedger, type RestartLedger } from './restartLedger.js'

const logger = createLogger('recovery')

export type RecoveryDecision = 'healthy' | 'restarted' | 'suppressed' | 'busy'

/** 跨进程的重启互斥（常驻 monitor 与系统 cron 的 tick 共存时使用） */
export interface RestartLock {
  /** 已被其他进程持有时返回 false */
  acquire(): boolean
  release(): void
}

export interface RecoveryMonitorOptions {
  runtime: ContainerRuntime
  /** 执行存活判定的容器名或 ID */
  container: string
  predicate: string[]
  /** 判定命令的超时，缺省使用运行时的默认命令超时 */
  predicateTimeoutMs?: number
  /** 两次重启的最短间隔，0 表示不限制 */
  cooldownMs: number
  ledger?: RestartLedger
  restartLock?: RestartLock
  now?: () => number
}

export class RecoveryMonitor {
  private readonly runtime: ContainerRuntime
  private readonly container: string
  private readonly predicate: string[]
  private readonly predicateTimeoutMs?: number
  private readonly cooldownMs: number
  private readonly ledger: RestartLedger
  private readonly restartLock?: RestartLock
  private readonly now: () => number
  private inFlight: Promise<RecoveryDecision> | null = null

  constructor(options: RecoveryMonitorOptions) {
    this.runtime = options.runtime
    this.container = options.container
    this.predicate = options.predicate
    this.predicateTimeoutMs = options.predicateTimeoutMs
    this.cooldownMs = options.cooldownMs
    this.ledger = options.ledger ?? new MemoryRestartLedger()
    this.restartLock = options.restartLock
    this.now = options.now ?? Date.now
  }

  /** 是否有 tick 正在进行（判定或重启） */
  get busy(): boolean {
    return this.inFlight !== null
  }

  async tick(): Promise<RecoveryDecision> {
    if (this.inFlight) {
      logger.warn(`${this.stamp()}: 上一次检查尚未完成，跳过本次检查`)
      return 'busy'
    }

    // 在第一个 await 之前占位，重叠的 tick 只会看到 busy
    const current = this.evaluate()
    this.inFlight = current
    try {
      return await current
    } finally {
      this.inFlight = null
    }
  }

  private async evaluate(): Promise<RecoveryDecision> {
    const check = await this.runtime.exec(this.container, this.predicate, { timeoutMs: this.predicateTimeoutMs })
    if (check.exitCode === 0) {
      logger.info(`${this.stamp()}: 加速器正常工作 (${this.container})`)
      return 'healthy'
    }

    logger.warn(`${this.stamp()}: ${check.command} 失败 (${describeFailure(check)})`)

    if (this.restartLock && !this.restartLock.acquire()) {
      logger.warn(`${this.stamp()}: 另一个进程正在重启服务组，跳过本次重启`)
      return 'busy'
    }

    try {
      const remainingMs = await this.cooldownRemaining()
      if (remainingMs > 0) {
        logger.warn(`${this.stamp()}: 加速器未启用，但仍在重启冷却期内（剩余 ${formatDuration(remainingMs)}），本次不重启`)
        return 'suppressed'
      }

      logger.warn(`${this.stamp()}: 加速器未启用，正在重启服务组...`)
      await this.restart()
      logger.info(`${this.stamp()}: 已重启服务组`)
      return 'restarted'
    } finally {
      this.restartLock?.release()
    }
  }

  private async restart(): Promise<void> {
    const command = this.runtime.describeRestart()
    try {
      await this.runtime.restartGroup()
    } catch (error) {
      logError(logger, '服务组重启失败', ensureError(error), { command, container: this.container })
      throw error instanceof AppError ? error : AppError.restartFailed(command, error)
    }
    await this.ledger.recordRestart(this.now())
  }

  private async cooldownRemaining(): Promise<number> {
    if (this.cooldownMs <= 0) return 0
    const last = await this.ledger.lastRestartAt()
    if (last === null) return 0
    return Math.max(0, last + this.cooldownMs - this.now())
  }

  private stamp(): string {
    return formatTimestamp(new Date(this.now()))
  }
}

function describeFailure(result: CommandResult): string {
  return result.timedOut ? '超时' : `exit=${result.exitCode}`
}
