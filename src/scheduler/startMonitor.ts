/**
 * 常驻监控进程
 *
 * 前台阻塞运行，按 recovery.interval 调度 tick，Ctrl+C / SIGTERM 优雅退出。
 * 单个 tick 的异常（包括重启失败）只记录，不中断调度，由下一轮重新判定。
 * 上一轮 tick 未结束时到达的调度直接跳过；重启期间持有 restart 锁，与系统 cron 的 tick 互斥。
 */

import cron from 'node-cron'
import chalk from 'chalk'
import type { Config } from '../config/schema.js'
import type { ContainerRuntime } from '../runtime/types.js'
import { FileRestartLedger } from '../recovery/restartLedger.js'
import { RecoveryMonitor, type RestartLock } from '../recovery/recoveryMonitor.js'
import { ensureError } from '../shared/assertError.js'
import { intervalToCron, parseInterval } from '../shared/formatTime.js'
import { createLogger, logError } from '../shared/logger.js'
import { getRecoveryStatePath } from '../shared/paths.js'
import { acquirePidLock, releasePidLock } from './pidLock.js'

const logger = createLogger('monitor')

export interface MonitorHandle {
  monitor: RecoveryMonitor
  stop(): void
}

// tick 命令自己已持有 restart 锁，只有常驻进程需要在重启时再取一次
const pidRestartLock: RestartLock = {
  acquire: () => acquirePidLock('restart').success,
  release: () => releasePidLock('restart'),
}

export function createMonitor(
  config: Config,
  runtime: ContainerRuntime,
  options: { restartLock?: RestartLock } = {}
): RecoveryMonitor {
  return new RecoveryMonitor({
    runtime,
    container: config.recovery.container,
    predicate: config.recovery.predicate,
    predicateTimeoutMs: parseInterval(config.recovery.predicateTimeout),
    cooldownMs: parseInterval(config.recovery.cooldown),
    ledger: new FileRestartLedger(getRecoveryStatePath()),
    restartLock: options.restartLock,
  })
}

async function safeTick(monitor: RecoveryMonitor): Promise<void> {
  try {
    await monitor.tick()
  } catch (error) {
    logError(logger, 'Recovery tick failed', ensureError(error))
  }
}

/**
 * 启动调度，返回句柄；未能获取 PID 锁时返回 null
 */
export async function startMonitor(config: Config, runtime: ContainerRuntime): Promise<MonitorHandle | null> {
  const lockResult = acquirePidLock('monitor')
  if (!lockResult.success) {
    const lock = lockResult.existingLock
    console.error(chalk.red('✗ 监控进程已在运行'))
    console.error(chalk.yellow(`  PID: ${lock.pid}`))
    console.error(chalk.yellow(`  启动时间: ${lock.startedAt}`))
    console.error(chalk.gray(`\n  使用 'kill ${lock.pid}' 停止现有进程`))
    return null
  }

  const monitor = createMonitor(config, runtime, { restartLock: pidRestartLock })
  const cronExpr = intervalToCron(config.recovery.interval)

  console.log(chalk.green('启动监控进程...'))
  console.log(chalk.gray(`  容器: ${config.recovery.container}`))
  console.log(chalk.gray(`  检查间隔: ${config.recovery.interval} (${cronExpr})`))
  console.log(chalk.gray(`  重启冷却: ${config.recovery.cooldown}`))

  // 启动时先检查一次
  await safeTick(monitor)

  const job = cron.schedule(cronExpr, async () => {
    if (monitor.busy) {
      logger.warn('上一轮检查尚未结束，跳过本次调度')
      return
    }
    await safeTick(monitor)
  })

  let stopped = false
  const stop = (): void => {
    if (stopped) return
    stopped = true
    job.stop()
    releasePidLock('monitor')
    logger.info('Monitor stopped')
  }

  return { monitor, stop }
}

/**
 * 前台运行直到收到退出信号
 */
export async function runMonitor(config: Config, runtime: ContainerRuntime): Promise<boolean> {
  const handle = await startMonitor(config, runtime)
  if (!handle) return false

  await new Promise<void>(resolve => {
    const shutdown = (): void => {
      console.log(chalk.yellow('\n正在停止监控进程...'))
      handle.stop()
      resolve()
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  })
  return true
}
