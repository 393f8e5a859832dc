import { Command } from 'commander'
import { loadConfig, type Config } from '../../config/index.js'
import type { RecoveryDecision } from '../../recovery/index.js'
import { createRuntime, type ContainerRuntime } from '../../runtime/index.js'
import { acquirePidLock, releasePidLock, createMonitor, runMonitor } from '../../scheduler/index.js'
import { assertNever, printError } from '../../shared/index.js'
import { info, success, warn } from '../output.js'
import type { CheckDeps } from './check.js'

export interface RecoveryCommandOptions {
  useSudo?: boolean
}

export interface TickDeps {
  createRuntime?: CheckDeps['createRuntime']
}

function reportDecision(decision: RecoveryDecision, config: Config): void {
  switch (decision) {
    case 'healthy':
      success(`加速器正常工作 (${config.recovery.container})`)
      break
    case 'restarted':
      warn('加速器未启用，已重启服务组')
      break
    case 'suppressed':
      warn(`加速器未启用，但仍在重启冷却期内 (${config.recovery.cooldown})，本次未重启`)
      break
    case 'busy':
      info('上一次检查或重启尚未完成，跳过本次检查')
      break
    default:
      assertNever(decision)
  }
}

/**
 * 单次检查（供系统 cron 调用），返回进程退出码
 * 持有 restart 锁，外部调度重叠时后到者直接跳过
 */
export async function runTickCommand(
  config: Config,
  options: RecoveryCommandOptions,
  deps: TickDeps = {}
): Promise<0 | 1> {
  const lock = acquirePidLock('restart')
  if (!lock.success) {
    info(`另一个检查进程仍在运行 (PID ${lock.existingLock.pid})，跳过本次检查`)
    return 0
  }

  try {
    const resolve = deps.createRuntime ?? createRuntime
    const { runtime } = await resolve(config.compose, { useSudo: options.useSudo ?? false })
    const decision = await createMonitor(config, runtime).tick()
    reportDecision(decision, config)
    return 0
  } catch (e) {
    printError(e)
    return 1
  } finally {
    releasePidLock('restart')
  }
}

async function resolveRuntime(config: Config, options: RecoveryCommandOptions): Promise<ContainerRuntime> {
  const { runtime } = await createRuntime(config.compose, { useSudo: options.useSudo ?? false })
  return runtime
}

export function registerRecoveryCommands(program: Command) {
  program
    .command('tick')
    .description('执行一次加速器存活检查，失败时重启服务组（适合系统 cron）')
    .option('--use-sudo', '以 sudo 执行 docker 命令')
    .action(async (options: RecoveryCommandOptions) => {
      const config = await loadConfig()
      process.exitCode = await runTickCommand(config, options)
    })

  program
    .command('monitor')
    .description('前台常驻，按 recovery.interval 定期检查（Ctrl+C 停止）')
    .option('--use-sudo', '以 sudo 执行 docker 命令')
    .action(async (options: RecoveryCommandOptions) => {
      const config = await loadConfig()
      const runtime = await resolveRuntime(config, options)
      const started = await runMonitor(config, runtime)
      if (!started) process.exitCode = 1
    })
}
