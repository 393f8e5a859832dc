import { Command } from 'commander'
import { loadConfig, type ComposeConfig, type Config } from '../../config/index.js'
import { runAudit, type AuditOptions } from '../../audit/index.js'
import { createHttpProbe, type HttpProbe } from '../../probe/index.js'
import { createRuntime, type ContainerRuntime, type DockerAccess } from '../../runtime/index.js'
import { AppError, getErrorMessage } from '../../shared/index.js'
import { error, info, probeResult, success, warn } from '../output.js'

export interface CheckCommandOptions {
  host?: string
  dashboardUser?: string
  dashboardPass?: string
  skipInternal?: boolean
  useSudo?: boolean
}

export interface CheckDeps {
  createRuntime?: (
    compose: ComposeConfig,
    options: { useSudo: boolean }
  ) => Promise<{ runtime: ContainerRuntime; access: DockerAccess }>
  http?: HttpProbe
}

/**
 * 执行一次完整检查并逐行输出，返回进程退出码
 */
export async function runCheckCommand(
  config: Config,
  options: CheckCommandOptions,
  deps: CheckDeps = {}
): Promise<0 | 1> {
  const auditOptions: AuditOptions = {
    host: options.host ?? config.target.host,
    dashboardUser: options.dashboardUser,
    dashboardPass: options.dashboardPass,
    skipInternal: options.skipInternal ?? false,
    useSudo: options.useSudo ?? false,
  }

  info(`使用主机: ${auditOptions.host}`)
  if (config.hostnames.admin) info(`TRAEFIK_HOSTNAME=${config.hostnames.admin}`)
  if (config.hostnames.frontend) info(`OLLAMA_HOSTNAME=${config.hostnames.frontend}`)

  // 先确认 Docker 可用，必要时切换到 sudo
  const resolve = deps.createRuntime ?? createRuntime
  let runtime: ContainerRuntime
  try {
    const resolved = await resolve(config.compose, { useSudo: auditOptions.useSudo })
    runtime = resolved.runtime
    if (resolved.access.escalated) {
      warn('检测到 Docker 权限不足，将改用 sudo 执行。可改用 --use-sudo，或将用户加入 docker 群组后重新登录。')
    }
  } catch (e) {
    if (e instanceof AppError) {
      error(e.suggestion ? `${e.message}。${e.suggestion}` : e.message)
      return 1
    }
    error(getErrorMessage(e))
    return 1
  }

  const summary = await runAudit(
    { config, options: auditOptions, runtime, http: deps.http ?? createHttpProbe() },
    probeResult
  )

  if (auditOptions.skipInternal) {
    info('已跳过内部连线检查 (--skip-internal)')
  }

  if (summary.failures === 0) {
    success('所有基本检查完成')
  } else {
    error(`基本检查有 ${summary.failures} 项失败`)
  }
  return summary.exitCode
}

export function registerCheckCommand(program: Command) {
  program
    .command('check', { isDefault: true })
    .description('检查各服务状态、路由与内部连线（默认命令）')
    .option('--host <addr>', '外部主机/IP（对应 compose 映射的端口），默认取配置 target.host')
    .option('--dashboard-user <user>', '管理面板 BasicAuth 用户（未提供时 401 视为正常）')
    .option('--dashboard-pass <pass>', '管理面板 BasicAuth 密码')
    .option('--skip-internal', '跳过前端容器内部连到推理服务的检查')
    .option('--use-sudo', '以 sudo 执行 docker 命令')
    .action(async (options: CheckCommandOptions) => {
      const config = await loadConfig()
      process.exitCode = await runCheckCommand(config, options)
    })
}
