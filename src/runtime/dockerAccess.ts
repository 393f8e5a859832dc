/**
 * Docker 访问能力探测
 *
 * 启动时执行一次，结果在整个运行期间复用：
 * 1. 检测 compose 调用方式（docker compose 插件 / docker-compose）
 * 2. 按 --use-sudo 决定先用哪种方式执行 docker info
 * 3. 失败时仅允许一次 sudo 升级重试，再失败即报错
 */

import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import type { CommandRunner, ComposeStyle, DockerAccess } from './types.js'

const logger = createLogger('docker-access')

// daemon 卡住时 docker info 不会自己返回
const ACCESS_CHECK_TIMEOUT_MS = 15_000
const check = { timeoutMs: ACCESS_CHECK_TIMEOUT_MS }

async function detectComposeStyle(run: CommandRunner): Promise<ComposeStyle> {
  const plugin = await run('docker', ['compose', 'version'], check)
  if (plugin.exitCode === 0) return 'plugin'

  const standalone = await run('docker-compose', ['version'], check)
  if (standalone.exitCode === 0) return 'standalone'

  throw AppError.composeNotFound()
}

async function canReachDaemon(run: CommandRunner, sudo: boolean): Promise<boolean> {
  const result = sudo ? await run('sudo', ['docker', 'info'], check) : await run('docker', ['info'], check)
  if (result.exitCode !== 0) {
    logger.debug(`${result.command} failed (exit=${result.exitCode}): ${result.stderr.trim()}`)
  }
  return result.exitCode === 0
}

export async function resolveDockerAccess(
  run: CommandRunner,
  options: { useSudo: boolean }
): Promise<DockerAccess> {
  const compose = await detectComposeStyle(run)

  if (await canReachDaemon(run, options.useSudo)) {
    return { sudo: options.useSudo, compose, escalated: false }
  }

  if (!options.useSudo && (await canReachDaemon(run, true))) {
    return { sudo: true, compose, escalated: true }
  }

  throw AppError.runtimeUnreachable()
}
