import { Command } from 'commander'
import { loadConfig, type Config } from '../../config/index.js'
import { describeEndpoint, parseEndpoint, waitReady, type WaitDeps, type WaitOptions } from '../../readiness/index.js'
import { AppError, formatDuration, getErrorMessage, parseInterval, printError } from '../../shared/index.js'
import { createSpinner } from '../spinner.js'

export interface WaitCommandOptions {
  timeout?: string
  interval?: string
  attemptTimeout?: string
}

function toMs(flag: string, value: string): number {
  let ms: number
  try {
    ms = parseInterval(value)
  } catch (e) {
    throw AppError.invalidArgument(`${flag}: ${getErrorMessage(e)}`)
  }
  // 0 间隔会让轮询变成忙等
  if (ms <= 0) {
    throw AppError.invalidArgument(`${flag}: must be greater than 0`)
  }
  return ms
}

/**
 * CLI 参数与配置合并为等待参数，格式错误或取值为 0 时抛出 INVALID_ARGUMENT
 */
export function resolveWaitOptions(config: Config, options: WaitCommandOptions): WaitOptions {
  return {
    timeoutMs: toMs('--timeout', options.timeout ?? config.readiness.timeout),
    pollIntervalMs: toMs('--interval', options.interval ?? config.readiness.interval),
    attemptTimeoutMs: toMs('--attempt-timeout', options.attemptTimeout ?? config.readiness.attemptTimeout),
  }
}

/**
 * 等待端点就绪，返回进程退出码：0 就绪，1 超时，2 参数错误
 */
export async function runWaitCommand(
  config: Config,
  target: string | undefined,
  options: WaitCommandOptions,
  deps: WaitDeps = {}
): Promise<0 | 1 | 2> {
  const parsed = parseEndpoint(target ?? `${config.inference.host}:${config.inference.port}`)
  if (!parsed.ok) {
    printError(parsed.error)
    return 2
  }

  let waitOptions: WaitOptions
  try {
    waitOptions = resolveWaitOptions(config, options)
  } catch (e) {
    printError(e)
    return 2
  }

  const endpoint = parsed.value
  const label = describeEndpoint(endpoint)
  const spinner = createSpinner(`等待 ${label} 就绪...`)
  spinner.start()

  const result = await waitReady(endpoint, waitOptions, {
    ...deps,
    onRetry: (attempt, error) => {
      spinner.text(`等待 ${label} 就绪... (第 ${attempt} 次尝试失败: ${error.message})`)
      deps.onRetry?.(attempt, error)
    },
  })

  if (result.ok) {
    spinner.succeed(`${label} 已就绪（${result.value.attempts} 次尝试，${formatDuration(result.value.elapsedMs)}）`)
    return 0
  }

  spinner.fail(`${label} 等待超时`)
  printError(result.error)
  return 1
}

export function registerWaitCommand(program: Command) {
  program
    .command('wait')
    .description('等待端点可连线（默认推理服务控制端口）')
    .argument('[endpoint]', 'host:port、tcp://host:port 或 http(s):// URL')
    .option('--timeout <duration>', '最长等待时间，如 2m')
    .option('--interval <duration>', '两次尝试的间隔，如 2s')
    .option('--attempt-timeout <duration>', '单次尝试的超时，如 3s')
    .action(async (endpoint: string | undefined, options: WaitCommandOptions) => {
      const config = await loadConfig()
      process.exitCode = await runWaitCommand(config, endpoint, options)
    })
}
