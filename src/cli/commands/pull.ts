import { Command } from 'commander'
import { loadConfig, type Config } from '../../config/index.js'
import { pullModels } from '../../bootstrap/pullModels.js'
import type { WaitDeps } from '../../readiness/index.js'
import { createRuntime, type ContainerRuntime } from '../../runtime/index.js'
import { printError } from '../../shared/index.js'
import { error, info, step, success } from '../output.js'
import type { CheckDeps } from './check.js'
import { runWaitCommand } from './wait.js'

export interface PullCommandOptions {
  timeout?: string
  useSudo?: boolean
}

export interface PullDeps {
  createRuntime?: CheckDeps['createRuntime']
  wait?: WaitDeps
}

/**
 * 等待推理服务控制端口后依次拉取模型，返回进程退出码
 */
export async function runPullCommand(
  config: Config,
  models: string[],
  options: PullCommandOptions,
  deps: PullDeps = {}
): Promise<0 | 1 | 2> {
  const targets = models.length > 0 ? models : config.bootstrap.models
  if (targets.length === 0) {
    info('没有需要拉取的模型（在 bootstrap.models 中配置或通过参数指定）')
    return 0
  }

  const waitCode = await runWaitCommand(config, undefined, { timeout: options.timeout }, deps.wait)
  if (waitCode !== 0) return waitCode

  const resolve = deps.createRuntime ?? createRuntime
  let runtime: ContainerRuntime
  try {
    runtime = (await resolve(config.compose, { useSudo: options.useSudo ?? false })).runtime
  } catch (e) {
    printError(e)
    return 1
  }

  const report = await pullModels({
    runtime,
    service: config.services.inference,
    models: targets,
    onModelStart: (model, index, total) => step(index + 1, total, `拉取模型 ${model}`),
    onModelDone: (model, failure) => {
      if (failure) {
        error(`${model} 拉取失败: ${failure.reason}`)
      } else {
        success(`${model} 拉取完成`)
      }
    },
  })

  if (report.failed.length > 0) {
    error(`${report.failed.length}/${targets.length} 个模型拉取失败`)
    return 1
  }
  success(`已拉取 ${report.pulled.length} 个模型`)
  return 0
}

export function registerPullCommand(program: Command) {
  program
    .command('pull')
    .description('推理服务就绪后拉取模型（默认取配置 bootstrap.models）')
    .argument('[models...]', '要拉取的模型，覆盖配置')
    .option('--timeout <duration>', '等待推理服务就绪的最长时间，如 2m')
    .option('--use-sudo', '以 sudo 执行 docker 命令')
    .action(async (models: string[], options: PullCommandOptions) => {
      const config = await loadConfig()
      process.exitCode = await runPullCommand(config, models, options)
    })
}
