/**
 * 模型预拉取
 *
 * 推理服务控制端口就绪后，依次在容器内执行 `ollama pull <model>`。
 * 单个模型失败不影响后续模型，结果汇总返回。
 */

import type { ContainerRuntime } from '../runtime/types.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('bootstrap')

export interface PullFailure {
  model: string
  reason: string
}

export interface PullReport {
  pulled: string[]
  failed: PullFailure[]
}

export interface PullModelsOptions {
  runtime: ContainerRuntime
  /** 推理服务的 compose 服务名 */
  service: string
  models: string[]
  onModelStart?: (model: string, index: number, total: number) => void
  onModelDone?: (model: string, failure?: PullFailure) => void
}

export async function pullModels(options: PullModelsOptions): Promise<PullReport> {
  const { runtime, service, models } = options
  const report: PullReport = { pulled: [], failed: [] }
  if (models.length === 0) return report

  const containerId = await runtime.findContainer(service)
  if (!containerId) {
    const reason = `service=${service} 未启动（无容器）`
    for (const model of models) {
      const failure: PullFailure = { model, reason }
      report.failed.push(failure)
      options.onModelDone?.(model, failure)
    }
    return report
  }

  for (const [index, model] of models.entries()) {
    options.onModelStart?.(model, index, models.length)
    const result = await runtime.exec(containerId, ['ollama', 'pull', model])
    if (result.exitCode === 0) {
      report.pulled.push(model)
      options.onModelDone?.(model)
      continue
    }

    const lastLine = result.stderr.trim().split('\n').pop() ?? ''
    const failure: PullFailure = { model, reason: lastLine || `exit ${result.exitCode}` }
    logger.debug(`${result.command} failed`, result.stderr)
    report.failed.push(failure)
    options.onModelDone?.(model, failure)
  }

  return report
}
