/**
 * 探测执行器
 *
 * 严格串行执行，单个探测的失败或异常不会中断后续探测
 */

import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import { buildBattery } from './battery.js'
import type { AuditContext, ProbeDescriptor, ProbeResult, RunSummary } from './types.js'

const logger = createLogger('audit')

export function summarize(results: ProbeResult[], timestamp: number = Date.now()): RunSummary {
  const failures = results.filter(r => r.outcome === 'fail').length
  const warnings = results.filter(r => r.outcome === 'warn').length
  return {
    timestamp,
    results,
    failures,
    warnings,
    exitCode: failures > 0 ? 1 : 0,
  }
}

export async function runProbes(
  probes: ProbeDescriptor[],
  ctx: AuditContext,
  onResult?: (result: ProbeResult) => void
): Promise<RunSummary> {
  const timestamp = Date.now()
  const results: ProbeResult[] = []

  for (const probe of probes) {
    let result: ProbeResult
    try {
      result = await probe.run(ctx)
    } catch (error) {
      logger.debug(`Probe ${probe.name} threw`, error)
      result = { name: probe.name, outcome: 'fail', detail: `${probe.name} 执行异常: ${getErrorMessage(error)}` }
    }
    results.push(result)
    onResult?.(result)
  }

  return summarize(results, timestamp)
}

/**
 * 执行完整的审计清单
 * @param onResult - 每个探测完成后立即回调，用于逐行输出
 */
export function runAudit(
  ctx: AuditContext,
  onResult?: (result: ProbeResult) => void
): Promise<RunSummary> {
  return runProbes(buildBattery(ctx.config, ctx.options), ctx, onResult)
}
