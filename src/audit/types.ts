import type { Config } from '../config/schema.js'
import type { HttpProbe } from '../probe/httpProbe.js'
import type { ContainerRuntime } from '../runtime/types.js'

export type ProbeOutcome = 'pass' | 'warn' | 'fail'

export interface ProbeResult {
  name: string
  outcome: ProbeOutcome
  /** 面向运维人员的一行说明 */
  detail: string
  /** 前置配置缺失或目标容器不存在而未执行（outcome 恒为 warn） */
  skipped?: boolean
}

/** 一次审计的运行参数（CLI 参数 + 配置合并后的结果） */
export interface AuditOptions {
  host: string
  dashboardUser?: string
  dashboardPass?: string
  skipInternal: boolean
  useSudo: boolean
}

export interface AuditContext {
  config: Config
  options: AuditOptions
  runtime: ContainerRuntime
  http: HttpProbe
}

export interface ProbeDescriptor {
  name: string
  description: string
  run: (ctx: AuditContext) => Promise<ProbeResult>
}

export interface RunSummary {
  timestamp: number
  results: ProbeResult[]
  /** outcome === 'fail' 的数量 */
  failures: number
  warnings: number
  /** failures > 0 时为 1 */
  exitCode: 0 | 1
}
