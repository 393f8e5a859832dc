/**
 * @entry Audit 模块 - 服务健康审计
 */

export type {
  ProbeOutcome,
  ProbeResult,
  ProbeDescriptor,
  AuditOptions,
  AuditContext,
  RunSummary,
} from './types.js'
export { runAudit, runProbes, summarize } from './runAudit.js'
export { buildBattery } from './battery.js'
export { classifyStatus, type RouteKind, type Classification } from './classify.js'
