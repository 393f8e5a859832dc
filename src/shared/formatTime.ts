/**
 * 时间处理工具
 */

import { format } from 'date-fns'

// 事件时间戳（恢复日志使用，对应 `date` 命令的输出位置）
export function formatTimestamp(date: Date = new Date()): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss')
}

// 格式化持续时间
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`
}

const INTERVAL_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
}

// 解析时间间隔字符串（如 "500ms", "5s", "5m", "1h"）
export function parseInterval(interval: string): number {
  const match = interval.trim().match(/^(\d+)(ms|s|m|h|d)$/)
  if (!match) throw new Error(`Invalid interval format: ${interval}`)

  const value = parseInt(match[1] ?? '0', 10)
  const multiplier = INTERVAL_MULTIPLIERS[match[2] ?? ''] ?? 0
  return value * multiplier
}

// 将分钟/小时间隔转换为 cron 表达式
export function intervalToCron(interval: string): string {
  const match = interval.match(/^(\d+)([mh])$/)
  if (!match) throw new Error(`Invalid interval format: ${interval}`)

  const value = match[1]
  return match[2] === 'm' ? `*/${value} * * * *` : `0 */${value} * * *`
}
