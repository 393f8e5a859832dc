/**
 * CLI 用户输出工具
 * 用于面向用户的终端输出，简洁友好，无时间戳
 *
 * 注意：这些函数仅用于终端用户交互，不用于诊断日志
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'
import type { ProbeResult } from '../audit/types.js'

// ============ 基础输出 ============

/** 成功消息 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

/** 错误消息 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

/** 警告消息 */
export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

/** 信息消息 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ 结构化输出 ============

/** 输出步骤进度 [1/5] 消息 */
export function step(current: number, total: number, message: string): void {
  const progress = chalk.cyan(`[${current}/${total}]`)
  console.log(`${progress} ${message}`)
}

// ============ 检查结果 ============

/** 每个探测结果输出一行，标记随 outcome 变化 */
export function probeResult(result: ProbeResult): void {
  switch (result.outcome) {
    case 'pass':
      success(result.detail)
      break
    case 'warn':
      warn(result.detail)
      break
    case 'fail':
      error(result.detail)
      break
  }
}
