/**
 * 统一日志系统
 *
 * 功能：
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台两种格式（非 TTY 或 SENTINEL_BACKGROUND=1 时走后台格式）
 * - 结构化上下文信息
 *
 * 使用：
 * - const logger = createLogger('recovery')
 * - setLogLevel('debug'|'info'|'warn'|'error')
 *
 * 注意：面向用户的检查结果输出走 cli/output.ts，不走这里
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

// ============ 全局状态 ============

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// 从环境变量初始化日志级别
function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const level = process.env.LOG_LEVEL
  if (level && isLogLevel(level)) return level
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.SENTINEL_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatClock(): string {
  const now = new Date()
  return chalk.dim(
    `${now.getHours().toString().padStart(2, '0')}:${now.getMinutes().toString().padStart(2, '0')}:${now.getSeconds().toString().padStart(2, '0')}`
  )
}

/**
 * 格式化消息
 * - 前台模式：时间+级别+消息
 * - 后台模式：额外带 scope，便于从 cron 日志里 grep
 */
function formatMessage(level: Exclude<LogLevel, 'silent'>, scope: string, message: string): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (currentMode === 'foreground') {
    return `${formatClock()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatClock()} ${color(label)} ${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return

    const output = formatMessage(level, scope, message)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}

// ============ 错误日志增强 ============

/** 错误上下文信息 */
export interface ErrorContext {
  /** 执行的完整命令 */
  command?: string
  /** 目标容器 */
  container?: string
  /** 额外数据 */
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志
 * 自动提取错误信息和堆栈，并附加上下文信息
 *
 * @example
 * logError(logger, 'Restart failed', err, { command: 'docker compose restart' })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: Error | string,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : error
  const errorStack = error instanceof Error ? error.stack : undefined

  const data: Record<string, unknown> = {}
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) {
        data[key] = value
      }
    }
  }

  // 堆栈只留前 5 行
  if (errorStack) {
    data.stack = errorStack.split('\n').slice(0, 6).join('\n')
  }

  const fullMessage = `${message}: ${errorMessage}`
  if (Object.keys(data).length > 0) {
    loggerInstance.error(fullMessage, data)
  } else {
    loggerInstance.error(fullMessage)
  }
}
