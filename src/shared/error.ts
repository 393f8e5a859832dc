/**
 * 统一错误处理
 * 错误分类 + 错误码 + 修复建议，CLI 边界统一 format 输出
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'CONFIG' // 配置错误
  | 'RUNTIME' // 容器运行时错误
  | 'PERMISSION' // 权限错误
  | 'NETWORK' // 网络错误
  | 'TIMEOUT' // 超时错误
  | 'VALIDATION' // 输入验证错误
  | 'UNKNOWN' // 未知错误

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'RUNTIME_UNREACHABLE'
  | 'COMPOSE_NOT_FOUND'
  | 'WAIT_TIMEOUT'
  | 'RESTART_FAILED'
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN'

// ============ 统一错误类 ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(
      chalk.red('✗') + ' ' + chalk.bold('错误') + ` [${colorFn(categoryLabels[this.category])}]`
    )
    lines.push('')
    lines.push(chalk.dim(`  代码: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  建议修复:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      '检查 .stack-sentinel.yaml 与 .env 中的取值'
    )
  }

  static runtimeUnreachable(cause?: unknown): AppError {
    return new AppError(
      'RUNTIME_UNREACHABLE',
      '无法连线到 Docker daemon（可能是权限不足或 Docker 未启动）',
      'RUNTIME',
      cause,
      '启动 Docker、使用 --use-sudo，或将用户加入 docker 群组后重新登录'
    )
  }

  static composeNotFound(): AppError {
    return new AppError(
      'COMPOSE_NOT_FOUND',
      '找不到 docker compose 或 docker-compose 命令',
      'RUNTIME',
      undefined,
      '安装 Docker Compose 插件或独立的 docker-compose'
    )
  }

  static restartFailed(command: string, cause: unknown): AppError {
    return new AppError(
      'RESTART_FAILED',
      `服务组重启失败: ${command}: ${getErrorMessage(cause)}`,
      'RUNTIME',
      cause,
      '手动执行该命令确认 Docker 状态；下一次调度会再次检查'
    )
  }

  static invalidArgument(reason: string): AppError {
    return new AppError('INVALID_ARGUMENT', reason, 'VALIDATION', undefined, '使用 --help 查看用法')
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

/**
 * 等待端点就绪超时
 * 携带已等待时长、尝试次数与最后一次观察到的错误
 */
export class WaitTimeoutError extends AppError {
  constructor(
    public readonly target: string,
    public readonly elapsedMs: number,
    public readonly attempts: number,
    public readonly lastError: Error | undefined
  ) {
    super(
      'WAIT_TIMEOUT',
      `${target} not ready after ${elapsedMs}ms (${attempts} attempts` +
        (lastError ? `, last error: ${lastError.message})` : ')'),
      'TIMEOUT',
      lastError,
      '确认服务已启动，或使用 --timeout 增加等待时间'
    )
    this.name = 'WaitTimeoutError'
  }
}

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: '配置',
  RUNTIME: '运行时',
  PERMISSION: '权限',
  NETWORK: '网络',
  TIMEOUT: '超时',
  VALIDATION: '验证',
  UNKNOWN: '未知',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  RUNTIME: chalk.red,
  PERMISSION: chalk.red,
  NETWORK: chalk.red,
  TIMEOUT: chalk.magenta,
  VALIDATION: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  const appError = error instanceof AppError ? error : AppError.unknown(error)
  console.error(appError.format())
}

// ============ 错误断言 ============

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
