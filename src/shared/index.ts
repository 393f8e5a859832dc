/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 显式错误处理（ok/err/map/fromPromise）
 * - AppError / WaitTimeoutError: 统一错误类型（printError/assertNever）
 * - Logger: 日志系统（createLogger/setLogLevel/logError）
 * - 错误守卫: getErrorMessage/ensureError
 * - 时间: formatTimestamp/formatDuration/parseInterval/intervalToCron
 * - 路径: getDataDir/getPidFilePath/getRecoveryStatePath
 */

export {
  type Result,
  ok,
  err,
  map,
  fromPromise,
} from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  WaitTimeoutError,
  printError,
  assertNever,
} from './error.js'

export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  createLogger,
  setLogLevel,
  logError,
} from './logger.js'

export { getErrorMessage, ensureError } from './assertError.js'

export { formatTimestamp, formatDuration, parseInterval, intervalToCron } from './formatTime.js'

export { getDataDir, getPidFilePath, getRecoveryStatePath } from './paths.js'
