/**
 * @entry Shared 公共基础设施模块
 *
 * - Result<T,E>: 出站请求的显式错误处理
 * - BotError: 统一错误类型
 * - Logger: 日志系统
 * - 错误守卫: getErrorMessage/ensureError
 */

export { type Result, ok, err } from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  BotError,
  assertNever,
  printError,
} from './error.js'

export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  isLogLevel,
  setLogLevel,
  getLogLevel,
  createLogger,
  logError,
} from './logger.js'

export { getErrorMessage, ensureError } from './assertError.js'
