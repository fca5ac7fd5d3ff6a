/**
 * 统一错误处理系统
 * 支持错误分类、上下文信息和修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'NETWORK' // 网络错误
  | 'SERVER' // 服务端非 200
  | 'PROTOCOL' // 响应格式错误
  | 'RESOURCE' // 本地资源（文件不存在等）
  | 'CONFIG' // 配置错误
  | 'UNKNOWN'

export type ErrorCode =
  | 'SERVER_ERROR'
  | 'REQUEST_FAILED'
  | 'INVALID_PAYLOAD'
  | 'FILE_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'UNKNOWN'

export class BotError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'BotError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  suggestion:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static serverError(status: number, body: string): BotError {
    return new BotError('SERVER_ERROR', `Server returned ${status}: ${body}`, 'SERVER')
  }

  static requestFailed(action: string, cause: unknown): BotError {
    return new BotError(
      'REQUEST_FAILED',
      `${action} failed: ${getErrorMessage(cause)}`,
      'NETWORK',
      cause
    )
  }

  static invalidPayload(reason: string): BotError {
    return new BotError('INVALID_PAYLOAD', `Malformed response: ${reason}`, 'PROTOCOL')
  }

  static fileNotFound(path: string): BotError {
    return new BotError(
      'FILE_NOT_FOUND',
      `File not found: ${path}`,
      'RESOURCE',
      undefined,
      'Check the file path relative to the working directory'
    )
  }

  static configInvalid(reason: string): BotError {
    return new BotError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'See .chatpoll.yaml or the CHATPOLL_* environment variables'
    )
  }

  static unknown(cause: unknown): BotError {
    if (cause instanceof BotError) return cause
    return new BotError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  NETWORK: chalk.red,
  SERVER: chalk.magenta,
  PROTOCOL: chalk.magenta,
  RESOURCE: chalk.yellow,
  CONFIG: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  console.error(BotError.unknown(error).format())
}

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
