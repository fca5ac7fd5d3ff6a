/**
 * CLI 用户输出工具
 * 面向终端用户，无时间戳；诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

/** Aligned `key: value` lines */
export function keyValue(entries: Array<[string, string]>): void {
  const width = Math.max(0, ...entries.map(([key]) => key.length))
  for (const [key, value] of entries) {
    console.log(`  ${chalk.dim(key.padEnd(width))}  ${value}`)
  }
}

/** `test-secret-key` → `test…key` */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '*'.repeat(secret.length)
  return `${secret.slice(0, 4)}…${secret.slice(-3)}`
}
