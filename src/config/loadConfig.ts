import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join, resolve } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger, isLogLevel } from '../shared/logger.js'
import { BotError } from '../shared/error.js'
import { configSchema, type Config, type ResolvedConfig } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.chatpoll.yaml'

export interface LoadConfigOptions {
  /** Project directory, defaults to process.cwd() */
  cwd?: string
  /** Explicit file; disables the global/project lookup */
  path?: string
  /** Home directory for the global file, defaults to os.homedir() */
  home?: string
  env?: NodeJS.ProcessEnv
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd: string, home: string): string[] {
  const globalPath = join(home, CONFIG_FILENAME)
  const projectPath = join(cwd, CONFIG_FILENAME)
  const paths: string[] = []
  if (existsSync(globalPath)) paths.push(globalPath)
  // 项目目录与 home 目录相同时，不重复加载
  if (resolve(cwd) !== resolve(home) && existsSync(projectPath)) paths.push(projectPath)
  return paths
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw BotError.configInvalid(`${filePath} must contain a mapping`)
  }
  return parsed
}

/**
 * Merge config objects: override fields win, nested mappings merge recursively.
 */
export function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? deepMergeConfig(current, val) : val
  }
  return result
}

/**
 * Apply environment variable overrides to config.
 * Called after schema validation; env vars skip schema checks except the log level.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  let next = config
  if (env.CHATPOLL_API_KEY) next = { ...next, apiKey: env.CHATPOLL_API_KEY }
  if (env.CHATPOLL_BASE_URL) next = { ...next, baseUrl: env.CHATPOLL_BASE_URL }

  const level = env.CHATPOLL_LOG_LEVEL
  if (level) {
    if (isLogLevel(level)) {
      next = { ...next, log: { ...next.log, level } }
    } else {
      logger.warn(`Ignoring CHATPOLL_LOG_LEVEL=${level}`)
    }
  }
  return next
}

/**
 * Validate raw config data, apply env overrides and require an API key.
 */
export function resolveConfig(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw BotError.configInvalid(
      issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch'
    )
  }

  const config = applyEnvOverrides(result.data, env)
  const { apiKey } = config
  if (!apiKey) {
    throw BotError.configInvalid('apiKey is required')
  }
  return { ...config, apiKey }
}

/**
 * 加载配置
 * 查找顺序：~/.chatpoll.yaml → 项目目录 .chatpoll.yaml（覆盖）→ 环境变量（覆盖）
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env

  let raw: Record<string, unknown> = {}
  if (options.path) {
    if (!existsSync(options.path)) {
      throw BotError.configInvalid(`config file not found: ${options.path}`)
    }
    raw = await parseYamlFile(options.path)
  } else {
    const paths = findConfigPaths(options.cwd ?? process.cwd(), options.home ?? homedir())
    for (const path of paths) {
      raw = deepMergeConfig(raw, await parseYamlFile(path))
    }
    if (paths.length === 0) {
      logger.debug('No config file found, using defaults and environment')
    }
  }

  return resolveConfig(raw, env)
}
