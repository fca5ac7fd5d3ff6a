/**
 * @entry chatpoll
 *
 * Long-polling chat bot client: message model, handler registry, dispatch loop
 */

export { Bot, type BotOptions } from './bot.js'
export * from './model/index.js'
export * from './registry/index.js'
export * from './transport/index.js'
export * from './dispatch/index.js'
export { loadConfig, resolveConfig, type Config, type ResolvedConfig, type PollingConfig } from './config/index.js'
export {
  BotError,
  createLogger,
  setLogLevel,
  type ErrorCode,
  type Logger,
  type LogLevel,
  type Result,
} from './shared/index.js'
