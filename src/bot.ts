/**
 * Bot 门面
 *
 * 注册 API（command / commandWithArgs / onMessage / event）+ 出站操作 + 阻塞式 run()
 * 出站失败只记录日志并返回 null/false，不重试
 */

import { createLogger } from './shared/logger.js'
import { DEFAULT_BASE_URL, type PollingConfig, type ResolvedConfig } from './config/schema.js'
import { SentMessage } from './model/sentMessage.js'
import type { MessageActions, SendOptions } from './model/types.js'
import { HandlerRegistry } from './registry/handlerRegistry.js'
import type { ArgsHandler, LifecycleEvent, LifecycleHandler, MessageHandler } from './registry/types.js'
import { HttpTransport } from './transport/httpTransport.js'
import type { FetchFn, Transport } from './transport/types.js'
import { DispatchLoop, type LoopOutcome } from './dispatch/dispatchLoop.js'
import { createRuntimeContext, type RuntimeContextOptions } from './dispatch/runtimeContext.js'

const logger = createLogger('bot')

export interface BotOptions {
  apiKey: string
  baseUrl?: string
  uploadUrl?: string
  /** Replaces the HTTP transport entirely */
  transport?: Transport
  fetch?: FetchFn
  polling?: Partial<PollingConfig>
  /** Clock, sleep and interrupt signals of the run context */
  runtime?: Omit<RuntimeContextOptions, 'polling'>
  /** Exit the process with status 0 after a cooperative shutdown (default true) */
  exitOnShutdown?: boolean
  /** Process exit used after shutdown and on a forced second interrupt */
  exit?: (code: number) => void
}

export class Bot implements MessageActions {
  readonly registry = new HandlerRegistry()
  readonly baseUrl: string
  private readonly transport: Transport
  private readonly options: BotOptions
  private activeLoop: DispatchLoop | null = null

  constructor(options: BotOptions) {
    this.options = options
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.transport =
      options.transport ??
      new HttpTransport({
        apiKey: options.apiKey,
        baseUrl: this.baseUrl,
        uploadUrl: options.uploadUrl,
        fetch: options.fetch,
      })
  }

  static fromConfig(config: ResolvedConfig, overrides: Partial<BotOptions> = {}): Bot {
    return new Bot({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      uploadUrl: config.uploadUrl,
      polling: config.polling,
      ...overrides,
    })
  }

  // ── Registration ──

  /**
   * Handle an exact command trigger, called with the message only.
   *
   * @example
   * bot.command('/ping', msg => msg.reply('pong'))
   */
  command(trigger: string, handler: MessageHandler): MessageHandler {
    this.registry.registerCommand(trigger, { shape: 'message-only', handler })
    return handler
  }

  /** Handle an exact command trigger, called with the message and its args */
  commandWithArgs(trigger: string, handler: ArgsHandler): ArgsHandler {
    this.registry.registerCommand(trigger, { shape: 'message-and-args', handler })
    return handler
  }

  /** Catch-all for messages no command matched; runs in registration order */
  onMessage(handler: MessageHandler): MessageHandler {
    this.registry.registerCatchAll(handler)
    return handler
  }

  /** Lifecycle hook: startup | shutdown | connection_error | error */
  event(name: LifecycleEvent | (string & {}), handler: LifecycleHandler): LifecycleHandler {
    this.registry.registerEvent(name, handler)
    return handler
  }

  // ── Outbound actions ──

  async sendMessage(options: SendOptions): Promise<SentMessage | null> {
    const result = await this.transport.send(options)
    if (!result.ok) {
      logger.error(result.error.message)
      return null
    }
    return new SentMessage(result.value, this, options.text ?? null)
  }

  async editMessage(target: SentMessage | string, text: string): Promise<boolean> {
    const id = typeof target === 'string' ? target : target.id
    if (!id) return false
    const result = await this.transport.edit(id, text)
    if (!result.ok) logger.error(result.error.message)
    return result.ok
  }

  async deleteMessage(target: SentMessage | string): Promise<boolean> {
    const id = typeof target === 'string' ? target : target.id
    if (!id) return false
    const result = await this.transport.delete(id)
    if (!result.ok) logger.error(result.error.message)
    return result.ok
  }

  async uploadFile(localPath: string): Promise<string | null> {
    const result = await this.transport.uploadFile(localPath)
    if (!result.ok) {
      logger.error(result.error.message)
      return null
    }
    return result.value
  }

  // ── Run ──

  get running(): boolean {
    return this.activeLoop !== null
  }

  /**
   * Block until the API key is rejected ('failed') or an interrupt stops the loop.
   * After a cooperative stop the process exits with status 0 unless `exitOnShutdown` is false.
   */
  async run(): Promise<LoopOutcome> {
    if (this.activeLoop) {
      throw new Error('Bot is already running')
    }

    const context = createRuntimeContext({
      forceExit: this.options.exit,
      ...this.options.runtime,
      polling: this.options.polling,
    })
    const loop = new DispatchLoop({
      transport: this.transport,
      registry: this.registry,
      context,
      actions: this,
    })

    logger.info(`🤖 Connecting to ${this.baseUrl}...`)
    this.activeLoop = loop
    context.open(() => loop.stop())

    let outcome: LoopOutcome
    try {
      outcome = await loop.run()
    } finally {
      context.close()
      this.activeLoop = null
    }

    if (outcome === 'terminated' && this.options.exitOnShutdown !== false) {
      const exit = this.options.exit ?? ((code: number) => process.exit(code))
      exit(0)
    }
    return outcome
  }

  /** Cooperative stop of a running loop, same as an interrupt */
  stop(): void {
    this.activeLoop?.stop()
  }
}
