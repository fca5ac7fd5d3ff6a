/**
 * Dispatch loop
 *
 * syncing → listening → terminated | failed
 *
 * - syncing: one short poll from 0 to place the cursor past existing history
 * - listening: long-poll, route each update to its command handler or to the catch-alls
 * - failed: the server rejected the API key (403); shutdown is NOT fired on this path
 * - terminated: stop() was requested; shutdown fires exactly once
 *
 * Single sequential flow: one handler in flight at a time. stop() is checked
 * between polls only; an in-flight request or handler is never preempted.
 */

import { Message } from '../model/message.js'
import type { RawUpdate } from '../model/payload.js'
import type { MessageActions } from '../model/types.js'
import type { HandlerRegistry } from '../registry/handlerRegistry.js'
import type { LifecycleEvent } from '../registry/types.js'
import type { Transport } from '../transport/types.js'
import { logError } from '../shared/logger.js'
import { assertNever } from '../shared/error.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import type { RuntimeContext } from './runtimeContext.js'

export type LoopState = 'idle' | 'syncing' | 'listening' | 'terminated' | 'failed'
export type LoopOutcome = Extract<LoopState, 'terminated' | 'failed'>

export interface DispatchLoopOptions {
  transport: Transport
  registry: HandlerRegistry
  context: RuntimeContext
  /** Bound to every parsed message so handlers can reply */
  actions?: MessageActions | null
}

type PollStep = 'continue' | 'failed'

export class DispatchLoop {
  private readonly transport: Transport
  private readonly registry: HandlerRegistry
  private readonly context: RuntimeContext
  private readonly actions: MessageActions | null
  private readonly stopController = new AbortController()
  private currentState: LoopState = 'idle'
  private lastTs = 0

  constructor(options: DispatchLoopOptions) {
    this.transport = options.transport
    this.registry = options.registry
    this.context = options.context
    this.actions = options.actions ?? null
  }

  get state(): LoopState {
    return this.currentState
  }

  /** Lower bound (exclusive) of the next poll */
  get cursor(): number {
    return this.lastTs
  }

  get stopRequested(): boolean {
    return this.stopController.signal.aborted
  }

  /** Request a cooperative stop; takes effect at the next iteration boundary */
  stop(): void {
    if (this.stopRequested) return
    this.context.logger.info('Stop requested')
    this.stopController.abort()
  }

  async run(): Promise<LoopOutcome> {
    if (this.currentState !== 'idle') {
      throw new Error(`DispatchLoop already ${this.currentState}`)
    }

    await this.sync()
    this.currentState = 'listening'
    await this.fire('startup')
    this.context.logger.info('🚀 Listening (long polling)...')

    while (!this.stopRequested) {
      const step = await this.pollOnce()
      if (step === 'failed') {
        this.currentState = 'failed'
        return 'failed'
      }
    }

    this.context.logger.info('Stopping bot...')
    await this.fire('shutdown')
    this.currentState = 'terminated'
    return 'terminated'
  }

  // ── syncing ──

  private async sync(): Promise<void> {
    this.currentState = 'syncing'
    const { logger, polling } = this.context

    try {
      const result = await this.transport.fetchUpdates(0, polling.syncTimeoutSeconds)
      if (result.kind === 'ok') {
        const last = result.updates.at(-1)
        if (last) {
          this.lastTs = last.timestamp + polling.syncEpsilon
          logger.info(`✅ Synced. Last TS: ${this.lastTs}`)
          return
        }
      } else {
        logger.warn(`Initial sync returned ${result.kind}, starting from now`)
      }
    } catch (error) {
      logger.warn(`Initial sync failed: ${getErrorMessage(error)}`)
    }

    this.lastTs = this.context.now()
  }

  // ── listening ──

  private async pollOnce(): Promise<PollStep> {
    const { logger, polling } = this.context

    try {
      const result = await this.transport.fetchUpdates(this.lastTs, polling.pollTimeoutSeconds)
      switch (result.kind) {
        case 'timeout':
          // 长轮询空闲返回，不是错误
          return 'continue'
        case 'connection-failure':
          logger.error(`Connection lost: ${result.error.message}`)
          await this.fire('connection_error')
          await this.backoff(polling.connectionBackoffMs)
          return 'continue'
        case 'unauthorized':
          logger.error('⛔ Invalid API key')
          return 'failed'
        case 'server-error':
          logger.warn(`Server returned: ${result.status}`)
          await this.backoff(polling.serverErrorBackoffMs)
          return 'continue'
        case 'ok':
          await this.dispatchBatch(result.updates)
          return 'continue'
        default:
          return assertNever(result)
      }
    } catch (error) {
      const loopError = ensureError(error)
      logError(logger, 'Loop error', loopError)
      await this.fire('error', loopError)
      await this.backoff(polling.loopErrorBackoffMs)
      return 'continue'
    }
  }

  private async dispatchBatch(updates: RawUpdate[]): Promise<void> {
    for (const update of updates) {
      // 先推进游标再分发：处理失败的消息不会被重新投递
      this.lastTs = Math.max(this.lastTs, update.timestamp)
      const message = new Message(update, this.actions)
      this.context.logger.info(`[${message.author.displayName ?? 'unknown'}]: ${message.text}`)
      await this.dispatch(message)
    }
  }

  private async dispatch(message: Message): Promise<void> {
    const entry = this.registry.findCommand(message.command)

    if (entry) {
      try {
        if (entry.shape === 'message-and-args') {
          await entry.handler(message, message.args)
        } else {
          await entry.handler(message)
        }
      } catch (error) {
        await this.reportHandlerError(`Error in command handler for '${message.command}'`, error, message)
      }
      return
    }

    for (const handler of this.registry.catchAllHandlers()) {
      try {
        await handler(message)
      } catch (error) {
        await this.reportHandlerError('Error in message handler', error, message)
      }
    }
  }

  private async reportHandlerError(label: string, error: unknown, message: Message): Promise<void> {
    const handlerError = ensureError(error)
    logError(this.context.logger, label, handlerError, { messageId: message.id })
    await this.fire('error', handlerError, message)
  }

  private backoff(ms: number): Promise<void> {
    return this.context.sleep(ms, this.stopController.signal)
  }

  /** Best-effort: a failing lifecycle handler is logged and never propagates */
  private async fire(event: LifecycleEvent, error?: Error, message?: Message): Promise<void> {
    const handler = this.registry.eventHandler(event)
    if (!handler) return

    try {
      if (error === undefined) {
        await handler()
      } else if (message === undefined) {
        await handler(error)
      } else {
        await handler(error, message)
      }
    } catch (e) {
      this.context.logger.error(`Error in '${event}' handler: ${getErrorMessage(e)}`)
    }
  }
}
