/**
 * Runtime context owned by one dispatch loop run
 *
 * Replaces process-wide state: logger, timings, clock, sleep and the
 * interrupt wiring are built here, opened when the loop starts and closed
 * when it returns.
 */

import { createLogger, type Logger } from '../shared/logger.js'
import { pollingConfigSchema, type PollingConfig } from '../config/schema.js'

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

export interface RuntimeContext {
  readonly logger: Logger
  readonly polling: PollingConfig
  /** Wall clock in seconds, the unit of message timestamps */
  now(): number
  sleep: SleepFn
  /** Install interrupt listeners; `onInterrupt` requests a cooperative stop */
  open(onInterrupt: () => void): void
  close(): void
}

export interface RuntimeContextOptions {
  polling?: Partial<PollingConfig>
  logger?: Logger
  now?: () => number
  sleep?: SleepFn
  /** Process signals treated as an interrupt; [] installs nothing */
  signals?: NodeJS.Signals[]
  /** Called on a second interrupt while the first is still pending (default process.exit) */
  forceExit?: (code: number) => void
}

/** 128 + SIGINT */
export const FORCED_EXIT_CODE = 130

/** setTimeout that resolves early when the signal aborts */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}

export function createRuntimeContext(options: RuntimeContextOptions = {}): RuntimeContext {
  const polling = pollingConfigSchema.parse(options.polling ?? {})
  const logger = options.logger ?? createLogger('dispatch')
  const signals = options.signals ?? ['SIGINT', 'SIGTERM']
  const forceExit = options.forceExit ?? ((code: number) => process.exit(code))
  let listener: ((signal: NodeJS.Signals) => void) | null = null

  function close(): void {
    if (!listener) return
    for (const signal of signals) {
      process.removeListener(signal, listener)
    }
    listener = null
  }

  return {
    logger,
    polling,
    now: options.now ?? (() => Date.now() / 1000),
    sleep: options.sleep ?? abortableSleep,
    open(onInterrupt) {
      close()
      let interrupted = false
      const handler = (signal: NodeJS.Signals) => {
        // 监听器替换了 Node 默认的退出行为；第二次中断强制退出
        if (interrupted) {
          logger.warn(`Received ${signal} again, exiting now`)
          forceExit(FORCED_EXIT_CODE)
          return
        }
        interrupted = true
        logger.info(`Received ${signal}, stopping after the current step (repeat to force)`)
        onInterrupt()
      }
      listener = handler
      for (const signal of signals) {
        process.on(signal, handler)
      }
    },
    close,
  }
}
