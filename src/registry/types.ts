import type { Message } from '../model/message.js'

export type Awaitable<T> = T | Promise<T>

export type MessageHandler = (message: Message) => Awaitable<void>
export type ArgsHandler = (message: Message, args: readonly string[]) => Awaitable<void>

/** How a command handler wants to be called; declared at registration, never inferred */
export type HandlerShape = 'message-only' | 'message-and-args'

export type CommandEntry =
  | { shape: 'message-only'; handler: MessageHandler }
  | { shape: 'message-and-args'; handler: ArgsHandler }

export const LIFECYCLE_EVENTS = ['startup', 'shutdown', 'connection_error', 'error'] as const
export type LifecycleEvent = (typeof LIFECYCLE_EVENTS)[number]

/**
 * startup / shutdown / connection_error are called without arguments.
 * error receives the error and, when it came from a handler, the message being processed.
 */
export type LifecycleHandler = (error?: Error, message?: Message) => Awaitable<void>
