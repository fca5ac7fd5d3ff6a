/**
 * 收到的消息
 *
 * 构造即解析：command/args 来自 text，replyTarget 递归解析 replyToMessage。
 * 服务端 payload 是树形结构，不做环检测。
 */

import { Author } from './author.js'
import { parseCommandText } from './parseCommandText.js'
import type { RawMessagePayload } from './payload.js'
import type { SentMessage } from './sentMessage.js'
import type { MessageActions } from './types.js'

export class Message {
  readonly id: string | null
  readonly text: string
  readonly timestamp: number | null
  readonly author: Author
  readonly command: string
  readonly args: readonly string[]
  readonly replyTarget: Message | null

  constructor(
    payload: RawMessagePayload,
    private readonly actions: MessageActions | null = null
  ) {
    this.id = payload.id ?? null
    this.text = (payload.text ?? '').trim()
    this.timestamp = payload.timestamp ?? null
    this.author = new Author(payload)

    const { command, args } = parseCommandText(this.text)
    this.command = command
    this.args = Object.freeze(args)

    this.replyTarget = payload.replyToMessage
      ? new Message(payload.replyToMessage, actions)
      : null
  }

  /** Send a reply to this message; null when nothing was sent */
  async reply(text?: string, imageUrl?: string): Promise<SentMessage | null> {
    if (!this.actions) return null
    return this.actions.sendMessage({
      text,
      imageUrl,
      replyTo: this.id ?? undefined,
    })
  }

  /** Upload a local file and reply with its hosted URL */
  async replyWithFile(localPath: string, text?: string): Promise<SentMessage | null> {
    if (!this.actions) return null
    const url = await this.actions.uploadFile(localPath)
    if (!url) return null
    return this.reply(text, url)
  }

  toString(): string {
    return `<Message from ${this.author.displayName ?? 'unknown'}: ${this.text.slice(0, 20)}>`
  }
}
