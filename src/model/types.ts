import type { SentMessage } from './sentMessage.js'

export interface SendOptions {
  text?: string
  imageUrl?: string
  /** Id of the message being replied to */
  replyTo?: string
}

/**
 * Outbound operations a message needs to reply, edit or delete.
 * Failures resolve to null/false; nothing is retried.
 */
export interface MessageActions {
  sendMessage(options: SendOptions): Promise<SentMessage | null>
  editMessage(target: SentMessage | string, text: string): Promise<boolean>
  deleteMessage(target: SentMessage | string): Promise<boolean>
  uploadFile(localPath: string): Promise<string | null>
}
