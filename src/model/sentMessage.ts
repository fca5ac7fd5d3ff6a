import type { SentMessagePayload } from './payload.js'
import type { MessageActions } from './types.js'

/**
 * A message this process sent successfully. Holds the last text known to be on the server.
 */
export class SentMessage {
  readonly id: string | null
  readonly timestamp: number | null
  private currentText: string | null

  constructor(
    payload: SentMessagePayload,
    private readonly actions: MessageActions,
    initialText: string | null = null
  ) {
    this.id = payload.id ?? null
    this.timestamp = payload.timestamp ?? null
    this.currentText = initialText
  }

  get text(): string | null {
    return this.currentText
  }

  /** Replace the text; the local copy only changes when the server accepted the edit */
  async edit(newText: string): Promise<boolean> {
    const edited = await this.actions.editMessage(this, newText)
    if (edited) this.currentText = newText
    return edited
  }

  delete(): Promise<boolean> {
    return this.actions.deleteMessage(this)
  }

  toString(): string {
    return `<SentMessage ${this.id ?? 'unknown'}>`
  }
}
