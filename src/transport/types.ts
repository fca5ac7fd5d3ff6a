import type { Result } from '../shared/result.js'
import type { BotError } from '../shared/error.js'
import type { RawUpdate, SentMessagePayload } from '../model/payload.js'
import type { SendOptions } from '../model/types.js'

/** Outcome of one long-poll request */
export type PollResult =
  | { kind: 'ok'; updates: RawUpdate[] }
  | { kind: 'unauthorized' }
  | { kind: 'server-error'; status: number; body: string }
  | { kind: 'timeout' }
  | { kind: 'connection-failure'; error: Error }

export type PollResultKind = PollResult['kind']

/**
 * Authenticated request/response operations against the bot endpoint.
 * No state beyond credentials.
 */
export interface Transport {
  /** Updates with timestamp greater than `after`, ascending */
  fetchUpdates(after: number, timeoutSeconds: number): Promise<PollResult>
  send(options: SendOptions): Promise<Result<SentMessagePayload, BotError>>
  edit(id: string, text: string): Promise<Result<true, BotError>>
  delete(id: string): Promise<Result<true, BotError>>
  /** Resolves to the hosted URL of the uploaded file */
  uploadFile(localPath: string): Promise<Result<string, BotError>>
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>
