/**
 * HTTP transport on the global fetch
 *
 * GET    {base}/updates?after_ts=
 * POST   {base}/send
 * PUT    {base}/edit/:id
 * DELETE {base}/delete/:id
 * POST   {root}/upload   (multipart, field "file")
 */

import { existsSync, openAsBlob } from 'fs'
import { basename } from 'path'
import { createLogger } from '../shared/logger.js'
import { BotError } from '../shared/error.js'
import { ensureError } from '../shared/assertError.js'
import { ok, err, type Result } from '../shared/result.js'
import {
  updateListSchema,
  updateSchema,
  sentMessagePayloadSchema,
  uploadResponseSchema,
  type RawUpdate,
  type SentMessagePayload,
} from '../model/payload.js'
import type { SendOptions } from '../model/types.js'
import type { FetchFn, PollResult, Transport } from './types.js'

const logger = createLogger('transport')

export const API_KEY_HEADER = 'x-api-key'

export interface HttpTransportOptions {
  apiKey: string
  baseUrl: string
  /** Defaults to `<baseUrl without trailing /bot>/upload` */
  uploadUrl?: string
  fetch?: FetchFn
}

/** `http://host/api/bot` → `http://host/api/upload` */
export function deriveUploadUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '').replace(/\/bot$/, '')}/upload`
}

function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  )
}

// undici 把 DNS/拒绝连接/断开都包装成 TypeError('fetch failed')
function isConnectionError(error: unknown): boolean {
  return error instanceof TypeError
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    throw BotError.invalidPayload(`not JSON: ${body.slice(0, 80)}`)
  }
}

/**
 * Items without a numeric timestamp are dropped with a warning; the rest of
 * the batch is still delivered so the cursor can move past the bad item.
 */
function parseUpdates(body: string): RawUpdate[] {
  const list = updateListSchema.safeParse(parseJson(body))
  if (!list.success) {
    throw BotError.invalidPayload('expected an update list')
  }

  const updates: RawUpdate[] = []
  list.data.forEach((item, index) => {
    const result = updateSchema.safeParse(item)
    if (result.success) {
      updates.push(result.data)
      return
    }
    const issue = result.error.issues[0]
    logger.warn(`Skipping update ${index}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`)
  })
  return updates
}

export class HttpTransport implements Transport {
  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly uploadUrl: string
  private readonly fetchFn: FetchFn

  constructor(options: HttpTransportOptions) {
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.uploadUrl = options.uploadUrl ?? deriveUploadUrl(this.baseUrl)
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
  }

  get endpoint(): string {
    return this.baseUrl
  }

  private headers(extra?: Record<string, string>): Record<string, string> {
    return { [API_KEY_HEADER]: this.apiKey, ...extra }
  }

  async fetchUpdates(after: number, timeoutSeconds: number): Promise<PollResult> {
    const url = `${this.baseUrl}/updates?after_ts=${encodeURIComponent(String(after))}`

    let response: Response
    let body: string
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(timeoutSeconds * 1000),
      })
      body = await response.text()
    } catch (error) {
      if (isTimeoutError(error)) return { kind: 'timeout' }
      if (isConnectionError(error)) {
        return { kind: 'connection-failure', error: ensureError(error) }
      }
      throw error
    }

    if (response.status === 403) return { kind: 'unauthorized' }
    if (response.status !== 200) return { kind: 'server-error', status: response.status, body }
    return { kind: 'ok', updates: parseUpdates(body) }
  }

  /**
   * Single request; 200 yields the body, anything else a REQUEST_FAILED error.
   */
  private async call(action: string, url: string, init: RequestInit): Promise<Result<string, BotError>> {
    try {
      const response = await this.fetchFn(url, init)
      const body = await response.text()
      if (response.status !== 200) {
        return err(BotError.requestFailed(action, BotError.serverError(response.status, body)))
      }
      return ok(body)
    } catch (error) {
      return err(BotError.requestFailed(action, error))
    }
  }

  async send(options: SendOptions): Promise<Result<SentMessagePayload, BotError>> {
    const payload: Record<string, string> = {}
    if (options.text) payload.text = options.text
    if (options.imageUrl) payload.imageUrl = options.imageUrl
    if (options.replyTo) payload.replyTo = options.replyTo

    const result = await this.call('Send', `${this.baseUrl}/send`, {
      method: 'POST',
      headers: this.headers({ 'Content-Type': 'application/json' }),
      body: JSON.stringify(payload),
    })
    if (!result.ok) return result

    try {
      const parsed = sentMessagePayloadSchema.safeParse(parseJson(result.value))
      if (!parsed.success) return err(BotError.invalidPayload('unexpected send response'))
      return ok(parsed.data)
    } catch (error) {
      return err(BotError.unknown(error))
    }
  }

  async edit(id: string, text: string): Promise<Result<true, BotError>> {
    const result = await this.call('Edit', `${this.baseUrl}/edit/${encodeURIComponent(id)}`, {
      method: 'PUT',
      headers: this.headers({ 'Content-Type': 'application/json' }),
      body: JSON.stringify({ text }),
    })
    return result.ok ? ok(true as const) : result
  }

  async delete(id: string): Promise<Result<true, BotError>> {
    const result = await this.call('Delete', `${this.baseUrl}/delete/${encodeURIComponent(id)}`, {
      method: 'DELETE',
      headers: this.headers(),
    })
    return result.ok ? ok(true as const) : result
  }

  async uploadFile(localPath: string): Promise<Result<string, BotError>> {
    if (!existsSync(localPath)) return err(BotError.fileNotFound(localPath))

    const form = new FormData()
    try {
      form.append('file', await openAsBlob(localPath), basename(localPath))
    } catch (error) {
      return err(BotError.requestFailed('Upload', error))
    }

    logger.debug(`Uploading ${localPath} to ${this.uploadUrl}`)
    const result = await this.call('Upload', this.uploadUrl, {
      method: 'POST',
      headers: this.headers(),
      body: form,
    })
    if (!result.ok) return result

    try {
      const parsed = uploadResponseSchema.safeParse(parseJson(result.value))
      if (!parsed.success) return err(BotError.invalidPayload('upload response lacks file_url'))
      return ok(parsed.data.file_url)
    } catch (error) {
      return err(BotError.unknown(error))
    }
  }
}
