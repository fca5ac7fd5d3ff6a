import type { RawMessagePayload } from './payload.js'

export class Author {
  readonly id: string | null
  readonly displayName: string | null

  constructor(payload: Pick<RawMessagePayload, 'author_id' | 'username'>) {
    this.id = payload.author_id ?? null
    this.displayName = payload.username ?? null
  }

  toString(): string {
    return `<Author ${this.displayName ?? 'unknown'}>`
  }
}
