/**
 * @entry Message model
 *
 * Author / Message / SentMessage and the wire schemas they are parsed from
 */

export { Author } from './author.js'
export { Message } from './message.js'
export { SentMessage } from './sentMessage.js'
export { parseCommandText, type ParsedCommand } from './parseCommandText.js'
export type { MessageActions, SendOptions } from './types.js'
export {
  type RawMessagePayload,
  type RawUpdate,
  type SentMessagePayload,
  rawMessageSchema,
  updateSchema,
  updateListSchema,
  sentMessagePayloadSchema,
  uploadResponseSchema,
} from './payload.js'
