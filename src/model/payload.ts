/**
 * Wire payload schemas
 *
 * Every field may be absent, null or of the wrong type; such fields parse to
 * null and the model substitutes empty values. Ids are coerced to strings.
 * Only a poll update's timestamp is required.
 */

import { z } from 'zod'

const idField = z.coerce.string().nullish()

const messageFieldsSchema = z.object({
  id: idField,
  timestamp: z.number().nullish().catch(null),
  text: z.string().nullish().catch(null),
  author_id: idField,
  username: z.string().nullish().catch(null),
})

export type RawMessagePayload = z.infer<typeof messageFieldsSchema> & {
  replyToMessage?: RawMessagePayload | null
}

// 输入类型为 unknown：.catch() 接受任意输入
export const rawMessageSchema: z.ZodType<RawMessagePayload, z.ZodTypeDef, unknown> =
  messageFieldsSchema.extend({
    replyToMessage: z
      .lazy(() => rawMessageSchema)
      .nullish()
      .catch(null),
  })

/** A single poll update; the cursor advances on its timestamp */
export const updateSchema = z.intersection(rawMessageSchema, z.object({ timestamp: z.number() }))
export type RawUpdate = z.infer<typeof updateSchema>

/** Poll response envelope; items are validated one by one */
export const updateListSchema = z.array(z.unknown())

export const sentMessagePayloadSchema = z.object({
  id: idField,
  timestamp: z.number().nullish(),
})
export type SentMessagePayload = z.infer<typeof sentMessagePayloadSchema>

export const uploadResponseSchema = z.object({
  file_url: z.string(),
})
