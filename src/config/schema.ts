import { z } from 'zod'

export const DEFAULT_BASE_URL = 'http://localhost:8080/api/bot'

export const pollingConfigSchema = z.object({
  /** Timeout of the one-shot sync request at startup (seconds) */
  syncTimeoutSeconds: z.number().positive().default(5),
  /** Long-poll request timeout (seconds) */
  pollTimeoutSeconds: z.number().positive().default(25),
  connectionBackoffMs: z.number().nonnegative().default(5000),
  serverErrorBackoffMs: z.number().nonnegative().default(2000),
  loopErrorBackoffMs: z.number().nonnegative().default(1000),
  /** Added to the last synced timestamp so it is not delivered again */
  syncEpsilon: z.number().positive().default(0.000001),
})

export const logConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export const configSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  uploadUrl: z.string().url().optional(),
  polling: pollingConfigSchema.default({}),
  log: logConfigSchema.default({}),
})

export type PollingConfig = z.infer<typeof pollingConfigSchema>
export type LogConfig = z.infer<typeof logConfigSchema>
export type Config = z.infer<typeof configSchema>

/** Config after env overrides, with the key known to be present */
export type ResolvedConfig = Config & { apiKey: string }
