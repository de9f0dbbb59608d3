import os from 'os'
import path from 'path'
import { z } from 'zod'

const MEGABYTE = 1024 * 1024

/** Unset and blank env vars both mean "use the default". */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional())

const envSchema = z
  .object({
    BOT_TOKEN: z.preprocess(
      blankToUndefined,
      z.string({ required_error: 'BOT_TOKEN is required (get one from @BotFather)' }).trim()
    ),
    TELEGRAM_API_ID: z.preprocess(
      blankToUndefined,
      z.coerce
        .number({ invalid_type_error: 'TELEGRAM_API_ID must be a number' })
        .int('TELEGRAM_API_ID must be an integer')
        .positive('TELEGRAM_API_ID must be greater than 0')
        .optional()
    ),
    TELEGRAM_API_HASH: optionalString,
    PORT: z.preprocess(
      blankToUndefined,
      z.coerce
        .number({ invalid_type_error: 'PORT must be a number' })
        .int('PORT must be an integer')
        .min(0, 'PORT must be between 0 and 65535')
        .max(65535, 'PORT must be between 0 and 65535')
        .default(8080)
    ),
    TEMP_FILE_PATH: optionalString,
    STANDARD_MAX_MB: z.preprocess(
      blankToUndefined,
      z.coerce
        .number({ invalid_type_error: 'STANDARD_MAX_MB must be a number' })
        .positive('STANDARD_MAX_MB must be greater than 0')
        .default(50)
    ),
    TRANSCODE_TIMEOUT_SEC: z.preprocess(
      blankToUndefined,
      z.coerce
        .number({ invalid_type_error: 'TRANSCODE_TIMEOUT_SEC must be a number' })
        .positive('TRANSCODE_TIMEOUT_SEC must be greater than 0')
        .default(600)
    ),
    TEMP_FILE_MAX_AGE_MIN: z.preprocess(
      blankToUndefined,
      z.coerce
        .number({ invalid_type_error: 'TEMP_FILE_MAX_AGE_MIN must be a number' })
        .positive('TEMP_FILE_MAX_AGE_MIN must be greater than 0')
        .default(60)
    ),
    FFMPEG_PATH: optionalString,
    FFMPEG_THREADS: z.preprocess(
      blankToUndefined,
      z.string().regex(/^\d+$/, 'FFMPEG_THREADS must be a whole number').default('4')
    ),
    FFMPEG_PRESET: z.preprocess(
      blankToUndefined,
      z
        .enum(['ultrafast', 'superfast', 'veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow'])
        .default('fast')
    ),
    MAX_UPTIME_MIN: z.preprocess(
      blankToUndefined,
      z.coerce
        .number({ invalid_type_error: 'MAX_UPTIME_MIN must be a number' })
        .positive('MAX_UPTIME_MIN must be greater than 0')
        .optional()
    ),
  })
  .superRefine((data, ctx) => {
    const hasId = data.TELEGRAM_API_ID !== undefined
    const hasHash = data.TELEGRAM_API_HASH !== undefined
    if (hasId !== hasHash) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'TELEGRAM_API_ID and TELEGRAM_API_HASH must be set together',
        path: [hasId ? 'TELEGRAM_API_HASH' : 'TELEGRAM_API_ID'],
      })
    }
  })

export interface LargeFileCredentials {
  apiId: number
  apiHash: string
}

export interface AppConfig {
  botToken: string
  /** null when the large-file path is not configured. */
  largeFile: LargeFileCredentials | null
  port: number
  tempDir: string
  standardMaxBytes: number
  transcodeTimeoutMs: number
  tempFileMaxAgeMs: number
  ffmpeg: {
    path?: string
    threads: string
    preset: string
  }
  /** Graceful shutdown after this long; null means run until stopped. */
  maxUptimeMs: number | null
}

export function loadConfig(customEnv: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(customEnv)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
    throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`)
  }
  const parsed = result.data

  return {
    botToken: parsed.BOT_TOKEN,
    largeFile:
      parsed.TELEGRAM_API_ID !== undefined && parsed.TELEGRAM_API_HASH !== undefined
        ? { apiId: parsed.TELEGRAM_API_ID, apiHash: parsed.TELEGRAM_API_HASH }
        : null,
    port: parsed.PORT,
    tempDir: parsed.TEMP_FILE_PATH ?? path.join(os.tmpdir(), 'resolution-bot'),
    standardMaxBytes: Math.floor(parsed.STANDARD_MAX_MB * MEGABYTE),
    transcodeTimeoutMs: Math.round(parsed.TRANSCODE_TIMEOUT_SEC * 1000),
    tempFileMaxAgeMs: Math.round(parsed.TEMP_FILE_MAX_AGE_MIN * 60 * 1000),
    ffmpeg: {
      path: parsed.FFMPEG_PATH,
      threads: parsed.FFMPEG_THREADS,
      preset: parsed.FFMPEG_PRESET,
    },
    maxUptimeMs: parsed.MAX_UPTIME_MIN !== undefined ? Math.round(parsed.MAX_UPTIME_MIN * 60 * 1000) : null,
  }
}
