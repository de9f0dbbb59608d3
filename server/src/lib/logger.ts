/**
 * Structured JSON logger for the bot and the job worker. Single format: level, timestamp, service, env, release, jobId/userId.
 * Redacts credentials. Use LOG_LEVEL=debug only when needed; tests run with LOG_LEVEL=silent.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'info'

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'token',
  'botToken',
  'apiHash',
  'authorization',
  '*.botToken',
  '*.apiHash',
  'BOT_TOKEN',
  'TELEGRAM_API_HASH',
  'SENTRY_DSN',
]

export type ServiceName = 'bot' | 'worker'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger carrying jobId and userId (for worker job context). */
export function withJobContext(jobId: string, userId?: number): pino.Logger {
  return getLogger('worker').child({ jobId, userId })
}

/** Redact a path for safe logging: keep basename only. */
export function redactFilePath(path: string): string {
  if (!path) return '[REDACTED]'
  const parts = path.replace(/\\/g, '/').split('/')
  return parts[parts.length - 1] || '[REDACTED]'
}
