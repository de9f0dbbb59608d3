/**
 * Sentry for the bot process: errors only. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV or development), RELEASE.
 */
import * as Sentry from '@sentry/node'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined

function isEnabled(): boolean {
  return Boolean(DSN && DSN.trim())
}

export function initSentry(): void {
  if (!isEnabled()) return
  Sentry.init({
    dsn: DSN,
    environment: ENV,
    release: RELEASE,
  })
}

/** Capture an unexpected job fault with jobId/userId tags. */
export function captureJobError(jobId: string, userId: number, err: unknown): void {
  if (!isEnabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('job_id', jobId)
    scope.setTag('user_id', String(userId))
    Sentry.captureException(err)
  })
}

/** Flush pending events before exit. Resolves false on timeout. */
export function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!isEnabled()) return Promise.resolve(true)
  return Sentry.flush(timeoutMs)
}
