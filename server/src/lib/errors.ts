/**
 * Failure taxonomy for the job pipeline. Fallible steps return an Outcome instead of throwing,
 * so the coordinator can tell a per-resolution failure from a fault.
 */

export type FailureKind =
  | 'AlreadyProcessing'
  | 'TransportUnavailable'
  | 'LargePathUnavailable'
  | 'DownloadError'
  | 'EngineError'
  | 'EngineProducedNoOutput'
  | 'Timeout'
  | 'DeliveryError'
  | 'UnknownResolution'
  | 'SourceMissing'
  | 'InternalError'

/** Max characters of engine output kept on an error (bounds log size). */
export const DIAGNOSTIC_MAX_CHARS = 200

export class PipelineError extends Error {
  readonly kind: FailureKind
  readonly diagnostic?: string

  constructor(kind: FailureKind, message: string, diagnostic?: string) {
    super(message)
    this.name = 'PipelineError'
    this.kind = kind
    if (diagnostic !== undefined) this.diagnostic = truncateDiagnostic(diagnostic)
  }
}

export type Failure = { ok: false; error: PipelineError }

export type Outcome<T> = { ok: true; value: T } | Failure

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value }
}

export function fail(kind: FailureKind, message: string, diagnostic?: string): Failure {
  return { ok: false, error: new PipelineError(kind, message, diagnostic) }
}

export function truncateDiagnostic(text: string): string {
  return text.length > DIAGNOSTIC_MAX_CHARS ? text.slice(0, DIAGNOSTIC_MAX_CHARS) : text
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

/** Wrap anything thrown into a PipelineError, keeping an existing kind. */
export function toPipelineError(err: unknown, fallback: FailureKind = 'InternalError'): PipelineError {
  if (err instanceof PipelineError) return err
  return new PipelineError(fallback, errorMessage(err))
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}
