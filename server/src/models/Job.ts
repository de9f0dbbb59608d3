import type { PipelineError, FailureKind } from '../lib/errors'
import type { ResolutionLabel } from '../services/resolutions'
import type { TemporaryArtifact } from '../utils/tempFileStore'

/** Chat id of the user on the messaging transport. */
export type UserId = number

export type FetchStrategy = 'standard' | 'large'

/** Where the transport can find the uploaded video again. Opaque to the pipeline. */
export interface SourceReference {
  fileId: string
  chatId: number
  messageId: number
}

export interface SourceDescriptor {
  reference: SourceReference
  sizeBytes: number
  fileName: string
  strategy: FetchStrategy
}

export type JobPhase = 'admitted' | 'fetching' | 'converting' | 'delivering' | 'finalizing' | 'terminated'

export interface Job {
  id: string
  userId: UserId
  createdAt: Date
  source: SourceDescriptor
  labels: ResolutionLabel[]
  phase: JobPhase
  /** Index into labels while converting/delivering. */
  resolutionIndex?: number
  /** Artifacts the job currently owns; emptied during finalizing. */
  artifacts: Set<TemporaryArtifact>
  successCount: number
}

export interface ResolutionFailure {
  label: ResolutionLabel
  kind: FailureKind
  message: string
}

export type JobStatus = 'succeeded' | 'failed'

export interface JobReport {
  jobId: string
  userId: UserId
  status: JobStatus
  successCount: number
  totalRequested: number
  /** Labels handed to delivery, in delivery order. */
  delivered: ResolutionLabel[]
  failures: ResolutionFailure[]
  /** Whole-job failure (fetch or fault), when there was one. */
  error?: PipelineError
}

export interface JobRequest {
  userId: UserId
  source: SourceDescriptor
  labels: readonly string[]
}

interface EventBase {
  jobId: string
  userId: UserId
  detail: string
}

export type ProgressEvent =
  | (EventBase & { phase: 'fetching'; strategy: FetchStrategy })
  | (EventBase & { phase: 'converting'; label: ResolutionLabel; index: number; total: number })
  | (EventBase & { phase: 'delivering'; label: ResolutionLabel; index: number; total: number })
  | (EventBase & { phase: 'resolution-failed'; label: ResolutionLabel; error: PipelineError })
  | (EventBase & { phase: 'delivery-failed'; label: ResolutionLabel; error: PipelineError })
  | (EventBase & { phase: 'aborted'; error: PipelineError })
  | (EventBase & { phase: 'finished'; report: JobReport })

export interface ProgressListener {
  onProgress(event: ProgressEvent): void
}

/** Outbound side of the messaging transport. */
export interface DeliveryChannel {
  sendResult(userId: UserId, artifact: TemporaryArtifact, caption: string): Promise<void>
  reportProgress(userId: UserId, text: string): Promise<void>
  reportError(userId: UserId, text: string): Promise<void>
  reportFinalStatus(
    userId: UserId,
    successCount: number,
    totalRequested: number,
    delivered: readonly ResolutionLabel[]
  ): Promise<void>
}

export function createJobId(userId: UserId, createdAt: Date): string {
  return `${userId}-${createdAt.getTime()}`
}
