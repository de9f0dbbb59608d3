import type pino from 'pino'
import { PipelineError, errorMessage, toPipelineError } from '../lib/errors'
import type { Outcome } from '../lib/errors'
import { withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import {
  createJobId,
  type DeliveryChannel,
  type Job,
  type JobPhase,
  type JobReport,
  type JobRequest,
  type ProgressEvent,
  type ProgressListener,
  type ResolutionFailure,
  type SourceDescriptor,
  type UserId,
} from '../models/Job'
import { resultCaption } from '../services/progressReporter'
import { requireResolution, type ResolutionLabel, type ResolutionProfile } from '../services/resolutions'
import { AdmissionRegistry } from '../utils/admission'
import type { TemporaryArtifact } from '../utils/tempFileStore'

export interface SourceFetching {
  fetch(source: SourceDescriptor, owner: string): Promise<Outcome<TemporaryArtifact>>
}

export interface Transcoding {
  convert(
    input: TemporaryArtifact,
    profile: ResolutionProfile,
    timeLimitMs: number,
    owner: string
  ): Promise<Outcome<TemporaryArtifact>>
}

export interface ArtifactReleasing {
  release(artifact: TemporaryArtifact): Promise<boolean>
}

export interface JobCoordinatorOptions {
  fetcher: SourceFetching
  transcoder: Transcoding
  delivery: Pick<DeliveryChannel, 'sendResult'>
  store: ArtifactReleasing
  /** Wall-clock limit for each engine run. */
  transcodeTimeoutMs: number
  registry?: AdmissionRegistry
  now?: () => Date
}

export type Submission =
  | { admitted: true; jobId: string; done: Promise<JobReport> }
  | { admitted: false; error: PipelineError }

function eventBase(job: Job): { jobId: string; userId: UserId } {
  return { jobId: job.id, userId: job.userId }
}

/**
 * Runs jobs: admission, fetch, one conversion + delivery per requested resolution (in request order), finalizing.
 * One failed resolution never stops the others. Every artifact a job creates is released before it terminates,
 * whatever happened, and the user's admission is always given back.
 */
export class JobCoordinator {
  private readonly registry: AdmissionRegistry
  private readonly listeners = new Set<ProgressListener>()
  private readonly active = new Map<string, Promise<JobReport>>()
  private readonly now: () => Date

  constructor(private readonly options: JobCoordinatorOptions) {
    this.registry = options.registry ?? new AdmissionRegistry()
    this.now = options.now ?? (() => new Date())
  }

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  isBusy(userId: UserId): boolean {
    return this.registry.has(userId)
  }

  get activeJobs(): number {
    return this.active.size
  }

  /**
   * Admit and start a job. Rejects synchronously with AlreadyProcessing when the user has one in flight;
   * throws UnknownResolution for an empty or unknown label list. `done` never rejects.
   */
  submit(request: JobRequest): Submission {
    if (request.labels.length === 0) {
      throw new PipelineError('UnknownResolution', 'Choose at least one resolution')
    }
    const profiles = request.labels.map((label) => requireResolution(label))

    if (!this.registry.tryAdmit(request.userId)) {
      return {
        admitted: false,
        error: new PipelineError('AlreadyProcessing', 'A video is already being processed for this user'),
      }
    }

    const createdAt = this.now()
    const job: Job = {
      id: createJobId(request.userId, createdAt),
      userId: request.userId,
      createdAt,
      source: request.source,
      labels: profiles.map((profile) => profile.label),
      phase: 'admitted',
      artifacts: new Set(),
      successCount: 0,
    }

    const done = this.run(job, profiles)
    this.active.set(job.id, done)
    return { admitted: true, jobId: job.id, done }
  }

  /** Resolves once every job in flight at call time has terminated. */
  async drain(): Promise<void> {
    await Promise.all([...this.active.values()])
  }

  private async run(job: Job, profiles: ResolutionProfile[]): Promise<JobReport> {
    const log = withJobContext(job.id, job.userId)
    const delivered: ResolutionLabel[] = []
    const failures: ResolutionFailure[] = []
    let jobError: PipelineError | undefined

    log.info({ msg: 'Job admitted', labels: job.labels, strategy: job.source.strategy })

    try {
      jobError = await this.process(job, profiles, delivered, failures, log)
    } catch (err) {
      jobError = toPipelineError(err)
      log.error({ msg: 'Job fault', phase: job.phase, err })
      captureJobError(job.id, job.userId, err)
      this.emit({ ...eventBase(job), phase: 'aborted', error: jobError, detail: jobError.message })
    } finally {
      await this.finalize(job, log)
    }

    const report: JobReport = {
      jobId: job.id,
      userId: job.userId,
      status: job.successCount > 0 ? 'succeeded' : 'failed',
      successCount: job.successCount,
      totalRequested: profiles.length,
      delivered,
      failures,
      ...(jobError ? { error: jobError } : {}),
    }

    log.info({
      msg: 'Job finished',
      status: report.status,
      successCount: report.successCount,
      totalRequested: report.totalRequested,
      durationMs: this.now().getTime() - job.createdAt.getTime(),
    })
    this.emit({
      ...eventBase(job),
      phase: 'finished',
      report,
      detail: `${report.successCount}/${report.totalRequested} resolutions converted`,
    })
    this.enter(job, 'terminated')
    return report
  }

  /** Returns the whole-job failure, if any. Per-resolution failures go into `failures`. */
  private async process(
    job: Job,
    profiles: ResolutionProfile[],
    delivered: ResolutionLabel[],
    failures: ResolutionFailure[],
    log: pino.Logger
  ): Promise<PipelineError | undefined> {
    this.enter(job, 'fetching')
    this.emit({ ...eventBase(job), phase: 'fetching', strategy: job.source.strategy, detail: 'Downloading video' })

    const fetched = await this.options.fetcher.fetch(job.source, job.id)
    if (!fetched.ok) {
      log.warn({ msg: 'Fetch failed', kind: fetched.error.kind, reason: fetched.error.message })
      this.emit({ ...eventBase(job), phase: 'aborted', error: fetched.error, detail: fetched.error.message })
      return fetched.error
    }
    const input = fetched.value
    job.artifacts.add(input)

    for (const [index, profile] of profiles.entries()) {
      const output = await this.convertOne(job, input, profile, index, profiles.length, failures, log)
      if (!output) continue
      await this.deliverOne(job, output, profile, index, profiles.length, delivered, log)
    }
    return undefined
  }

  private async convertOne(
    job: Job,
    input: TemporaryArtifact,
    profile: ResolutionProfile,
    index: number,
    total: number,
    failures: ResolutionFailure[],
    log: pino.Logger
  ): Promise<TemporaryArtifact | undefined> {
    this.enter(job, 'converting', index)
    this.emit({
      ...eventBase(job),
      phase: 'converting',
      label: profile.label,
      index,
      total,
      detail: `Converting to ${profile.label} (${index + 1}/${total})`,
    })

    let converted: Outcome<TemporaryArtifact>
    try {
      converted = await this.options.transcoder.convert(input, profile, this.options.transcodeTimeoutMs, job.id)
    } catch (err) {
      log.error({ msg: 'Conversion fault', label: profile.label, err })
      captureJobError(job.id, job.userId, err)
      converted = { ok: false, error: toPipelineError(err) }
    }

    if (!converted.ok) {
      const { error } = converted
      failures.push({ label: profile.label, kind: error.kind, message: error.message })
      log.warn({ msg: 'Resolution failed', label: profile.label, kind: error.kind, diagnostic: error.diagnostic })
      this.emit({ ...eventBase(job), phase: 'resolution-failed', label: profile.label, error, detail: error.message })
      return undefined
    }

    job.artifacts.add(converted.value)
    job.successCount += 1
    return converted.value
  }

  /** The artifact is released right after the delivery call, whether or not delivery worked. */
  private async deliverOne(
    job: Job,
    output: TemporaryArtifact,
    profile: ResolutionProfile,
    index: number,
    total: number,
    delivered: ResolutionLabel[],
    log: pino.Logger
  ): Promise<void> {
    this.enter(job, 'delivering', index)
    this.emit({
      ...eventBase(job),
      phase: 'delivering',
      label: profile.label,
      index,
      total,
      detail: `Sending ${profile.label} (${index + 1}/${total})`,
    })

    try {
      await this.options.delivery.sendResult(job.userId, output, resultCaption(job.source, profile))
      delivered.push(profile.label)
    } catch (err) {
      const error = new PipelineError('DeliveryError', `Could not send ${profile.label}: ${errorMessage(err)}`)
      log.error({ msg: 'Delivery failed', label: profile.label, err: errorMessage(err) })
      this.emit({ ...eventBase(job), phase: 'delivery-failed', label: profile.label, error, detail: error.message })
    } finally {
      await this.releaseOwned(job, output, log)
    }
  }

  private async finalize(job: Job, log: pino.Logger): Promise<void> {
    this.enter(job, 'finalizing')
    try {
      for (const artifact of [...job.artifacts]) {
        await this.releaseOwned(job, artifact, log)
      }
    } finally {
      this.registry.release(job.userId)
      this.active.delete(job.id)
    }
  }

  /** Never throws; an artifact that could not be deleted stays on the job for finalizing to retry. */
  private async releaseOwned(job: Job, artifact: TemporaryArtifact, log: pino.Logger): Promise<void> {
    try {
      await this.options.store.release(artifact)
      job.artifacts.delete(artifact)
    } catch (err) {
      log.error({ msg: 'Could not release temp file', err: errorMessage(err) })
    }
  }

  private enter(job: Job, phase: JobPhase, resolutionIndex?: number): void {
    job.phase = phase
    job.resolutionIndex = resolutionIndex
  }

  private emit(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener.onProgress(event)
      } catch (err) {
        withJobContext(event.jobId, event.userId).error({ msg: 'Progress listener failed', phase: event.phase, err })
      }
    }
  }
}
