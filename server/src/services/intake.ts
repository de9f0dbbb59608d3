import { PipelineError } from '../lib/errors'
import type { SourceDescriptor, UserId } from '../models/Job'
import type { JobCoordinator, Submission } from '../workers/jobCoordinator'
import { parseResolutionChoice, RESOLUTION_LABELS, type ResolutionLabel } from './resolutions'

export type VideoOffer =
  | { accepted: true; source: SourceDescriptor; choices: readonly ResolutionLabel[] }
  | { accepted: false; error: PipelineError }

export interface VideoIntakeOptions {
  /** Whether the large-file transport is up. */
  largeAvailable: boolean
}

/**
 * Inbound side: a received video becomes the user's pending source, and a resolution choice turns it into a job.
 * A pending source is consumed by exactly one admitted job.
 */
export class VideoIntake {
  private readonly pending = new Map<UserId, SourceDescriptor>()

  constructor(
    private readonly coordinator: Pick<JobCoordinator, 'submit' | 'isBusy'>,
    private readonly options: VideoIntakeOptions
  ) {}

  onVideoReceived(userId: UserId, source: SourceDescriptor): VideoOffer {
    if (this.coordinator.isBusy(userId)) {
      return {
        accepted: false,
        error: new PipelineError('AlreadyProcessing', 'A video is already being processed for this user'),
      }
    }
    // The fetcher checks this again.
    if (source.strategy === 'large' && !this.options.largeAvailable) {
      return {
        accepted: false,
        error: new PipelineError('LargePathUnavailable', 'Large-file downloads are not enabled on this bot'),
      }
    }
    this.pending.set(userId, source)
    return { accepted: true, source, choices: RESOLUTION_LABELS }
  }

  /** `choice` is "all" or a single label. Unknown labels throw UnknownResolution. */
  onResolutionChosen(userId: UserId, choice: string): Submission {
    const source = this.pending.get(userId)
    if (!source) {
      return { admitted: false, error: new PipelineError('SourceMissing', 'No pending video for this user') }
    }
    const labels = parseResolutionChoice(choice)
    const submission = this.coordinator.submit({ userId, source, labels })
    if (submission.admitted) this.pending.delete(userId)
    return submission
  }

  hasPending(userId: UserId): boolean {
    return this.pending.has(userId)
  }
}
