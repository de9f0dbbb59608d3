import type { PipelineError } from '../lib/errors'
import { errorMessage } from '../lib/errors'
import { getLogger } from '../lib/logger'
import type { DeliveryChannel, ProgressEvent, ProgressListener, SourceDescriptor, UserId } from '../models/Job'
import { formatMegabytes } from './sourceFetcher'
import type { ResolutionProfile } from './resolutions'

const log = getLogger('bot')

export function resultCaption(source: SourceDescriptor, profile: ResolutionProfile): string {
  return `🎬 ${profile.label} version\n\nOriginal: ${source.fileName} (${formatMegabytes(source.sizeBytes)}MB)`
}

/** Closing message of a job: how many renditions arrived, and which. */
export function formatFinalStatus(successCount: number, totalRequested: number, delivered: readonly string[]): string {
  if (successCount === 0) {
    return '❌ Processing failed\n\nUnable to convert your video.'
  }
  const sent = delivered.length > 0 ? `\nSent: ${delivered.join(', ')}` : ''
  return `✅ Processing complete!\n\nConverted ${successCount} of ${totalRequested} resolution(s).${sent}`
}

/** User-facing text for a failure, with what to do about it. */
export function describeFailure(error: PipelineError): string {
  switch (error.kind) {
    case 'AlreadyProcessing':
      return '⚠️ Already processing a video for you. Please wait for it to finish.'
    case 'TransportUnavailable':
      return `❌ File too large. ${error.message}. Please compress your video or send a shorter clip.`
    case 'LargePathUnavailable':
      return `❌ ${error.message}. Please send a smaller video or a shorter clip.`
    case 'DownloadError':
      return '❌ Could not download your video. Please send it again.'
    case 'Timeout':
      return `❌ ${error.message}. Try a lower resolution or a shorter clip.`
    case 'EngineError':
    case 'EngineProducedNoOutput':
      return '❌ The video could not be converted. Please try a different file.'
    case 'DeliveryError':
      return '⚠️ A converted video could not be sent.'
    case 'UnknownResolution':
      return `❌ ${error.message}.`
    case 'SourceMissing':
      return '❌ Video data not found. Please send the video again.'
    case 'InternalError':
      return '❌ Error processing your video. Please try again.'
  }
}

function resolutionFailureText(label: string, error: PipelineError): string {
  return error.kind === 'Timeout'
    ? `❌ Failed to convert to ${label}: it took too long.`
    : `❌ Failed to convert to ${label}.`
}

/**
 * Turns coordinator events into outbound messages. Calls for one user run strictly in event order;
 * a failed call is logged and does not hold up the next one.
 */
export class ProgressReporter implements ProgressListener {
  private readonly chains = new Map<UserId, Promise<void>>()

  constructor(private readonly channel: DeliveryChannel) {}

  onProgress(event: ProgressEvent): void {
    switch (event.phase) {
      case 'fetching':
        this.enqueue(event.userId, () => this.channel.reportProgress(event.userId, '📥 Downloading video...'))
        break
      case 'converting':
        this.enqueue(event.userId, () =>
          this.channel.reportProgress(event.userId, `🔄 Converting to ${event.label}... (${event.index + 1}/${event.total})`)
        )
        break
      case 'delivering':
        this.enqueue(event.userId, () =>
          this.channel.reportProgress(event.userId, `📤 Sending ${event.label}... (${event.index + 1}/${event.total})`)
        )
        break
      case 'resolution-failed':
        this.enqueue(event.userId, () =>
          this.channel.reportError(event.userId, resolutionFailureText(event.label, event.error))
        )
        break
      case 'delivery-failed':
        this.enqueue(event.userId, () =>
          this.channel.reportError(event.userId, `⚠️ Converted ${event.label} but could not send it.`)
        )
        break
      case 'aborted':
        this.enqueue(event.userId, () => this.channel.reportError(event.userId, describeFailure(event.error)))
        break
      case 'finished': {
        const { report } = event
        this.enqueue(event.userId, () =>
          this.channel.reportFinalStatus(event.userId, report.successCount, report.totalRequested, report.delivered)
        )
        break
      }
    }
  }

  /** Resolves when everything queued so far (for one user, or for all) has settled. */
  async flush(userId?: UserId): Promise<void> {
    if (userId !== undefined) {
      await this.chains.get(userId)
      return
    }
    await Promise.all([...this.chains.values()])
  }

  private enqueue(userId: UserId, send: () => Promise<void>): void {
    const previous = this.chains.get(userId) ?? Promise.resolve()
    const next: Promise<void> = previous
      .then(send)
      .catch((err) => {
        log.warn({ msg: 'Could not update user', userId, err: errorMessage(err) })
      })
      .then(() => {
        if (this.chains.get(userId) === next) this.chains.delete(userId)
      })
    this.chains.set(userId, next)
  }
}
