import { errorMessage, fail, succeed } from '../lib/errors'
import type { Outcome } from '../lib/errors'
import { getLogger } from '../lib/logger'
import type { SourceDescriptor, SourceReference } from '../models/Job'
import type { TempFileStore, TemporaryArtifact } from '../utils/tempFileStore'
import { sanitizeFilename } from '../utils/sanitizeFilename'

const log = getLogger('worker')

const MEGABYTE = 1024 * 1024

/** Something that can write the remote video to a local path. */
export interface SourceTransport {
  download(source: SourceDescriptor, destinationPath: string): Promise<void>
}

export interface SourceFetcherOptions {
  standard: SourceTransport
  /** Present only when the large-file client initialized at startup. */
  large?: SourceTransport
  /** Hard cap of the standard transport. */
  standardMaxBytes: number
}

export interface IncomingVideo {
  reference: SourceReference
  sizeBytes: number
  fileName?: string
}

export function formatMegabytes(bytes: number): string {
  return (bytes / MEGABYTE).toFixed(1)
}

export function describeSource(video: IncomingVideo, standardMaxBytes: number): SourceDescriptor {
  return {
    reference: video.reference,
    sizeBytes: video.sizeBytes,
    fileName: sanitizeFilename(video.fileName),
    strategy: video.sizeBytes > standardMaxBytes ? 'large' : 'standard',
  }
}

/** Materializes the remote video as a local artifact, using the strategy on the descriptor. */
export class SourceFetcher {
  constructor(
    private readonly store: TempFileStore,
    private readonly options: SourceFetcherOptions
  ) {}

  get largeAvailable(): boolean {
    return this.options.large !== undefined
  }

  get standardMaxBytes(): number {
    return this.options.standardMaxBytes
  }

  async fetch(source: SourceDescriptor, owner: string): Promise<Outcome<TemporaryArtifact>> {
    let transport: SourceTransport
    if (source.strategy === 'large') {
      if (!this.options.large) {
        return fail(
          'LargePathUnavailable',
          `This video is ${formatMegabytes(source.sizeBytes)}MB and large-file downloads are not enabled on this bot`
        )
      }
      transport = this.options.large
    } else {
      if (source.sizeBytes > this.options.standardMaxBytes) {
        return fail(
          'TransportUnavailable',
          `This video is ${formatMegabytes(source.sizeBytes)}MB; the limit is ${formatMegabytes(this.options.standardMaxBytes)}MB`
        )
      }
      transport = this.options.standard
    }

    const artifact = await this.store.allocate('.mp4', owner)
    try {
      await transport.download(source, artifact.path)
    } catch (err) {
      log.error({ msg: 'Download failed', owner, strategy: source.strategy, err: errorMessage(err) })
      try {
        await this.store.release(artifact)
      } catch (releaseErr) {
        // Left for the stale-file sweep
        log.error({ msg: 'Could not remove partial download', owner, err: errorMessage(releaseErr) })
      }
      return fail('DownloadError', `Could not download the video: ${errorMessage(err)}`)
    }

    log.info({ msg: 'Downloaded source', owner, strategy: source.strategy, sizeMb: formatMegabytes(source.sizeBytes) })
    return succeed(artifact)
  }
}
