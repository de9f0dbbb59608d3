import fs from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { isErrnoException } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import { assertPathWithinDir } from './assertPathWithinDir'

const log = getLogger('worker')

export const DEFAULT_FILE_PREFIX = 'rcb-'

const MAX_ALLOCATE_ATTEMPTS = 5

export interface TemporaryArtifact {
  readonly path: string
  /** Job id (or other token) of whoever created it. */
  readonly owner: string
}

/** Keep suffixes to a plain extension-like shape so they cannot escape the store directory. */
function safeSuffix(suffix: string): string {
  return suffix.replace(/[^a-zA-Z0-9._-]/g, '')
}

/**
 * Temporary files for downloads and encoder output, all under one directory.
 * Tracks which artifacts are live so stale-file sweeps never touch a file a job still owns.
 */
export class TempFileStore {
  private readonly live = new Map<string, TemporaryArtifact>()

  constructor(
    readonly dir: string,
    private readonly prefix: string = DEFAULT_FILE_PREFIX
  ) {}

  async allocate(suffix: string, owner: string): Promise<TemporaryArtifact> {
    await fs.promises.mkdir(this.dir, { recursive: true })
    for (let attempt = 0; attempt < MAX_ALLOCATE_ATTEMPTS; attempt++) {
      const filePath = path.join(this.dir, `${this.prefix}${uuidv4()}${safeSuffix(suffix)}`)
      try {
        const handle = await fs.promises.open(filePath, 'wx')
        await handle.close()
      } catch (err) {
        if (isErrnoException(err) && err.code === 'EEXIST') continue
        throw err
      }
      const artifact: TemporaryArtifact = { path: filePath, owner }
      this.live.set(filePath, artifact)
      return artifact
    }
    throw new Error(`Could not allocate a unique temporary file in ${this.dir}`)
  }

  /**
   * Delete an artifact. Safe to call twice, or for a file that was never written.
   * Returns true when the artifact was live before this call.
   */
  async release(artifact: TemporaryArtifact): Promise<boolean> {
    assertPathWithinDir(this.dir, artifact.path)
    const wasLive = this.live.delete(artifact.path)
    await fs.promises.rm(artifact.path, { force: true })
    if (wasLive) log.debug({ msg: 'Released temp file', file: redactFilePath(artifact.path), owner: artifact.owner })
    return wasLive
  }

  isLive(artifact: TemporaryArtifact): boolean {
    return this.live.has(artifact.path)
  }

  liveArtifacts(): TemporaryArtifact[] {
    return [...this.live.values()]
  }

  /** Remove our own files older than maxAgeMs that no job owns (left behind by a crashed process). */
  async sweepStale(maxAgeMs: number, now: number = Date.now()): Promise<number> {
    let files: string[]
    try {
      files = await fs.promises.readdir(this.dir)
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return 0
      throw err
    }

    let deletedCount = 0
    for (const file of files) {
      if (!file.startsWith(this.prefix)) continue
      const filePath = path.join(this.dir, file)
      if (this.live.has(filePath)) continue
      try {
        const stats = await fs.promises.lstat(filePath)
        if (stats.isSymbolicLink() || !stats.isFile()) continue
        if (now - stats.mtimeMs > maxAgeMs) {
          await fs.promises.rm(filePath, { force: true })
          deletedCount++
        }
      } catch (err) {
        log.error({ msg: 'Error cleaning up temp file', file, err })
      }
    }

    if (deletedCount > 0) {
      log.info({ msg: 'Temp file sweep', deletedCount })
    }
    return deletedCount
  }

  /** Sweep now and then every intervalMs. Returns a stop function. */
  startSweeper(intervalMs: number, maxAgeMs: number): () => void {
    const run = () => {
      this.sweepStale(maxAgeMs).catch((err) => log.error({ msg: 'Temp file sweep failed', err }))
    }
    run()
    const timer = setInterval(run, intervalMs)
    timer.unref()
    return () => clearInterval(timer)
  }
}
