import fs from 'fs'
import { PipelineError, fail, succeed } from '../lib/errors'
import type { Outcome } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import type { TempFileStore, TemporaryArtifact } from '../utils/tempFileStore'
import type { ResolutionProfile } from './resolutions'

const log = getLogger('worker')

export interface EncodeJob {
  inputPath: string
  outputPath: string
  profile: ResolutionProfile
}

export type EngineExit = { ok: true } | { ok: false; diagnostic: string }

/** A running engine invocation. `exited` never rejects. */
export interface EngineProcess {
  readonly exited: Promise<EngineExit>
  kill(): void
}

export type EngineLauncher = (job: EncodeJob) => EngineProcess

const TIMED_OUT = Symbol('timed-out')

async function hasContent(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath)
    return stats.isFile() && stats.size > 0
  } catch {
    return false
  }
}

/**
 * Runs the engine once per (input, profile) under a wall-clock limit. No retries.
 * The output artifact goes to the caller only on success; every other path releases it.
 */
export class TranscodeInvoker {
  constructor(
    private readonly store: TempFileStore,
    private readonly launch: EngineLauncher
  ) {}

  async convert(
    input: TemporaryArtifact,
    profile: ResolutionProfile,
    timeLimitMs: number,
    owner: string = input.owner
  ): Promise<Outcome<TemporaryArtifact>> {
    const output = await this.store.allocate(`_${profile.label}.mp4`, owner)
    let handedOver = false
    let timer: NodeJS.Timeout | undefined
    const startedAt = Date.now()

    try {
      const engine = this.launch({ inputPath: input.path, outputPath: output.path, profile })
      const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
        timer = setTimeout(() => resolve(TIMED_OUT), timeLimitMs)
      })

      const exit = await Promise.race([engine.exited, deadline])

      if (exit === TIMED_OUT) {
        engine.kill()
        await engine.exited
        log.warn({ msg: 'Transcode timed out', label: profile.label, timeLimitMs })
        return fail('Timeout', `Converting to ${profile.label} took longer than ${Math.round(timeLimitMs / 1000)}s`)
      }

      if (!exit.ok) {
        const error = new PipelineError('EngineError', `Engine failed for ${profile.label}`, exit.diagnostic)
        log.error({ msg: 'Transcode failed', label: profile.label, diagnostic: error.diagnostic })
        return { ok: false, error }
      }

      if (!(await hasContent(output.path))) {
        log.error({ msg: 'Engine produced no output', label: profile.label })
        return fail('EngineProducedNoOutput', `Engine produced no output for ${profile.label}`)
      }

      handedOver = true
      log.info({
        msg: 'Transcode finished',
        label: profile.label,
        output: redactFilePath(output.path),
        durationMs: Date.now() - startedAt,
      })
      return succeed(output)
    } finally {
      clearTimeout(timer)
      if (!handedOver) await this.store.release(output)
    }
  }
}
