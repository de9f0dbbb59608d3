import fs from 'fs'
import os from 'os'
import path from 'path'
import type { DeliveryChannel, SourceDescriptor, UserId } from '../src/models/Job'
import type { ResolutionLabel } from '../src/services/resolutions'
import type { SourceTransport } from '../src/services/sourceFetcher'
import type { EncodeJob, EngineExit, EngineLauncher, EngineProcess } from '../src/services/transcoder'
import type { TemporaryArtifact } from '../src/utils/tempFileStore'

export const MB = 1024 * 1024

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'rcb-test-'))
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true })
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    return (await fs.promises.readdir(dir)).sort()
  } catch {
    return []
  }
}

export function makeSource(overrides: Partial<SourceDescriptor> = {}): SourceDescriptor {
  return {
    reference: { fileId: 'file-1', chatId: 42, messageId: 7 },
    sizeBytes: 30 * MB,
    fileName: 'holiday.mp4',
    strategy: 'standard',
    ...overrides,
  }
}

/** Writes a few bytes to the destination, or fails after writing a partial file. */
export class FakeTransport implements SourceTransport {
  readonly downloads: string[] = []

  constructor(private readonly behavior: 'ok' | 'fail' = 'ok') {}

  async download(source: SourceDescriptor, destinationPath: string): Promise<void> {
    this.downloads.push(source.reference.fileId)
    if (this.behavior === 'fail') {
      await fs.promises.writeFile(destinationPath, 'partial')
      throw new Error('connection reset')
    }
    await fs.promises.writeFile(destinationPath, 'source-bytes')
  }
}

export type EngineBehavior = 'succeed' | 'fail' | 'empty' | 'hang' | 'throw'

/**
 * Engine stand-in. `succeed` writes output after a tick, `fail` exits with a long diagnostic,
 * `empty` exits cleanly without writing, `hang` sleeps for hangMs unless killed, `throw` fails to launch.
 */
export class FakeEngine {
  readonly launched: ResolutionLabel[] = []
  readonly killed: ResolutionLabel[] = []

  constructor(
    private readonly behaviorFor: (label: ResolutionLabel) => EngineBehavior = () => 'succeed',
    private readonly hangMs = 5000
  ) {}

  readonly launcher: EngineLauncher = (job: EncodeJob): EngineProcess => {
    const label = job.profile.label
    this.launched.push(label)
    const behavior = this.behaviorFor(label)
    if (behavior === 'throw') throw new Error(`spawn failed for ${label}`)

    let settle: (exit: EngineExit) => void = () => undefined
    const exited = new Promise<EngineExit>((resolve) => {
      settle = resolve
    })
    let timer: NodeJS.Timeout | undefined

    switch (behavior) {
      case 'succeed':
        timer = setTimeout(() => {
          fs.promises.writeFile(job.outputPath, `encoded-${label}`).then(
            () => settle({ ok: true }),
            (err: Error) => settle({ ok: false, diagnostic: err.message })
          )
        }, 5)
        break
      case 'fail':
        timer = setTimeout(() => settle({ ok: false, diagnostic: `E${'x'.repeat(300)}` }), 5)
        break
      case 'empty':
        timer = setTimeout(() => settle({ ok: true }), 5)
        break
      case 'hang':
        timer = setTimeout(() => {
          fs.promises.writeFile(job.outputPath, 'late').then(
            () => settle({ ok: true }),
            (err: Error) => settle({ ok: false, diagnostic: err.message })
          )
        }, this.hangMs)
        break
    }

    return {
      exited,
      kill: () => {
        this.killed.push(label)
        clearTimeout(timer)
        settle({ ok: false, diagnostic: 'killed with SIGKILL' })
      },
    }
  }
}

export interface DeliveredResult {
  userId: UserId
  fileName: string
  contents: string
  caption: string
}

/** Records outbound calls. `failSendFor` makes sendResult throw for captions containing that label. */
export class FakeDelivery implements DeliveryChannel {
  readonly results: DeliveredResult[] = []
  readonly progress: string[] = []
  readonly errors: string[] = []
  readonly finals: { userId: UserId; successCount: number; totalRequested: number; delivered: string[] }[] = []

  constructor(private readonly failSendFor?: string) {}

  async sendResult(userId: UserId, artifact: TemporaryArtifact, caption: string): Promise<void> {
    if (this.failSendFor && caption.includes(this.failSendFor)) {
      throw new Error('chat not found')
    }
    const contents = await fs.promises.readFile(artifact.path, 'utf8')
    this.results.push({ userId, fileName: path.basename(artifact.path), contents, caption })
  }

  async reportProgress(_userId: UserId, text: string): Promise<void> {
    this.progress.push(text)
  }

  async reportError(_userId: UserId, text: string): Promise<void> {
    this.errors.push(text)
  }

  async reportFinalStatus(
    userId: UserId,
    successCount: number,
    totalRequested: number,
    delivered: readonly string[]
  ): Promise<void> {
    this.finals.push({ userId, successCount, totalRequested, delivered: [...delivered] })
  }
}
