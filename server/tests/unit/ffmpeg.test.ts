import ffmpeg from 'fluent-ffmpeg'
import fs from 'fs'
import path from 'path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { PipelineError } from '../../src/lib/errors'
import {
  buildEncodeOptions,
  configureFfmpeg,
  createFfmpegLauncher,
  engineDiagnostic,
  resolveFfmpegPath,
} from '../../src/services/ffmpeg'
import { requireResolution } from '../../src/services/resolutions'
import { TranscodeInvoker } from '../../src/services/transcoder'
import { TempFileStore } from '../../src/utils/tempFileStore'
import { listFiles, makeTempDir, removeDir } from '../helpers'

/** Synthetic test pattern, encoded fast at a small size. */
function makeClip(outputPath: string, seconds: number): Promise<void> {
  return new Promise((resolve, reject) => {
    ffmpeg()
      .input(`testsrc=duration=${seconds}:size=320x240:rate=25`)
      .inputFormat('lavfi')
      .outputOptions(['-c:v', 'libx264', '-preset', 'ultrafast', '-pix_fmt', 'yuv420p'])
      .on('end', () => resolve())
      .on('error', (err: Error) => reject(err))
      .save(outputPath)
  })
}

describe('buildEncodeOptions', () => {
  it('builds the option list for a profile', () => {
    expect(buildEncodeOptions(requireResolution('480p'), { preset: 'fast', threads: '4' })).toEqual([
      '-vf', 'scale=854:480:flags=lanczos',
      '-c:v', 'libx264',
      '-preset', 'fast',
      '-crf', '22',
      '-maxrate', '1500k',
      '-bufsize', '3000k',
      '-c:a', 'aac',
      '-b:a', '128k',
      '-ac', '2',
      '-movflags', '+faststart',
      '-threads', '4',
    ])
  })

  it('passes encoder settings through', () => {
    const options = buildEncodeOptions(requireResolution('144p'), { preset: 'veryfast', threads: '0' })
    expect(options.slice(0, 2)).toEqual(['-vf', 'scale=256:144:flags=lanczos'])
    expect(options[options.indexOf('-preset') + 1]).toBe('veryfast')
    expect(options[options.indexOf('-threads') + 1]).toBe('0')
    expect(options[options.indexOf('-bufsize') + 1]).toBe('400k')
  })
})

describe('resolveFfmpegPath', () => {
  it('falls back when the configured binary does not exist', () => {
    expect(resolveFfmpegPath('/nonexistent/ffmpeg', '/opt/bundled/ffmpeg')).toBe('/opt/bundled/ffmpeg')
    expect(resolveFfmpegPath(undefined, '/opt/bundled/ffmpeg')).toBe('/opt/bundled/ffmpeg')
  })

  it('uses the configured binary when present', () => {
    expect(resolveFfmpegPath(process.execPath, '/opt/bundled/ffmpeg')).toBe(process.execPath)
  })
})

describe('engineDiagnostic', () => {
  const job = {
    inputPath: '/tmp/store/rcb-in.mp4',
    outputPath: '/tmp/store/rcb-out_720p.mp4',
    profile: requireResolution('720p'),
  }

  it('puts the stderr tail first and cuts temp paths to their basename', () => {
    const err = new Error('ffmpeg exited with code 1: /tmp/store/rcb-in.mp4: Invalid data found when processing input')
    const stderr = 'ffmpeg version 6.0\n/tmp/store/rcb-in.mp4: Invalid data found when processing input\n'

    expect(engineDiagnostic(job, err, stderr)).toBe(
      'ffmpeg version 6.0\nrcb-in.mp4: Invalid data found when processing input\n' +
        'ffmpeg exited with code 1: rcb-in.mp4: Invalid data found when processing input'
    )
  })

  it('keeps the end of a long stderr within the diagnostic budget', () => {
    const stderr = `${'banner '.repeat(100)}\nConversion failed!`
    const diagnostic = engineDiagnostic(job, new Error('ffmpeg exited with code 1'), stderr)
    const error = new PipelineError('EngineError', 'Engine failed for 720p', diagnostic)

    expect(error.diagnostic).toHaveLength(200)
    expect(error.diagnostic?.endsWith('\nConversion failed!')).toBe(true)
  })

  it('uses the message alone without stderr', () => {
    expect(engineDiagnostic(job, new Error('Cannot find ffmpeg'), null)).toBe('Cannot find ffmpeg')
  })
})

describe('createFfmpegLauncher', () => {
  let dir: string
  let shortClip: string
  let longClip: string

  beforeAll(async () => {
    configureFfmpeg(undefined)
    dir = await makeTempDir()
    shortClip = path.join(dir, 'short.mp4')
    longClip = path.join(dir, 'long.mp4')
    await makeClip(shortClip, 1)
    await makeClip(longClip, 20)
  }, 60000)

  afterAll(async () => {
    await removeDir(dir)
  })

  it('encodes a rendition', async () => {
    const outputPath = path.join(dir, 'short_144p.mp4')
    const engine = createFfmpegLauncher({ preset: 'ultrafast', threads: '1' })({
      inputPath: shortClip,
      outputPath,
      profile: requireResolution('144p'),
    })

    expect(await engine.exited).toEqual({ ok: true })
    expect((await fs.promises.stat(outputPath)).size).toBeGreaterThan(0)
  }, 30000)

  it('reports a bad input without the temp directory in the diagnostic', async () => {
    const inputPath = path.join(dir, 'not-a-video.mp4')
    await fs.promises.writeFile(inputPath, 'hello')
    const engine = createFfmpegLauncher()({
      inputPath,
      outputPath: path.join(dir, 'bad_144p.mp4'),
      profile: requireResolution('144p'),
    })

    const exit = await engine.exited

    expect(exit.ok).toBe(false)
    if (exit.ok) return
    expect(exit.diagnostic).toContain('not-a-video.mp4')
    expect(exit.diagnostic).not.toContain(dir)
  }, 30000)

  it('kills a run that is stopped before ffmpeg has started', async () => {
    const engine = createFfmpegLauncher()({
      inputPath: longClip,
      outputPath: path.join(dir, 'long_720p.mp4'),
      profile: requireResolution('720p'),
    })
    engine.kill()

    const exit = await engine.exited

    expect(exit.ok).toBe(false)
    if (exit.ok) return
    expect(exit.diagnostic).toContain('SIGKILL')
  }, 30000)

  it('enforces the time limit end to end', async () => {
    const storeDir = path.join(dir, 'store')
    const store = new TempFileStore(storeDir)
    const input = await store.allocate('.mp4', 'job-1')
    await fs.promises.copyFile(longClip, input.path)
    const invoker = new TranscodeInvoker(store, createFfmpegLauncher())

    const startedAt = Date.now()
    const result = await invoker.convert(input, requireResolution('720p'), 5)
    const elapsed = Date.now() - startedAt

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('Timeout')
    expect(elapsed).toBeLessThan(5000)
    await store.release(input)
    expect(await listFiles(storeDir)).toEqual([])
  }, 30000)
})
