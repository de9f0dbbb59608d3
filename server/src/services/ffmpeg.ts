import ffmpeg from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import fs from 'fs'
import { DIAGNOSTIC_MAX_CHARS } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import type { ResolutionProfile } from './resolutions'
import type { EncodeJob, EngineExit, EngineLauncher, EngineProcess } from './transcoder'

const log = getLogger('worker')

export interface EncodeSettings {
  /** x264 preset, e.g. "fast" or "medium". */
  preset: string
  threads: string
}

export const DEFAULT_ENCODE_SETTINGS: EncodeSettings = {
  preset: 'fast',
  threads: '4',
}

// Explicit paths: use env in Docker (e.g. /usr/bin/ffmpeg) if the file exists, else npm installer
export function resolveFfmpegPath(envPath: string | undefined, fallback: string = ffmpegInstaller.path): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return fallback
}

export function configureFfmpeg(envPath: string | undefined): string {
  const ffmpegPath = resolveFfmpegPath(envPath)
  ffmpeg.setFfmpegPath(ffmpegPath)
  log.info({ msg: 'ffmpeg configured', ffmpegPath })
  return ffmpegPath
}

/**
 * Output options for one rendition: lanczos scale to the profile size, x264 capped at the profile bitrate
 * with a buffer of twice the cap, stereo AAC, faststart for streaming playback.
 */
export function buildEncodeOptions(profile: ResolutionProfile, settings: EncodeSettings = DEFAULT_ENCODE_SETTINGS): string[] {
  return [
    '-vf', `scale=${profile.width}:${profile.height}:flags=lanczos`,
    '-c:v', 'libx264',
    '-preset', settings.preset,
    '-crf', String(profile.crf),
    '-maxrate', `${profile.maxBitrateKbps}k`,
    '-bufsize', `${profile.maxBitrateKbps * 2}k`,
    '-c:a', 'aac',
    '-b:a', `${profile.audioBitrateKbps}k`,
    '-ac', '2',
    '-movflags', '+faststart',
    '-threads', settings.threads,
  ]
}

/**
 * Diagnostic for a failed run: the end of ffmpeg's stderr first (the banner comes first and the error last),
 * then fluent-ffmpeg's message. Temp paths are cut to their basename.
 */
export function engineDiagnostic(job: EncodeJob, err: Error, stderr: string | null): string {
  const redact = (text: string) =>
    text
      .split(job.inputPath)
      .join(redactFilePath(job.inputPath))
      .split(job.outputPath)
      .join(redactFilePath(job.outputPath))
  const message = redact(err.message)
  const tail = stderr ? redact(stderr.trim()).slice(-DIAGNOSTIC_MAX_CHARS) : ''
  return tail ? `${tail}\n${message}` : message
}

/**
 * Launch ffmpeg for one rendition. The returned process settles exactly once; kill() sends SIGKILL.
 * fluent-ffmpeg spawns the child asynchronously, so a kill that arrives before 'start' is applied on 'start'.
 */
export function createFfmpegLauncher(settings: EncodeSettings = DEFAULT_ENCODE_SETTINGS): EngineLauncher {
  return (job: EncodeJob): EngineProcess => {
    let settle: (exit: EngineExit) => void = () => undefined
    const exited = new Promise<EngineExit>((resolve) => {
      settle = resolve
    })
    let killRequested = false

    const cmd = ffmpeg(job.inputPath)
      .outputOptions(buildEncodeOptions(job.profile, settings))
      .on('start', (commandLine: string) => {
        log.debug({ msg: 'ffmpeg started', label: job.profile.label, commandLine })
        if (killRequested) cmd.kill('SIGKILL')
      })
      .on('end', () => {
        settle({ ok: true })
      })
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        settle({ ok: false, diagnostic: engineDiagnostic(job, err, stderr) })
      })

    cmd.save(job.outputPath)

    return {
      exited,
      kill: () => {
        killRequested = true
        cmd.kill('SIGKILL')
      },
    }
  }
}
