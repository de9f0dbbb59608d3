import './env'
import type { Server } from 'http'
import { Telegraf } from 'telegraf'
import { loadConfig } from './config'
import { errorMessage } from './lib/errors'
import { getLogger } from './lib/logger'
import { flushSentry, initSentry } from './lib/sentry'
import { createHealthApp } from './routes/health'
import { configureFfmpeg, createFfmpegLauncher } from './services/ffmpeg'
import { VideoIntake } from './services/intake'
import { ProgressReporter } from './services/progressReporter'
import { SourceFetcher } from './services/sourceFetcher'
import { TranscodeInvoker } from './services/transcoder'
import { LargeFileClient } from './transport/largeFileClient'
import { BotApiTransport, TelegramDelivery, registerBotHandlers } from './transport/telegramBot'
import { TempFileStore } from './utils/tempFileStore'
import { JobCoordinator } from './workers/jobCoordinator'

initSentry()

const log = getLogger('bot')

/** Stale-file sweep cadence. */
const SWEEP_INTERVAL_MS = 60 * 60 * 1000

async function main(): Promise<void> {
  const config = loadConfig()

  configureFfmpeg(config.ffmpeg.path)
  const store = new TempFileStore(config.tempDir)
  const stopSweeper = store.startSweeper(SWEEP_INTERVAL_MS, config.tempFileMaxAgeMs)

  const bot = new Telegraf(config.botToken)

  // Large-file path is optional: if it cannot start, videos above the standard cap are refused.
  let largeClient: LargeFileClient | undefined
  if (config.largeFile) {
    try {
      largeClient = await LargeFileClient.connect(config.largeFile, config.botToken)
    } catch (err) {
      log.warn({ msg: 'Large-file client unavailable; large videos will be refused', err: errorMessage(err) })
    }
  }

  const fetcher = new SourceFetcher(store, {
    standard: new BotApiTransport(bot.telegram),
    large: largeClient,
    standardMaxBytes: config.standardMaxBytes,
  })
  const delivery = new TelegramDelivery(bot.telegram)
  const coordinator = new JobCoordinator({
    fetcher,
    transcoder: new TranscodeInvoker(
      store,
      createFfmpegLauncher({ preset: config.ffmpeg.preset, threads: config.ffmpeg.threads })
    ),
    delivery,
    store,
    transcodeTimeoutMs: config.transcodeTimeoutMs,
  })
  const reporter = new ProgressReporter(delivery)
  coordinator.subscribe(reporter)

  registerBotHandlers(bot, {
    intake: new VideoIntake(coordinator, { largeAvailable: fetcher.largeAvailable }),
    coordinator,
    standardMaxBytes: config.standardMaxBytes,
    largeAvailable: fetcher.largeAvailable,
  })

  const server: Server = createHealthApp().listen(config.port, () => {
    log.info({ msg: 'Health server listening', port: config.port })
  })
  server.on('error', (error: NodeJS.ErrnoException) => {
    log.fatal({ msg: 'Health server error', code: error.code, err: error.message })
    process.exit(1)
  })

  let shuttingDown = false
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ msg: 'Shutting down', reason, activeJobs: coordinator.activeJobs })
    try {
      bot.stop(reason)
    } catch (err) {
      // Telegraf throws when polling never started
      log.warn({ msg: 'Bot was not running', err: errorMessage(err) })
    }
    stopSweeper()
    await coordinator.drain()
    await reporter.flush()
    if (largeClient) await largeClient.disconnect()
    await new Promise<void>((resolve) => server.close(() => resolve()))
    await flushSentry()
    log.info({ msg: 'Shutdown complete', leftoverFiles: store.liveArtifacts().length })
  }
  const exitAfterShutdown = (reason: string, code = 0) => {
    shutdown(reason)
      .then(() => process.exit(code))
      .catch((err) => {
        log.error({ msg: 'Shutdown failed', err: errorMessage(err) })
        process.exit(1)
      })
  }

  process.once('SIGTERM', () => exitAfterShutdown('SIGTERM'))
  process.once('SIGINT', () => exitAfterShutdown('SIGINT'))

  if (config.maxUptimeMs !== null) {
    const uptimeTimer = setTimeout(() => exitAfterShutdown('max uptime reached'), config.maxUptimeMs)
    uptimeTimer.unref()
  }

  log.info({
    msg: 'Bot starting',
    largeFiles: fetcher.largeAvailable,
    standardMaxMb: config.standardMaxBytes / (1024 * 1024),
    tempDir: config.tempDir,
  })
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    log.fatal({ msg: 'Bot polling stopped', err: errorMessage(err) })
    exitAfterShutdown('bot polling failed', 1)
  })
}

main().catch((err) => {
  log.fatal({ msg: 'Startup failed', err: errorMessage(err) })
  process.exit(1)
})
