import { Markup, Telegraf } from 'telegraf'
import type { Context, Telegram } from 'telegraf'
import { PipelineError, errorMessage } from '../lib/errors'
import { getLogger } from '../lib/logger'
import type { DeliveryChannel, UserId } from '../models/Job'
import type { IncomingVideo, SourceTransport } from '../services/sourceFetcher'
import { describeSource, formatMegabytes } from '../services/sourceFetcher'
import { describeFailure, formatFinalStatus } from '../services/progressReporter'
import { ALL_RESOLUTIONS_CHOICE, RESOLUTION_LABELS, lookupResolution } from '../services/resolutions'
import type { VideoIntake } from '../services/intake'
import { downloadVideoFromURL } from '../services/video'
import type { SourceDescriptor } from '../models/Job'
import type { TemporaryArtifact } from '../utils/tempFileStore'
import type { JobCoordinator } from '../workers/jobCoordinator'

const log = getLogger('bot')

const CALLBACK_PREFIX = 'res_'

/** Standard path: Bot API file link, streamed to disk. */
export class BotApiTransport implements SourceTransport {
  constructor(private readonly telegram: Telegram) {}

  async download(source: SourceDescriptor, destinationPath: string): Promise<void> {
    const link = await this.telegram.getFileLink(source.reference.fileId)
    await downloadVideoFromURL(link.href, destinationPath)
  }
}

/** Outbound messages. One progress message per user, edited in place and removed at the end. */
export class TelegramDelivery implements DeliveryChannel {
  private readonly progressMessages = new Map<UserId, number>()

  constructor(private readonly telegram: Telegram) {}

  async sendResult(userId: UserId, artifact: TemporaryArtifact, caption: string): Promise<void> {
    await this.telegram.sendVideo(userId, { source: artifact.path }, { caption, supports_streaming: true })
  }

  async reportProgress(userId: UserId, text: string): Promise<void> {
    const messageId = this.progressMessages.get(userId)
    if (messageId === undefined) {
      const message = await this.telegram.sendMessage(userId, text)
      this.progressMessages.set(userId, message.message_id)
      return
    }
    await this.telegram.editMessageText(userId, messageId, undefined, text)
  }

  async reportError(userId: UserId, text: string): Promise<void> {
    await this.telegram.sendMessage(userId, text)
  }

  async reportFinalStatus(
    userId: UserId,
    successCount: number,
    totalRequested: number,
    delivered: readonly string[]
  ): Promise<void> {
    const messageId = this.progressMessages.get(userId)
    this.progressMessages.delete(userId)
    if (messageId !== undefined) {
      try {
        await this.telegram.deleteMessage(userId, messageId)
      } catch (err) {
        log.warn({ msg: 'Could not delete progress message', userId, err: errorMessage(err) })
      }
    }
    await this.telegram.sendMessage(userId, formatFinalStatus(successCount, totalRequested, delivered))
  }
}

export interface BotHandlerDeps {
  intake: VideoIntake
  coordinator: Pick<JobCoordinator, 'activeJobs'>
  standardMaxBytes: number
  largeAvailable: boolean
}

function resolutionKeyboard() {
  const buttons = RESOLUTION_LABELS.map((label) => Markup.button.callback(label, `${CALLBACK_PREFIX}${label}`))
  return Markup.inlineKeyboard([
    buttons.slice(0, 3),
    buttons.slice(3),
    [Markup.button.callback('🎯 All Resolutions', `${CALLBACK_PREFIX}${ALL_RESOLUTIONS_CHOICE}`)],
  ])
}

function welcomeText(deps: BotHandlerDeps): string {
  const sizes = RESOLUTION_LABELS.map((label) => {
    const profile = lookupResolution(label)
    return profile ? `• ${label} (${profile.width}x${profile.height})` : `• ${label}`
  }).join('\n')
  const limit = deps.largeAvailable
    ? `Videos above ${formatMegabytes(deps.standardMaxBytes)}MB use the large-file path.`
    : `Max file size: ${formatMegabytes(deps.standardMaxBytes)}MB`
  return (
    '🎬 Video Resolution Converter\n\n' +
    "Send me a video and I'll convert it to the resolutions you pick.\n\n" +
    `Supported resolutions:\n${sizes}\n\n` +
    `${limit}\n\n` +
    'Just send your video to start! 📹'
  )
}

const HELP_TEXT =
  'Commands:\n' +
  '/start - Start the bot\n' +
  '/help - Show this help message\n' +
  '/status - Check bot status\n\n' +
  'How to use:\n' +
  '1. Send a video file\n' +
  '2. Choose which resolutions you want\n' +
  '3. Wait for processing (may take a few minutes)\n' +
  '4. Download your converted videos'

async function offerResolutions(ctx: Context, chatId: number, video: IncomingVideo, deps: BotHandlerDeps): Promise<void> {
  const source = describeSource(video, deps.standardMaxBytes)
  const offer = deps.intake.onVideoReceived(chatId, source)
  if (!offer.accepted) {
    await ctx.reply(describeFailure(offer.error))
    return
  }
  await ctx.reply(
    `📹 Video received!\n\nFile: ${source.fileName}\nSize: ${formatMegabytes(source.sizeBytes)}MB\n\nChoose which resolution(s) you want:`,
    resolutionKeyboard()
  )
}

export function registerBotHandlers(bot: Telegraf, deps: BotHandlerDeps): void {
  bot.start((ctx) => ctx.reply(welcomeText(deps)))
  bot.help((ctx) => ctx.reply(HELP_TEXT))
  bot.command('status', (ctx) =>
    ctx.reply(
      '🟢 Bot status: online\n\n' +
        `Processing: ${deps.coordinator.activeJobs} active\n` +
        `Standard limit: ${formatMegabytes(deps.standardMaxBytes)}MB\n` +
        `Large files: ${deps.largeAvailable ? 'enabled' : 'disabled'}`
    )
  )

  bot.on('video', async (ctx) => {
    const { video, chat, message_id: messageId } = ctx.message
    await offerResolutions(
      ctx,
      chat.id,
      {
        reference: { fileId: video.file_id, chatId: chat.id, messageId },
        sizeBytes: video.file_size ?? 0,
        fileName: video.file_name,
      },
      deps
    )
  })

  bot.on('document', async (ctx) => {
    const { document, chat, message_id: messageId } = ctx.message
    if (!document.mime_type?.startsWith('video/')) {
      await ctx.reply('❌ Please send a video file!')
      return
    }
    await offerResolutions(
      ctx,
      chat.id,
      {
        reference: { fileId: document.file_id, chatId: chat.id, messageId },
        sizeBytes: document.file_size ?? 0,
        fileName: document.file_name,
      },
      deps
    )
  })

  bot.action(new RegExp(`^${CALLBACK_PREFIX}(.+)$`), async (ctx) => {
    await ctx.answerCbQuery()
    const chatId = ctx.chat?.id
    if (chatId === undefined) return
    const choice = ctx.match[1]

    try {
      const submission = deps.intake.onResolutionChosen(chatId, choice)
      if (!submission.admitted) {
        await ctx.editMessageText(describeFailure(submission.error))
        return
      }
      const target = choice === ALL_RESOLUTIONS_CHOICE ? 'All resolutions' : choice
      await ctx.editMessageText(`🚀 Processing started\n\nTarget: ${target}\n\nThis may take a few minutes... ⏳`)
    } catch (err) {
      if (!(err instanceof PipelineError)) throw err
      await ctx.editMessageText(describeFailure(err))
    }
  })

  bot.catch((err, ctx) => {
    log.error({ msg: 'Bot handler error', updateType: ctx.updateType, err: errorMessage(err) })
  })
}
