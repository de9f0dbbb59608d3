import { TelegramClient } from 'telegram'
import { StringSession } from 'telegram/sessions'
import { LogLevel } from 'telegram/extensions/Logger'
import type { LargeFileCredentials } from '../config'
import { getLogger } from '../lib/logger'
import type { SourceDescriptor } from '../models/Job'
import type { SourceTransport } from '../services/sourceFetcher'

const log = getLogger('bot')

/**
 * MTProto client logged in as the bot. Downloads files past the Bot API size cap by re-reading the
 * original message and streaming its media to disk.
 */
export class LargeFileClient implements SourceTransport {
  private constructor(private readonly client: TelegramClient) {}

  static async connect(credentials: LargeFileCredentials, botToken: string): Promise<LargeFileClient> {
    const client = new TelegramClient(new StringSession(''), credentials.apiId, credentials.apiHash, {
      connectionRetries: 5,
    })
    client.setLogLevel(LogLevel.ERROR)
    await client.start({ botAuthToken: botToken })
    log.info({ msg: 'Large-file client connected' })
    return new LargeFileClient(client)
  }

  async download(source: SourceDescriptor, destinationPath: string): Promise<void> {
    const { chatId, messageId } = source.reference
    const [message] = await this.client.getMessages(chatId, { ids: [messageId] })
    if (!message || !message.media) {
      throw new Error(`Message ${messageId} has no downloadable media`)
    }
    const written = await this.client.downloadMedia(message, { outputFile: destinationPath })
    if (written === undefined) {
      throw new Error(`Media of message ${messageId} could not be downloaded`)
    }
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect()
  }
}
