import TelegramBot from 'node-telegram-bot-api';
import type { Channel, ChannelCapabilities, MessageFormat } from '../types/channels.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/** Minimum ms between two sends, so multi-chunk letters stay under Telegram's per-chat rate limit. */
const DEFAULT_MIN_SEND_INTERVAL_MS = 1000;

export const TELEGRAM_CAPABILITIES: ChannelCapabilities = {
  supportsBold: true,
  supportsItalic: true,
  supportsCode: true,
  supportsCodeBlocks: true,
  supportsLinks: true,
  supportsButtons: true,
  supportsImages: true,
  supportsFiles: true,
  supportsThreads: false,
  supportsEmojis: true,
  maxMessageLength: 4096,
  supportedFormatTags: ['<b>bold</b>', '<i>italic</i>', '<u>underline</u>', '<code>code</code>', '<pre>codeblock</pre>'],
};

export interface TelegramChannelOptions {
  /** Bot token from @BotFather (TELEGRAM_BOT_TOKEN). */
  token: string;
  /** recipientId → chat id. */
  chatIds?: Record<string, string>;
  /** Chat for recipients without their own entry. */
  defaultChatId?: string | null;
  enabled?: boolean;
  minSendIntervalMs?: number;
}

/**
 * Send-only Telegram channel. Messages go out with `parse_mode: 'HTML'`, so
 * the text must already be Telegram-safe inline HTML.
 */
export class TelegramChannel implements Channel {
  readonly platformId = 'telegram';
  readonly displayName = 'Telegram';
  readonly supportsInteractivity = true;
  readonly preferredFormat: MessageFormat = 'html';
  readonly capabilities = TELEGRAM_CAPABILITIES;
  readonly enabled: boolean;

  readonly #bot: TelegramBot;
  readonly #chatIds: Record<string, string>;
  readonly #defaultChatId: string | null;
  readonly #minSendIntervalMs: number;
  #lastSendAt: number = 0;

  constructor(options: TelegramChannelOptions) {
    this.#bot = new TelegramBot(options.token, { polling: false });
    this.#chatIds = { ...(options.chatIds ?? {}) };
    this.#defaultChatId = options.defaultChatId ?? null;
    this.#minSendIntervalMs = options.minSendIntervalMs ?? DEFAULT_MIN_SEND_INTERVAL_MS;
    this.enabled = (options.enabled ?? true) && options.token.trim().length > 0;
  }

  /** The chat a recipient's letters go to, if any. */
  chatIdFor(recipientId: string): string | null {
    return this.#chatIds[recipientId] ?? this.#defaultChatId;
  }

  canReach(recipientId: string): boolean {
    return this.chatIdFor(recipientId) !== null;
  }

  async send(recipientId: string, text: string): Promise<void> {
    const chatId = this.chatIdFor(recipientId);
    if (chatId === null) {
      throw new Error(`No Telegram chat configured for '${recipientId}'.`);
    }

    await this.#applyRateLimit();
    await this.#bot.sendMessage(chatId, text, {
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      const me = await this.#bot.getMe();
      await logThought(`[TelegramChannel] Connected as @${me.username ?? me.first_name}.`);
      return true;
    } catch (err) {
      console.error('[TelegramChannel] Connection test failed:', errorMessage(err));
      return false;
    }
  }

  async start(): Promise<void> {
    await logThought(`[TelegramChannel] Ready for ${Object.keys(this.#chatIds).length} recipient chat(s).`);
  }

  async stop(): Promise<void> {
    if (this.#bot.isPolling()) {
      await this.#bot.stopPolling();
    }
  }

  // ── Private Helpers ──────────────────────────────────────────────────────────

  async #applyRateLimit(): Promise<void> {
    const elapsed = Date.now() - this.#lastSendAt;
    if (elapsed < this.#minSendIntervalMs) {
      await new Promise<void>((resolve) =>
        setTimeout(resolve, this.#minSendIntervalMs - elapsed),
      );
    }
    this.#lastSendAt = Date.now();
  }
}
