import type { Channel, ChannelCapabilities, MessageFormat } from '../types/channels.js';
import { logThought } from '../utils/logger.js';

export const SLACK_CAPABILITIES: ChannelCapabilities = {
  supportsBold: true,
  supportsItalic: true,
  supportsCode: true,
  supportsCodeBlocks: true,
  supportsLinks: true,
  supportsButtons: false,
  supportsImages: true,
  supportsFiles: false,
  supportsThreads: true,
  supportsEmojis: true,
  maxMessageLength: 4000,
  supportedFormatTags: ['*bold*', '_italic_', '`code`', '```codeblock```', '<url|link>'],
};

export interface SlackChannelOptions {
  /** Webhook for recipients without their own entry (SLACK_WEBHOOK_URL). */
  webhookUrl?: string | null;
  /** recipientId → incoming-webhook URL. */
  webhooks?: Record<string, string>;
  enabled?: boolean;
}

/**
 * Slack channel over incoming webhooks. Webhooks can only post, so the
 * channel is not interactive and offers no buttons.
 */
export class SlackChannel implements Channel {
  readonly platformId = 'slack';
  readonly displayName = 'Slack';
  readonly supportsInteractivity = false;
  readonly preferredFormat: MessageFormat = 'markdown';
  readonly capabilities = SLACK_CAPABILITIES;
  readonly enabled: boolean;

  readonly #defaultWebhook: string | null;
  readonly #webhooks: Record<string, string>;

  constructor(options: SlackChannelOptions) {
    const fallback = options.webhookUrl?.trim();
    this.#defaultWebhook = fallback ? fallback : null;
    this.#webhooks = { ...(options.webhooks ?? {}) };
    this.enabled = (options.enabled ?? true)
      && (this.#defaultWebhook !== null || Object.keys(this.#webhooks).length > 0);
  }

  #webhookFor(recipientId: string): string | null {
    return this.#webhooks[recipientId] ?? this.#defaultWebhook;
  }

  canReach(recipientId: string): boolean {
    return this.#webhookFor(recipientId) !== null;
  }

  async send(recipientId: string, text: string): Promise<void> {
    const webhook = this.#webhookFor(recipientId);
    if (webhook === null) {
      throw new Error(`No Slack webhook configured for '${recipientId}'.`);
    }

    const response = await fetch(webhook, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        text,
        mrkdwn: true,
      }),
    });

    if (!response.ok) {
      const detail = (await response.text()).trim();
      throw new Error(`Slack webhook request failed (${response.status}${detail ? `: ${detail}` : ''}).`);
    }
  }

  /** Webhooks have no side-effect-free probe; this checks that every configured URL is well formed. */
  async testConnection(): Promise<boolean> {
    const urls = [...Object.values(this.#webhooks), ...(this.#defaultWebhook ? [this.#defaultWebhook] : [])];
    if (urls.length === 0) return false;

    const invalid = urls.filter((url) => {
      try {
        return new URL(url).protocol !== 'https:';
      } catch {
        return true;
      }
    });
    if (invalid.length > 0) {
      console.error(`[SlackChannel] ${invalid.length} webhook URL(s) are not valid https URLs.`);
      return false;
    }
    return true;
  }

  async start(): Promise<void> {
    await logThought(`[SlackChannel] Ready for ${Object.keys(this.#webhooks).length} recipient webhook(s).`);
  }

  async stop(): Promise<void> {
    await logThought('[SlackChannel] Stopped.');
  }
}
