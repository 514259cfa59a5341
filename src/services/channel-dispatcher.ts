import type {
    BroadcastReport,
    Channel,
    ChannelCapabilityFilter,
    ChannelOutcome,
    RenderedContent,
} from '../types/channels.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { balanceInlineTags, EmbeddedBlockChunker } from './block-chunker.js';
import type { ChannelRegistry } from './channel-registry.js';

export interface ChannelDispatcherOptions {
    /** Per-channel limit for the whole (possibly chunked) send. @default 15000 */
    sendTimeoutMs?: number;
}

const DEFAULT_SEND_TIMEOUT_MS = 15_000;
/** Room left in each inline-HTML chunk for the tags closed and reopened at a cut. */
const HTML_TAG_RESERVE = 32;

function chunkForChannel(channel: Channel, rendered: RenderedContent): string[] {
    const preferred = rendered[channel.preferredFormat];
    const isHtml = channel.preferredFormat === 'html' && preferred !== undefined;
    const limit = channel.capabilities.maxMessageLength;
    const maxChars = isHtml && limit > HTML_TAG_RESERVE * 2 ? limit - HTML_TAG_RESERVE : limit;

    const chunks = new EmbeddedBlockChunker({
        maxChars,
        minChars: Math.min(50, maxChars - 1),
    }).chunk(preferred ?? rendered.plain);

    return isHtml ? balanceInlineTags(chunks) : chunks;
}

/**
 * Fans one rendered document out to every eligible channel in parallel.
 * A failing or hanging channel only fails its own outcome.
 */
export class ChannelDispatcher {
    readonly #registry: ChannelRegistry;
    readonly #sendTimeoutMs: number;

    constructor(registry: ChannelRegistry, options: ChannelDispatcherOptions = {}) {
        this.#registry = registry;
        this.#sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    }

    /** Enabled channels that match the filter and have a destination for the recipient. */
    eligibleChannels(recipientId: string, filter?: ChannelCapabilityFilter): Channel[] {
        return this.#registry
            .withCapability(filter)
            .filter((channel) => channel.canReach(recipientId));
    }

    async broadcast(
        recipientId: string,
        rendered: RenderedContent,
        filter?: ChannelCapabilityFilter,
    ): Promise<BroadcastReport> {
        const channels = this.eligibleChannels(recipientId, filter);

        if (channels.length === 0) {
            void logThought(`[ChannelDispatcher] No eligible channel for ${recipientId}.`);
            return { outcomes: {}, succeeded: [], failed: [], anySucceeded: false, noRecipients: true };
        }

        const settled = await Promise.allSettled(
            channels.map((channel) => this.#sendToChannel(channel, recipientId, rendered)),
        );

        const outcomes: Record<string, ChannelOutcome> = {};
        const succeeded: string[] = [];
        const failed: string[] = [];

        settled.forEach((result, index) => {
            const channel = channels[index];
            if (!channel) return;
            const outcome: ChannelOutcome = result.status === 'fulfilled'
                ? result.value
                : { ok: false, error: errorMessage(result.reason), durationMs: 0 };

            outcomes[channel.platformId] = outcome;
            if (outcome.ok) {
                succeeded.push(channel.platformId);
            } else {
                failed.push(channel.platformId);
                void logThought(`[ChannelDispatcher] ${channel.platformId} failed for ${recipientId}: ${outcome.error}`);
            }
        });

        return { outcomes, succeeded, failed, anySucceeded: succeeded.length > 0, noRecipients: false };
    }

    async #sendToChannel(channel: Channel, recipientId: string, rendered: RenderedContent): Promise<ChannelOutcome> {
        const startedAt = Date.now();
        const chunks = chunkForChannel(channel, rendered);

        if (chunks.length === 0) {
            return { ok: false, error: 'Rendered message is empty.', durationMs: 0 };
        }

        try {
            await withTimeout(
                async (signal) => {
                    for (const chunk of chunks) {
                        if (signal.aborted) return;
                        await channel.send(recipientId, chunk);
                    }
                },
                this.#sendTimeoutMs,
                `${channel.platformId} send`,
            );
            return { ok: true, chunks: chunks.length, durationMs: Date.now() - startedAt };
        } catch (err) {
            return { ok: false, error: errorMessage(err), durationMs: Date.now() - startedAt };
        }
    }
}
