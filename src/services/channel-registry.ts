import type { Channel, ChannelCapabilityFilter } from '../types/channels.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Whether a channel satisfies every set field of the filter. Boolean fields
 * compare for equality, so `requiresButtons: false` selects channels without
 * buttons.
 */
export function matchesCapabilityFilter(channel: Channel, filter: ChannelCapabilityFilter | undefined): boolean {
    if (!filter) return true;
    const caps = channel.capabilities;

    if (filter.requiresInteractivity !== undefined && channel.supportsInteractivity !== filter.requiresInteractivity) {
        return false;
    }
    if (filter.requiresBold !== undefined && caps.supportsBold !== filter.requiresBold) return false;
    if (filter.requiresLinks !== undefined && caps.supportsLinks !== filter.requiresLinks) return false;
    if (filter.requiresButtons !== undefined && caps.supportsButtons !== filter.requiresButtons) return false;
    if (filter.requiresImages !== undefined && caps.supportsImages !== filter.requiresImages) return false;
    if (filter.minMessageLength !== undefined && caps.maxMessageLength < filter.minMessageLength) return false;

    return true;
}

/**
 * The single owner of the platformId → channel mapping. Lifecycle calls are
 * isolated per channel: one platform failing to start does not keep the
 * others down.
 */
export class ChannelRegistry {
    readonly #channels: Map<string, Channel> = new Map();

    register(channel: Channel): void {
        if (this.#channels.has(channel.platformId)) {
            throw new Error(`[ChannelRegistry] Channel '${channel.platformId}' is already registered.`);
        }
        this.#channels.set(channel.platformId, channel);
        void logThought(`[ChannelRegistry] Registered ${channel.displayName} (${channel.platformId}).`);
    }

    unregister(platformId: string): boolean {
        const removed = this.#channels.delete(platformId);
        if (removed) {
            void logThought(`[ChannelRegistry] Unregistered ${platformId}.`);
        }
        return removed;
    }

    get(platformId: string): Channel | undefined {
        return this.#channels.get(platformId);
    }

    list(): Channel[] {
        return [...this.#channels.values()];
    }

    listEnabled(): Channel[] {
        return this.list().filter((channel) => channel.enabled);
    }

    withCapability(filter?: ChannelCapabilityFilter): Channel[] {
        return this.listEnabled().filter((channel) => matchesCapabilityFilter(channel, filter));
    }

    async startAll(): Promise<void> {
        await this.#forEachEnabled('start', (channel) => channel.start());
    }

    async stopAll(): Promise<void> {
        await this.#forEachEnabled('stop', (channel) => channel.stop());
    }

    /** Probe every enabled channel. A throwing probe counts as unreachable. */
    async testAll(): Promise<Record<string, boolean>> {
        const channels = this.listEnabled();
        const results = await Promise.allSettled(channels.map((channel) => channel.testConnection()));
        const report: Record<string, boolean> = {};

        results.forEach((result, index) => {
            const channel = channels[index];
            if (!channel) return;
            if (result.status === 'fulfilled') {
                report[channel.platformId] = result.value;
            } else {
                report[channel.platformId] = false;
                console.error(`[ChannelRegistry] ${channel.platformId} connection test threw:`, result.reason);
            }
        });

        return report;
    }

    async #forEachEnabled(action: string, fn: (channel: Channel) => Promise<void>): Promise<void> {
        const channels = this.listEnabled();
        const results = await Promise.allSettled(channels.map(fn));

        results.forEach((result, index) => {
            const channel = channels[index];
            if (!channel || result.status === 'fulfilled') return;
            console.error(`[ChannelRegistry] Failed to ${action} ${channel.platformId}:`, result.reason);
            void logThought(`[ChannelRegistry] Failed to ${action} ${channel.platformId}: ${errorMessage(result.reason)}`);
        });
    }
}
