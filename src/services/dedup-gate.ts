import type { ContentHash, DeliveryRecord, Period } from '../types/delivery.js';
import type { DeliveryStore } from './delivery-store.js';

/**
 * Decides whether a (recipient, period, content) tuple still needs delivery.
 *
 * Only hash equality gates: the per-channel flags on a record are kept for
 * operators but never consulted, so a channel enabled after a letter was
 * posted does not receive that letter.
 */
export class DedupGate {
    readonly #store: DeliveryStore;
    readonly #now: () => Date;

    constructor(store: DeliveryStore, now: () => Date = () => new Date()) {
        this.#store = store;
        this.#now = now;
    }

    hasBeenDelivered(recipientId: string, period: Period, contentHash: ContentHash): boolean {
        return this.#store.hasDelivered(recipientId, period, contentHash);
    }

    /** Record a successful delivery, overwriting any earlier content for the period. */
    markDelivered(
        recipientId: string,
        period: Period,
        contentHash: ContentHash,
        rawContent: string,
        channels: Record<string, boolean> = {},
    ): DeliveryRecord {
        const record: DeliveryRecord = {
            recipientId,
            period,
            contentHash,
            postedAt: this.#now(),
            channels,
            rawContent,
        };
        this.#store.markDelivered(record);
        return record;
    }

    getRecord(recipientId: string, period: Period): DeliveryRecord | null {
        return this.#store.getDeliveryRecord(recipientId, period);
    }
}
