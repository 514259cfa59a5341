import type { ChannelCapabilityFilter, ChannelOutcome } from '../types/channels.js';
import type {
    DeliveryResult,
    DocumentSource,
    Period,
    RetryState,
    WeekLetterDocument,
} from '../types/delivery.js';
import { computeContentHash } from '../utils/content-hash.js';
import { DocumentValidationError, errorMessage } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { logThought } from '../utils/logger.js';
import { formatPeriod, periodKey, validatePeriod } from '../utils/period.js';
import type { ChannelDispatcher } from './channel-dispatcher.js';
import { withTitle, type ContentAdapter } from './content-adapter.js';
import type { DedupGate } from './dedup-gate.js';
import type { DeliveryStore } from './delivery-store.js';
import { phaseOf, type RetryTracker } from './retry-tracker.js';

export interface DeliveryCoordinatorDeps {
    store: DeliveryStore;
    dedup: DedupGate;
    retries: RetryTracker;
    adapter: ContentAdapter;
    dispatcher: ChannelDispatcher;
    /** Needed only by {@link DeliveryCoordinator.deliverFromSource}. */
    source?: DocumentSource;
    /** Restricts every broadcast to channels matching this filter. */
    filter?: ChannelCapabilityFilter;
    /** Names shown in the message title; the recipient id is used otherwise. */
    recipientNames?: Readonly<Record<string, string>>;
}

const LETTER_UNAVAILABLE = 'Week letter is not available yet.';

export function validateDocument(document: WeekLetterDocument): void {
    if (typeof document.recipientId !== 'string' || document.recipientId.trim().length === 0) {
        throw new DocumentValidationError('Document has no recipient.');
    }
    validatePeriod(document.period);
    if (typeof document.rawContent !== 'string' || document.rawContent.trim().length === 0) {
        throw new DocumentValidationError('Document content is empty.');
    }
}

/** `Week letter for Emma, week 42/2024` */
export function letterTitle(displayName: string, period: Period): string {
    return `Week letter for ${displayName}, week ${formatPeriod(period)}`;
}

function summarizeFailures(outcomes: Record<string, ChannelOutcome>): string {
    const parts: string[] = [];
    for (const [platformId, outcome] of Object.entries(outcomes)) {
        if (!outcome.ok) parts.push(`${platformId}: ${outcome.error}`);
    }
    return parts.length > 0 ? parts.join('; ') : 'No channel accepted the letter.';
}

/**
 * End-to-end delivery of one week letter.
 *
 * Per (recipient, period) the sequence dedup check → dispatch → persisted
 * update runs under a keyed lock, so a retry tick and a fresh document for
 * the same key cannot both post. Store failures surface as
 * `DeliveryStoreError`; everything the channels do is reported as data.
 */
export class DeliveryCoordinator {
    readonly #deps: DeliveryCoordinatorDeps;
    readonly #lock = new KeyedLock();

    constructor(deps: DeliveryCoordinatorDeps) {
        this.#deps = deps;
    }

    async deliver(document: WeekLetterDocument): Promise<DeliveryResult> {
        try {
            validateDocument(document);
        } catch (err) {
            if (err instanceof DocumentValidationError) {
                void logThought(`[DeliveryCoordinator] Rejected document: ${err.message}`);
                return { status: 'error', recipientId: document.recipientId, period: document.period, reason: err.message };
            }
            throw err;
        }

        return this.#lock.run(periodKey(document.recipientId, document.period), () => this.#deliverLocked(document));
    }

    /**
     * Fetch the letter from the configured source and deliver it. A letter
     * that is not published yet counts as a failed attempt, so it is picked
     * up again by the retry poll.
     */
    async deliverFromSource(recipientId: string, period: Period): Promise<DeliveryResult> {
        const source = this.#deps.source;
        if (!source) {
            return { status: 'error', recipientId, period, reason: 'No document source is configured.' };
        }
        try {
            validatePeriod(period);
        } catch (err) {
            if (err instanceof DocumentValidationError) {
                return { status: 'error', recipientId, period, reason: err.message };
            }
            throw err;
        }

        let document: WeekLetterDocument | null;
        let unavailableReason = LETTER_UNAVAILABLE;
        try {
            document = await source.fetch(recipientId, period);
        } catch (err) {
            document = null;
            unavailableReason = `Document source failed: ${errorMessage(err)}`;
            void logThought(`[DeliveryCoordinator] ${unavailableReason} (${recipientId} week ${formatPeriod(period)})`);
        }

        if (document) {
            return this.deliver(document);
        }

        return this.#lock.run(periodKey(recipientId, period), async (): Promise<DeliveryResult> => {
            const delivered = this.#deps.dedup.getRecord(recipientId, period);
            if (delivered) {
                return { status: 'skipped', recipientId, period, contentHash: delivered.contentHash };
            }
            const blocked = this.#exhaustedResult(recipientId, period);
            if (blocked) return blocked;

            return this.#recordFailure(recipientId, period, unavailableReason, {});
        });
    }

    async #deliverLocked(document: WeekLetterDocument): Promise<DeliveryResult> {
        const { recipientId, period, rawContent } = document;
        const { dedup, retries, adapter, dispatcher, store, filter, recipientNames } = this.#deps;
        const label = `${recipientId} week ${formatPeriod(period)}`;

        const contentHash = computeContentHash(rawContent);
        if (dedup.hasBeenDelivered(recipientId, period, contentHash)) {
            return { status: 'skipped', recipientId, period, contentHash };
        }

        const blocked = this.#exhaustedResult(recipientId, period);
        if (blocked) return blocked;

        const eligible = dispatcher.eligibleChannels(recipientId, filter);
        if (eligible.length === 0) {
            void logThought(`[DeliveryCoordinator] No channel can reach ${recipientId}; ${label} left for a later run.`);
            return { status: 'no_recipients', recipientId, period, contentHash };
        }

        const rendered = withTitle(
            adapter.render(rawContent, eligible.map((channel) => channel.preferredFormat)),
            letterTitle(recipientNames?.[recipientId] ?? recipientId, period),
        );
        const report = await dispatcher.broadcast(recipientId, rendered, filter);

        if (report.noRecipients) {
            return { status: 'no_recipients', recipientId, period, contentHash };
        }

        if (report.anySucceeded) {
            const channels: Record<string, boolean> = {};
            for (const [platformId, outcome] of Object.entries(report.outcomes)) {
                channels[platformId] = outcome.ok;
            }

            store.transaction(() => {
                dedup.markDelivered(recipientId, period, contentHash, rawContent, channels);
                retries.recordSuccess(recipientId, period);
            });

            void logThought(`[DeliveryCoordinator] Delivered ${label} via ${report.succeeded.join(', ')}.`);
            return { status: 'delivered', recipientId, period, contentHash, outcomes: report.outcomes };
        }

        return this.#recordFailure(recipientId, period, summarizeFailures(report.outcomes), report.outcomes);
    }

    #exhaustedResult(recipientId: string, period: Period): DeliveryResult | null {
        const state = this.#deps.retries.getState(recipientId, period);
        if (!state || phaseOf(state) !== 'exhausted') return null;
        return {
            status: 'exhausted_retries',
            recipientId,
            period,
            attemptCount: state.attemptCount,
            reason: state.lastError ?? 'Retries exhausted.',
            outcomes: {},
        };
    }

    #recordFailure(
        recipientId: string,
        period: Period,
        reason: string,
        outcomes: Record<string, ChannelOutcome>,
    ): DeliveryResult {
        const state: RetryState = this.#deps.retries.recordFailure(recipientId, period, reason);
        if (state.nextAttemptAt !== null) {
            return {
                status: 'retrying',
                recipientId,
                period,
                attemptCount: state.attemptCount,
                nextAttemptAt: state.nextAttemptAt,
                reason,
                outcomes,
            };
        }
        console.error(`[DeliveryCoordinator] Giving up on ${recipientId} week ${formatPeriod(period)}: ${reason}`);
        return { status: 'exhausted_retries', recipientId, period, attemptCount: state.attemptCount, reason, outcomes };
    }
}
