import type { Period, RetryPhase, RetryState } from '../types/delivery.js';
import { formatPeriod } from '../utils/period.js';
import { logThought } from '../utils/logger.js';
import type { DeliveryStore } from './delivery-store.js';

export interface RetryTrackerOptions {
    /** Hours between attempts. @default 2 */
    retryIntervalHours?: number;
    /** Total hours after the first failure during which retries are made. @default 48 */
    maxRetryDurationHours?: number;
    now?: () => Date;
}

const DEFAULTS = {
    retryIntervalHours: 2,
    maxRetryDurationHours: 48,
};

const HOUR_MS = 60 * 60 * 1000;

export function phaseOf(state: RetryState): RetryPhase {
    if (state.succeeded) return 'succeeded';
    return state.nextAttemptAt === null ? 'exhausted' : 'pending';
}

/**
 * Attempt bookkeeping per (recipient, period).
 *
 * ```
 * absent ──fail──▶ pending ──fail──▶ pending … ──fail (budget spent)──▶ exhausted
 *                     └──────success──────▶ succeeded
 * ```
 *
 * Terminal rows are never returned by {@link getDueAttempts}. An exhausted
 * row stays until an operator calls {@link reset}. A failure after a success
 * (only reachable when the period's content changed) opens a new cycle.
 */
export class RetryTracker {
    readonly #store: DeliveryStore;
    readonly #intervalMs: number;
    readonly #budgetMs: number;
    readonly #maxAttempts: number;
    readonly #now: () => Date;

    constructor(store: DeliveryStore, options: RetryTrackerOptions = {}) {
        const intervalHours = options.retryIntervalHours ?? DEFAULTS.retryIntervalHours;
        const budgetHours = options.maxRetryDurationHours ?? DEFAULTS.maxRetryDurationHours;

        if (!(intervalHours > 0)) {
            throw new Error(`[RetryTracker] retryIntervalHours must be positive, got ${intervalHours}.`);
        }
        if (!(budgetHours > 0)) {
            throw new Error(`[RetryTracker] maxRetryDurationHours must be positive, got ${budgetHours}.`);
        }

        this.#store = store;
        this.#intervalMs = intervalHours * HOUR_MS;
        this.#budgetMs = budgetHours * HOUR_MS;
        this.#maxAttempts = Math.max(1, Math.round(budgetHours / intervalHours));
        this.#now = options.now ?? (() => new Date());
    }

    get maxAttempts(): number {
        return this.#maxAttempts;
    }

    getState(recipientId: string, period: Period): RetryState | null {
        return this.#store.getRetryState(recipientId, period);
    }

    /** Count one failed attempt and schedule the next one, or exhaust the record. */
    recordFailure(recipientId: string, period: Period, reason: string): RetryState {
        const now = this.#now();
        const existing = this.#store.getRetryState(recipientId, period);

        if (existing && phaseOf(existing) === 'exhausted') {
            return existing;
        }

        const continuing = existing !== null && phaseOf(existing) === 'pending';
        const attemptCount = continuing ? existing.attemptCount + 1 : 1;
        const firstAttemptAt = continuing ? existing.firstAttemptAt : now;
        const maxAttempts = continuing ? existing.maxAttempts : this.#maxAttempts;

        const next = new Date(now.getTime() + this.#intervalMs);
        const budgetEndsAt = firstAttemptAt.getTime() + this.#budgetMs;
        const exhausted = attemptCount >= maxAttempts || next.getTime() > budgetEndsAt;

        const state: RetryState = {
            recipientId,
            period,
            attemptCount,
            firstAttemptAt,
            lastAttemptAt: now,
            nextAttemptAt: exhausted ? null : next,
            maxAttempts,
            succeeded: false,
            lastError: reason,
        };
        this.#store.saveRetryState(state);

        const label = `${recipientId} week ${formatPeriod(period)}`;
        if (exhausted) {
            void logThought(
                `[RetryTracker] Retries exhausted for ${label} after ${attemptCount} attempt(s). Last error: ${reason}`,
            );
        } else {
            void logThought(
                `[RetryTracker] Attempt ${attemptCount}/${maxAttempts} failed for ${label}: ${reason}. Next attempt at ${next.toISOString()}.`,
            );
        }

        return state;
    }

    /** Retire the record after a successful delivery. Returns `null` when no record existed. */
    recordSuccess(recipientId: string, period: Period): RetryState | null {
        const existing = this.#store.getRetryState(recipientId, period);
        if (!existing) return null;

        const state: RetryState = {
            ...existing,
            lastAttemptAt: this.#now(),
            nextAttemptAt: null,
            succeeded: true,
            lastError: null,
        };
        this.#store.saveRetryState(state);
        void logThought(
            `[RetryTracker] ${recipientId} week ${formatPeriod(period)} delivered after ${existing.attemptCount} failed attempt(s).`,
        );
        return state;
    }

    /** Pending records whose next attempt is due, earliest first. */
    getDueAttempts(now: Date = this.#now()): RetryState[] {
        return this.#store.getDueRetries(now);
    }

    getPending(): RetryState[] {
        return this.#store.listRetryStates().filter((state) => phaseOf(state) === 'pending');
    }

    getExhausted(): RetryState[] {
        return this.#store.listRetryStates().filter((state) => phaseOf(state) === 'exhausted');
    }

    /** Drop the record so the period can be attempted from scratch. */
    reset(recipientId: string, period: Period): boolean {
        const removed = this.#store.deleteRetryState(recipientId, period);
        if (removed) {
            void logThought(`[RetryTracker] Retry record reset for ${recipientId} week ${formatPeriod(period)}.`);
        }
        return removed;
    }
}
