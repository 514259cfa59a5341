import type { DeliveryResult, Period, RetryState } from '../types/delivery.js';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { formatPeriod, letterPeriodFor } from '../utils/period.js';
import type { JobScheduler } from './job-scheduler.js';

export const WEEKLY_CHECK_JOB_ID = 'week-letter-check';
export const RETRY_POLL_JOB_ID = 'week-letter-retries';

export interface WeekLetterSchedulerOptions {
    recipients: string[];
    /** @default '0 16 * * 0' (Sunday afternoon) */
    checkCron?: string;
    /** @default '*\/10 * * * *' */
    retryPollCron?: string;
    timezone?: string | null;
    /** Run one weekly check as soon as {@link WeekLetterScheduler.start} is called. */
    postOnStartup?: boolean;
    now?: () => Date;
}

/** The part of the delivery coordinator the scheduler drives. */
export interface LetterDeliverer {
    deliverFromSource(recipientId: string, period: Period): Promise<DeliveryResult>;
}

/** The part of the retry tracker the scheduler polls. */
export interface DueRetrySource {
    getDueAttempts(now?: Date): RetryState[];
}

export type TickEntry =
    | { recipientId: string; period: Period; ok: true; result: DeliveryResult }
    | { recipientId: string; period: Period; ok: false; error: string };

/**
 * Drives the delivery pipeline from two cron jobs: a weekly check that asks
 * the document source for each recipient's current letter, and a frequent
 * sweep over due retries.
 */
export class WeekLetterScheduler {
    readonly #jobs: JobScheduler;
    readonly #deliverer: LetterDeliverer;
    readonly #retries: DueRetrySource;
    readonly #recipients: string[];
    readonly #checkCron: string;
    readonly #retryPollCron: string;
    readonly #timezone: string | undefined;
    readonly #postOnStartup: boolean;
    readonly #now: () => Date;
    #started = false;

    constructor(
        jobs: JobScheduler,
        deliverer: LetterDeliverer,
        retries: DueRetrySource,
        options: WeekLetterSchedulerOptions,
    ) {
        this.#jobs = jobs;
        this.#deliverer = deliverer;
        this.#retries = retries;
        this.#recipients = [...new Set(options.recipients)];
        this.#checkCron = options.checkCron ?? '0 16 * * 0';
        this.#retryPollCron = options.retryPollCron ?? '*/10 * * * *';
        this.#timezone = options.timezone ?? undefined;
        this.#postOnStartup = options.postOnStartup ?? false;
        this.#now = options.now ?? (() => new Date());
    }

    async start(): Promise<void> {
        if (this.#started) return;

        this.#jobs.register({
            id: WEEKLY_CHECK_JOB_ID,
            cronExpression: this.#checkCron,
            description: 'Fetch and deliver the current week letter for every recipient',
            timezone: this.#timezone,
            handler: async () => {
                await this.runWeeklyCheck();
            },
        });
        this.#jobs.register({
            id: RETRY_POLL_JOB_ID,
            cronExpression: this.#retryPollCron,
            description: 'Retry week letters whose next attempt is due',
            timezone: this.#timezone,
            handler: async () => {
                await this.runDueRetries();
            },
        });
        this.#started = true;

        await logThought(
            `[WeekLetterScheduler] Started for ${this.#recipients.length} recipient(s): check '${this.#checkCron}', retries '${this.#retryPollCron}'.`,
        );

        if (this.#postOnStartup) {
            await this.#jobs.runNow(WEEKLY_CHECK_JOB_ID);
        }
    }

    stop(): void {
        if (!this.#started) return;
        this.#jobs.unregister(WEEKLY_CHECK_JOB_ID);
        this.#jobs.unregister(RETRY_POLL_JOB_ID);
        this.#started = false;
    }

    /**
     * Deliver the letter of the current week (next week on Sundays) for every
     * recipient. The weekday is read in the schedule's timezone.
     */
    async runWeeklyCheck(now: Date = this.#now()): Promise<TickEntry[]> {
        const period = letterPeriodFor(now, this.#timezone);
        const entries: TickEntry[] = [];

        for (const recipientId of this.#recipients) {
            entries.push(await this.#attempt(recipientId, period));
        }

        await logThought(`[WeekLetterScheduler] Weekly check for week ${formatPeriod(period)}: ${summarize(entries)}.`);
        return entries;
    }

    /** Re-attempt every retry whose next attempt time has passed, earliest first. */
    async runDueRetries(now: Date = this.#now()): Promise<TickEntry[]> {
        const due = this.#retries.getDueAttempts(now);
        if (due.length === 0) return [];

        const entries: TickEntry[] = [];
        for (const state of due) {
            entries.push(await this.#attempt(state.recipientId, state.period));
        }

        await logThought(`[WeekLetterScheduler] Retry sweep over ${due.length} due attempt(s): ${summarize(entries)}.`);
        return entries;
    }

    async #attempt(recipientId: string, period: Period): Promise<TickEntry> {
        try {
            const result = await this.#deliverer.deliverFromSource(recipientId, period);
            return { recipientId, period, ok: true, result };
        } catch (err) {
            const message = errorMessage(err);
            console.error(`[WeekLetterScheduler] Delivery for ${recipientId} week ${formatPeriod(period)} failed:`, message);
            await logThought(`[WeekLetterScheduler] Delivery for ${recipientId} week ${formatPeriod(period)} failed: ${message}`);
            return { recipientId, period, ok: false, error: message };
        }
    }
}

function summarize(entries: TickEntry[]): string {
    if (entries.length === 0) return 'nothing to do';
    const counts = new Map<string, number>();
    for (const entry of entries) {
        const key = entry.ok ? entry.result.status : 'failed';
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(', ');
}
