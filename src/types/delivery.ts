import type { ChannelOutcome } from './channels.js';

/** A week of a given ISO year. Ordered by year first, then week. */
export interface Period {
    week: number;
    year: number;
}

/** A produced week letter, immutable once handed to the pipeline. */
export interface WeekLetterDocument {
    recipientId: string;
    period: Period;
    /** Rich-text (HTML) body as produced upstream. */
    rawContent: string;
}

/** Lowercase hex SHA-256 of the raw content. */
export type ContentHash = string;

/** Persisted proof that a period's letter reached at least one channel. */
export interface DeliveryRecord {
    recipientId: string;
    period: Period;
    contentHash: ContentHash;
    postedAt: Date;
    /** Per-platform success flags at the time of posting. Informational only. */
    channels: Record<string, boolean>;
    rawContent: string;
}

/** Attempt bookkeeping for a (recipient, period) that has not been delivered yet. */
export interface RetryState {
    recipientId: string;
    period: Period;
    attemptCount: number;
    firstAttemptAt: Date;
    lastAttemptAt: Date;
    /** `null` once the record is terminal (succeeded or exhausted). */
    nextAttemptAt: Date | null;
    maxAttempts: number;
    succeeded: boolean;
    lastError: string | null;
}

export type RetryPhase = 'pending' | 'succeeded' | 'exhausted';

export type DeliveryStatus =
    | 'delivered'
    | 'skipped'
    | 'retrying'
    | 'exhausted_retries'
    | 'no_recipients'
    | 'error';

interface DeliveryResultBase {
    recipientId: string;
    period: Period;
}

/** Outcome of a single `deliver` invocation, one variant per status. */
export type DeliveryResult =
    | (DeliveryResultBase & {
        status: 'delivered';
        contentHash: ContentHash;
        outcomes: Record<string, ChannelOutcome>;
    })
    | (DeliveryResultBase & { status: 'skipped'; contentHash: ContentHash })
    | (DeliveryResultBase & {
        status: 'retrying';
        attemptCount: number;
        nextAttemptAt: Date;
        reason: string;
        outcomes: Record<string, ChannelOutcome>;
    })
    | (DeliveryResultBase & {
        status: 'exhausted_retries';
        attemptCount: number;
        reason: string;
        outcomes: Record<string, ChannelOutcome>;
    })
    | (DeliveryResultBase & { status: 'no_recipients'; contentHash: ContentHash })
    | (DeliveryResultBase & { status: 'error'; reason: string });

/** Produces the letter for a recipient and week, or `null` while it is not published yet. */
export interface DocumentSource {
    fetch(recipientId: string, period: Period): Promise<WeekLetterDocument | null>;
}
