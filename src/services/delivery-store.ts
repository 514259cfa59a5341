import type { DeliveryRecord, Period, RetryState } from '../types/delivery.js';
import { DeliveryStoreError } from '../utils/errors.js';
import type { SqliteDatabase } from './db.js';

/**
 * Persistence boundary of the delivery pipeline. Rows are addressed by
 * explicit (recipientId, period) keys. Every method throws
 * {@link DeliveryStoreError} when the backing store fails.
 */
export interface DeliveryStore {
    hasDelivered(recipientId: string, period: Period, contentHash: string): boolean;
    getDeliveryRecord(recipientId: string, period: Period): DeliveryRecord | null;
    /** Insert or overwrite the record for the key. */
    markDelivered(record: DeliveryRecord): void;
    listDeliveryRecords(recipientId?: string): DeliveryRecord[];

    getRetryState(recipientId: string, period: Period): RetryState | null;
    /** Insert or overwrite the retry row for the key. */
    saveRetryState(state: RetryState): void;
    deleteRetryState(recipientId: string, period: Period): boolean;
    /** Non-terminal rows due at `now`, earliest first, then recipientId, then period. */
    getDueRetries(now: Date): RetryState[];
    listRetryStates(): RetryState[];

    /** Run `fn` atomically: either every write inside it commits or none does. */
    transaction<T>(fn: () => T): T;
}

interface PostedLetterRow {
    recipient_id: string;
    week_number: number;
    year: number;
    content_hash: string;
    raw_content: string;
    channels_json: string;
    posted_at: string;
}

interface RetryAttemptRow {
    recipient_id: string;
    week_number: number;
    year: number;
    attempt_count: number;
    first_attempt_at: string;
    last_attempt_at: string;
    next_attempt_at: string | null;
    max_attempts: number;
    succeeded: number;
    last_error: string | null;
}

type KeyParams = [string, number, number];

const RETRY_ORDER = 'ORDER BY next_attempt_at ASC, recipient_id ASC, year ASC, week_number ASC';

function parseChannels(json: string): Record<string, boolean> {
    try {
        const parsed: unknown = JSON.parse(json);
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            return {};
        }
        const channels: Record<string, boolean> = {};
        for (const [platformId, value] of Object.entries(parsed)) {
            if (typeof value === 'boolean') {
                channels[platformId] = value;
            }
        }
        return channels;
    } catch {
        return {};
    }
}

function toDeliveryRecord(row: PostedLetterRow): DeliveryRecord {
    return {
        recipientId: row.recipient_id,
        period: { week: row.week_number, year: row.year },
        contentHash: row.content_hash,
        postedAt: new Date(row.posted_at),
        channels: parseChannels(row.channels_json),
        rawContent: row.raw_content,
    };
}

function toRetryState(row: RetryAttemptRow): RetryState {
    return {
        recipientId: row.recipient_id,
        period: { week: row.week_number, year: row.year },
        attemptCount: row.attempt_count,
        firstAttemptAt: new Date(row.first_attempt_at),
        lastAttemptAt: new Date(row.last_attempt_at),
        nextAttemptAt: row.next_attempt_at === null ? null : new Date(row.next_attempt_at),
        maxAttempts: row.max_attempts,
        succeeded: row.succeeded === 1,
        lastError: row.last_error,
    };
}

/** {@link DeliveryStore} over the `posted_letters` and `retry_attempts` tables. */
export class SqliteDeliveryStore implements DeliveryStore {
    readonly #db: SqliteDatabase;

    constructor(db: SqliteDatabase) {
        this.#db = db;
    }

    hasDelivered(recipientId: string, period: Period, contentHash: string): boolean {
        return this.#guard('hasDelivered', () => {
            const row = this.#db
                .prepare<[...KeyParams, string], { found: number }>(`
                    SELECT 1 AS found FROM posted_letters
                    WHERE recipient_id = ? AND week_number = ? AND year = ? AND content_hash = ?
                `)
                .get(recipientId, period.week, period.year, contentHash);
            return row !== undefined;
        });
    }

    getDeliveryRecord(recipientId: string, period: Period): DeliveryRecord | null {
        return this.#guard('getDeliveryRecord', () => {
            const row = this.#db
                .prepare<KeyParams, PostedLetterRow>(`
                    SELECT * FROM posted_letters
                    WHERE recipient_id = ? AND week_number = ? AND year = ?
                `)
                .get(recipientId, period.week, period.year);
            return row ? toDeliveryRecord(row) : null;
        });
    }

    markDelivered(record: DeliveryRecord): void {
        this.#guard('markDelivered', () => {
            this.#db
                .prepare(`
                    INSERT INTO posted_letters
                        (recipient_id, week_number, year, content_hash, raw_content, channels_json, posted_at)
                    VALUES (?, ?, ?, ?, ?, ?, ?)
                    ON CONFLICT(recipient_id, week_number, year) DO UPDATE SET
                        content_hash = excluded.content_hash,
                        raw_content = excluded.raw_content,
                        channels_json = excluded.channels_json,
                        posted_at = excluded.posted_at
                `)
                .run(
                    record.recipientId,
                    record.period.week,
                    record.period.year,
                    record.contentHash,
                    record.rawContent,
                    JSON.stringify(record.channels),
                    record.postedAt.toISOString(),
                );
        });
    }

    listDeliveryRecords(recipientId?: string): DeliveryRecord[] {
        return this.#guard('listDeliveryRecords', () => {
            const rows = recipientId === undefined
                ? this.#db
                    .prepare<[], PostedLetterRow>('SELECT * FROM posted_letters ORDER BY year DESC, week_number DESC, recipient_id ASC')
                    .all()
                : this.#db
                    .prepare<[string], PostedLetterRow>('SELECT * FROM posted_letters WHERE recipient_id = ? ORDER BY year DESC, week_number DESC')
                    .all(recipientId);
            return rows.map(toDeliveryRecord);
        });
    }

    getRetryState(recipientId: string, period: Period): RetryState | null {
        return this.#guard('getRetryState', () => {
            const row = this.#db
                .prepare<KeyParams, RetryAttemptRow>(`
                    SELECT * FROM retry_attempts
                    WHERE recipient_id = ? AND week_number = ? AND year = ?
                `)
                .get(recipientId, period.week, period.year);
            return row ? toRetryState(row) : null;
        });
    }

    saveRetryState(state: RetryState): void {
        this.#guard('saveRetryState', () => {
            this.#db
                .prepare(`
                    INSERT INTO retry_attempts
                        (recipient_id, week_number, year, attempt_count, first_attempt_at, last_attempt_at,
                         next_attempt_at, max_attempts, succeeded, last_error)
                    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                    ON CONFLICT(recipient_id, week_number, year) DO UPDATE SET
                        attempt_count = excluded.attempt_count,
                        first_attempt_at = excluded.first_attempt_at,
                        last_attempt_at = excluded.last_attempt_at,
                        next_attempt_at = excluded.next_attempt_at,
                        max_attempts = excluded.max_attempts,
                        succeeded = excluded.succeeded,
                        last_error = excluded.last_error
                `)
                .run(
                    state.recipientId,
                    state.period.week,
                    state.period.year,
                    state.attemptCount,
                    state.firstAttemptAt.toISOString(),
                    state.lastAttemptAt.toISOString(),
                    state.nextAttemptAt === null ? null : state.nextAttemptAt.toISOString(),
                    state.maxAttempts,
                    state.succeeded ? 1 : 0,
                    state.lastError,
                );
        });
    }

    deleteRetryState(recipientId: string, period: Period): boolean {
        return this.#guard('deleteRetryState', () => {
            const result = this.#db
                .prepare('DELETE FROM retry_attempts WHERE recipient_id = ? AND week_number = ? AND year = ?')
                .run(recipientId, period.week, period.year);
            return result.changes > 0;
        });
    }

    getDueRetries(now: Date): RetryState[] {
        return this.#guard('getDueRetries', () => {
            const rows = this.#db
                .prepare<[string], RetryAttemptRow>(`
                    SELECT * FROM retry_attempts
                    WHERE succeeded = 0
                      AND next_attempt_at IS NOT NULL
                      AND next_attempt_at <= ?
                    ${RETRY_ORDER}
                `)
                .all(now.toISOString());
            return rows.map(toRetryState);
        });
    }

    listRetryStates(): RetryState[] {
        return this.#guard('listRetryStates', () => {
            const rows = this.#db
                .prepare<[], RetryAttemptRow>(`SELECT * FROM retry_attempts ${RETRY_ORDER}`)
                .all();
            return rows.map(toRetryState);
        });
    }

    transaction<T>(fn: () => T): T {
        const run = this.#db.transaction(fn);
        try {
            return run();
        } catch (err) {
            if (err instanceof DeliveryStoreError) throw err;
            throw new DeliveryStoreError('transaction', err);
        }
    }

    #guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            throw new DeliveryStoreError(operation, err);
        }
    }
}
