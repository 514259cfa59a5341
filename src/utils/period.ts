import type { Period } from '../types/delivery.js';
import { DocumentValidationError } from './errors.js';

const MIN_WEEK = 1;
const MAX_WEEK = 53;
const MIN_YEAR = 2000;
const MAX_YEAR = 2100;
const DAY_MS = 24 * 60 * 60 * 1000;

export function validatePeriod(period: Period): void {
    if (!Number.isInteger(period.week) || period.week < MIN_WEEK || period.week > MAX_WEEK) {
        throw new DocumentValidationError(`Week must be an integer between ${MIN_WEEK} and ${MAX_WEEK}, got ${period.week}.`);
    }
    if (!Number.isInteger(period.year) || period.year < MIN_YEAR || period.year > MAX_YEAR) {
        throw new DocumentValidationError(`Year must be an integer between ${MIN_YEAR} and ${MAX_YEAR}, got ${period.year}.`);
    }
}

/** Chronological order: year, then week. */
export function comparePeriods(a: Period, b: Period): number {
    return a.year - b.year || a.week - b.week;
}

/** `42/2024` */
export function formatPeriod(period: Period): string {
    return `${period.week}/${period.year}`;
}

export function periodKey(recipientId: string, period: Period): string {
    return `${recipientId}:${period.year}-W${String(period.week).padStart(2, '0')}`;
}

/** ISO-8601 week and week-numbering year of a date, evaluated in UTC. */
export function isoWeekOf(date: Date): Period {
    const day = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
    // Monday = 1 … Sunday = 7
    const weekday = day.getUTCDay() || 7;
    // The Thursday of this week decides which year the week belongs to.
    day.setUTCDate(day.getUTCDate() + 4 - weekday);
    const year = day.getUTCFullYear();
    const yearStart = Date.UTC(year, 0, 1);
    const week = Math.ceil(((day.getTime() - yearStart) / DAY_MS + 1) / 7);
    return { week, year };
}

/** The calendar date `date` falls on in `timeZone`, as midnight UTC. */
export function calendarDateIn(date: Date, timeZone: string): Date {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: 'numeric',
        day: 'numeric',
    }).formatToParts(date);
    const part = (type: Intl.DateTimeFormatPartTypes): number =>
        Number(parts.find((entry) => entry.type === type)?.value);
    return new Date(Date.UTC(part('year'), part('month') - 1, part('day')));
}

/**
 * The week whose letter should be checked on `date`. Letters for the coming
 * week are published over the weekend, so Sundays look one week ahead. The
 * weekday is read in `timeZone` when one is given, otherwise in UTC.
 */
export function letterPeriodFor(date: Date, timeZone?: string): Period {
    const day = timeZone ? calendarDateIn(date, timeZone) : date;
    if (day.getUTCDay() === 0) {
        return isoWeekOf(new Date(day.getTime() + 7 * DAY_MS));
    }
    return isoWeekOf(day);
}

/** Whether the runtime knows `timeZone` as an IANA zone name. */
export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch (err) {
        if (err instanceof RangeError) return false;
        throw err;
    }
}
