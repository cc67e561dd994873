// src/utils/deadline/parseDeadline.ts
import { parse as dateParse, isValid as isDateValid } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { parseUtcOffsetMinutes, wallClockToInstant } from './timezone';

/** Values that mean "not announced yet". Matched case-insensitively anywhere in the string. */
export const PLACEHOLDER_TOKENS: readonly string[] = ['tbd', 'tba', 'n/a'];

/**
 * Tried in order; the first full match wins.
 */
export const DEADLINE_FORMATS: readonly string[] = [
    'yyyy-MM-dd HH:mm:ss',
    'yyyy-MM-dd HH:mm',
    "yyyy-MM-dd'T'HH:mm:ss",
    "yyyy-MM-dd'T'HH:mm",
    'yyyy-MM-dd',
    'MMM d, yyyy',
    'MMMM d, yyyy',
    'd MMM yyyy',
    'd MMMM yyyy',
];

// Parsing happens in UTC so the host's DST gaps never shift a wall-clock time.
const REFERENCE_DATE = new UTCDate(2000, 0, 1);

export interface ParseDeadlineOptions {
    /** "AoE", "UTC-12", "UTC+8"... Without one (or with an unknown one) the value is local time. */
    timezone?: string;
}

export function containsPlaceholder(value: string): boolean {
    const lower = value.toLowerCase();
    return PLACEHOLDER_TOKENS.some(token => lower.includes(token));
}

export function stripQuotes(value: string): string {
    return value.trim().replace(/^["']+|["']+$/g, '').trim();
}

/**
 * Turns a raw deadline value into a `Date`, or `null` when it is empty, a placeholder,
 * or matches none of {@link DEADLINE_FORMATS}. Never throws.
 */
export function parseDeadline(raw: unknown, options: ParseDeadlineOptions = {}): Date | null {
    if (raw instanceof Date) {
        return isDateValid(raw) ? raw : null;
    }
    if (typeof raw !== 'string') {
        return null;
    }

    const value = stripQuotes(raw);
    if (value === '' || containsPlaceholder(value)) {
        return null;
    }

    for (const format of DEADLINE_FORMATS) {
        const parsed = dateParse(value, format, REFERENCE_DATE);
        if (isDateValid(parsed)) {
            return wallClockToInstant(parsed, parseUtcOffsetMinutes(options.timezone));
        }
    }
    return null;
}
