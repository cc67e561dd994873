// src/utils/deadline/timezone.ts

/** Anywhere on Earth: the last place a given calendar day ends. */
const AOE_OFFSET_MINUTES = -12 * 60;

const UTC_OFFSET_PATTERN = /^(?:UTC|GMT)\s*([+-])\s*(\d{1,2})(?::?(\d{2}))?$/;

/** IANA `Etc/GMT±N` zones; their sign is inverted (`Etc/GMT+12` is UTC-12). */
const ETC_GMT_PATTERN = /^ETC\/GMT([+-])(\d{1,2})$/;

const MAX_OFFSET_HOURS = 14;

/**
 * Offset from UTC in minutes for the timezone labels the deadline feeds use
 * ("AoE", "UTC", "UTC-12", "UTC+8", "UTC+05:30", "Etc/GMT+12"). Unknown labels give `null`.
 */
export function parseUtcOffsetMinutes(timezone: string | undefined): number | null {
    if (!timezone) {
        return null;
    }
    const label = timezone.trim().toUpperCase();
    if (label === 'AOE') {
        return AOE_OFFSET_MINUTES;
    }
    if (['UTC', 'GMT', 'Z', 'ETC/UTC', 'ETC/GMT'].includes(label)) {
        return 0;
    }

    const etcMatch = label.match(ETC_GMT_PATTERN);
    if (etcMatch) {
        const hours = Number(etcMatch[2]);
        if (hours > MAX_OFFSET_HOURS) {
            return null;
        }
        return (etcMatch[1] === '+' ? -1 : 1) * hours * 60;
    }

    const match = label.match(UTC_OFFSET_PATTERN);
    if (!match) {
        return null;
    }
    const sign = match[1] === '-' ? -1 : 1;
    const hours = Number(match[2]);
    const minutes = match[3] ? Number(match[3]) : 0;
    if (hours > MAX_OFFSET_HOURS || minutes > 59) {
        return null;
    }
    return sign * (hours * 60 + minutes);
}

/**
 * `wallClock` holds a feed's wall-clock time in its UTC fields. With an offset this gives the
 * instant at that offset; without one, the same wall-clock time in the process's local zone.
 */
export function wallClockToInstant(wallClock: Date, offsetMinutes: number | null): Date {
    if (offsetMinutes === null) {
        return new Date(
            wallClock.getUTCFullYear(),
            wallClock.getUTCMonth(),
            wallClock.getUTCDate(),
            wallClock.getUTCHours(),
            wallClock.getUTCMinutes(),
            wallClock.getUTCSeconds(),
            wallClock.getUTCMilliseconds(),
        );
    }
    return new Date(wallClock.getTime() - offsetMinutes * 60_000);
}
