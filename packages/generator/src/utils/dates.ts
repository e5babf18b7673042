/**
 * Calendar helpers for live dates (YYYY-MM-DD), computed in UTC.
 */

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}

function parseIsoDate(date: string): number {
    return Date.UTC(
        Number(date.slice(0, 4)),
        Number(date.slice(5, 7)) - 1,
        Number(date.slice(8, 10))
    );
}

/**
 * True for a well-formed YYYY-MM-DD string naming a real calendar day.
 */
export function isIsoDate(value: string): boolean {
    if (!DATE_REGEX.test(value)) return false;
    return toIsoDate(new Date(parseIsoDate(value))) === value;
}

export function toIsoDate(date: Date): string {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * @example
 * addDays('2025-02-26', 3) // "2025-03-01"
 */
export function addDays(date: string, days: number): string {
    return toIsoDate(new Date(parseIsoDate(date) + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
    return Math.round((parseIsoDate(to) - parseIsoDate(from)) / MS_PER_DAY);
}

/**
 * Review timestamp format used in puzzle records: "YYYY-MM-DD HH:MM:SS".
 */
export function formatTimestamp(date: Date): string {
    return (
        `${toIsoDate(date)} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    );
}
