import { format, isValid, parseISO, subDays } from 'date-fns';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
// Z, +hh:mm, +hhmm or +hh after a time component ("T" or space separated, as parseISO allows)
const HAS_OFFSET = /[T ][\d:.]+(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Formats a calendar date (YYYY-MM-DD) or Date object for axis ticks and tooltips, e.g. "Mar 4, 2024".
 * Uses the literal date parts for YYYY-MM-DD strings to avoid timezone shifts.
 */
export function formatDate(date: string | Date | null | undefined): string {
    if (!date) return '-';

    if (typeof date === 'string') {
        const parsed = parseISO(date);
        if (!isValid(parsed)) return date;
        return format(parsed, 'MMM d, yyyy');
    }

    if (!isValid(date)) return String(date);
    return format(date, 'MMM d, yyyy');
}

/**
 * Reduces a DONKI timestamp to its calendar date (YYYY-MM-DD).
 * Timestamps carrying an offset ("2024-03-04T06:00Z") resolve to their UTC date,
 * naive ones to the date they literally name. Anything unparseable yields null.
 */
export function parseCalendarDate(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    if (!trimmed) return null;

    const parsed = parseISO(trimmed);
    if (!isValid(parsed)) return null;

    return HAS_OFFSET.test(trimmed)
        ? parsed.toISOString().slice(0, 10)
        : format(parsed, 'yyyy-MM-dd');
}

/**
 * Normalises a form value or Date to YYYY-MM-DD. Date objects use their UTC date.
 */
export function toIsoDate(value: string | Date): string | null {
    if (value instanceof Date) {
        return isValid(value) ? value.toISOString().slice(0, 10) : null;
    }
    const trimmed = value.trim();
    if (!ISO_DATE.test(trimmed)) return null;
    return isValid(parseISO(trimmed)) ? trimmed : null;
}

export function defaultDateRange(now: Date, days: number): { start: string; end: string } {
    const end = now.toISOString().slice(0, 10);
    const start = format(subDays(parseISO(end), days), 'yyyy-MM-dd');
    return { start, end };
}
