import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { defaultDateRange, formatDate, parseCalendarDate, toIsoDate } from './dateUtils';

describe('parseCalendarDate', () => {
    it('takes the UTC date of timestamps with a Z suffix', () => {
        expect(parseCalendarDate('2024-05-10T23:48Z')).toBe('2024-05-10');
        expect(parseCalendarDate('2024-05-10T23:48:00.000Z')).toBe('2024-05-10');
    });

    it('converts explicit offsets to the UTC date', () => {
        expect(parseCalendarDate('2024-05-10T22:00:00-05:00')).toBe('2024-05-11');
    });

    describe('east of UTC', () => {
        const previousTz = process.env.TZ;

        beforeAll(() => {
            process.env.TZ = 'Asia/Tokyo';
        });

        afterAll(() => {
            if (previousTz === undefined) {
                delete process.env.TZ;
            } else {
                process.env.TZ = previousTz;
            }
        });

        it('takes the UTC date of space-separated timestamps with an offset', () => {
            expect(parseCalendarDate('2024-05-10 23:30Z')).toBe('2024-05-10');
            expect(parseCalendarDate('2024-05-10 20:00:00-05:00')).toBe('2024-05-11');
        });
    });

    it('keeps the literal date of naive timestamps', () => {
        expect(parseCalendarDate('2024-05-10T23:59:00')).toBe('2024-05-10');
        expect(parseCalendarDate('2024-05-10')).toBe('2024-05-10');
    });

    it('returns null for anything unparseable', () => {
        expect(parseCalendarDate('yesterday')).toBeNull();
        expect(parseCalendarDate('')).toBeNull();
        expect(parseCalendarDate(undefined)).toBeNull();
        expect(parseCalendarDate(1715299200000)).toBeNull();
    });
});

describe('toIsoDate', () => {
    it('accepts real YYYY-MM-DD strings only', () => {
        expect(toIsoDate(' 2024-02-29 ')).toBe('2024-02-29');
        expect(toIsoDate('2023-02-29')).toBeNull();
        expect(toIsoDate('05/10/2024')).toBeNull();
    });

    it('uses the UTC date of Date objects', () => {
        expect(toIsoDate(new Date('2024-05-10T23:30:00Z'))).toBe('2024-05-10');
        expect(toIsoDate(new Date('nope'))).toBeNull();
    });
});

describe('formatDate', () => {
    it('renders calendar dates for chart axes', () => {
        expect(formatDate('2024-03-04')).toBe('Mar 4, 2024');
        expect(formatDate(null)).toBe('-');
        expect(formatDate('garbage')).toBe('garbage');
    });
});

describe('defaultDateRange', () => {
    it('ends today and starts the given number of days before', () => {
        expect(defaultDateRange(new Date('2024-05-31T12:00:00Z'), 30)).toEqual({
            start: '2024-05-01',
            end: '2024-05-31'
        });
    });
});
