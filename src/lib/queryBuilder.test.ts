import { describe, expect, it } from 'vitest';
import { EVENT_CODES } from '../types';
import { buildQuery, toRequestParams, validateQueryInput } from './queryBuilder';
import { InvalidDateRangeError, MissingCredentialError } from './errors';

describe('buildQuery', () => {
    it('adds the CME accuracy and catalog filters', () => {
        const params = buildQuery('CME', '2024-05-01', '2024-05-31', 'test-key');

        expect(params).toEqual({
            eventCode: 'CME',
            startDate: '2024-05-01',
            endDate: '2024-05-31',
            apiKey: 'test-key',
            extra: {
                mostAccurateOnly: 'true',
                completeEntryOnly: 'true',
                speed: 500,
                halfAngle: 30,
                catalog: 'ALL'
            }
        });
    });

    it('asks for every notification type', () => {
        expect(buildQuery('notifications', '2024-05-01', '2024-05-02', 'test-key').extra).toEqual({ type: 'all' });
    });

    it('adds no extra parameters for the other event types', () => {
        EVENT_CODES.filter(code => code !== 'CME' && code !== 'notifications').forEach(code => {
            expect(buildQuery(code, '2024-05-01', '2024-05-02', 'test-key').extra).toEqual({});
        });
    });

    it('does not let callers mutate the catalog through extra', () => {
        buildQuery('CME', '2024-05-01', '2024-05-02', 'test-key').extra.speed = 1;
        expect(buildQuery('CME', '2024-05-01', '2024-05-02', 'test-key').extra.speed).toBe(500);
    });

    it('accepts a single-day window', () => {
        const params = buildQuery('FLR', '2024-05-01', '2024-05-01', 'test-key');
        expect(params.startDate).toBe('2024-05-01');
        expect(params.endDate).toBe('2024-05-01');
    });

    it('formats Date objects as ISO calendar dates', () => {
        const params = buildQuery('GST', new Date(Date.UTC(2024, 0, 5, 13)), new Date(Date.UTC(2024, 0, 9)), 'test-key');
        expect(params.startDate).toBe('2024-01-05');
        expect(params.endDate).toBe('2024-01-09');
    });

    it('rejects a start date after the end date', () => {
        const pairs: [string, string][] = [
            ['2024-05-02', '2024-05-01'],
            ['2025-01-01', '2024-12-31'],
            ['2024-03-01', '2024-02-29']
        ];
        pairs.forEach(([start, end]) => {
            expect(() => buildQuery('CME', start, end, 'test-key')).toThrow(InvalidDateRangeError);
        });
    });

    it('rejects dates that do not parse', () => {
        expect(() => buildQuery('CME', '2024-02-30', '2024-03-01', 'test-key')).toThrow('Start and end must be valid dates.');
        expect(() => buildQuery('CME', '', '2024-03-01', 'test-key')).toThrow(InvalidDateRangeError);
    });

    it('rejects an empty or blank API key', () => {
        expect(() => buildQuery('CME', '2024-05-01', '2024-05-02', '')).toThrow(MissingCredentialError);
        expect(() => buildQuery('CME', '2024-05-01', '2024-05-02', '   ')).toThrow(MissingCredentialError);
    });

    it('trims the API key', () => {
        expect(buildQuery('SEP', '2024-05-01', '2024-05-02', '  test-key ').apiKey).toBe('test-key');
    });
});

describe('validateQueryInput', () => {
    it('reports both problems at once', () => {
        const issues = validateQueryInput({ startDate: '2024-05-02', endDate: '2024-05-01', apiKey: '' });
        expect(issues.map(issue => issue.field)).toEqual(['apiKey', 'dateRange']);
    });

    it('returns nothing for valid input', () => {
        expect(validateQueryInput({ startDate: '2024-05-01', endDate: '2024-05-02', apiKey: 'test-key' })).toEqual([]);
    });
});

describe('toRequestParams', () => {
    it('uses the DONKI parameter names', () => {
        const params = buildQuery('notifications', '2024-05-01', '2024-05-02', 'test-key');
        expect(toRequestParams(params)).toEqual({
            startDate: '2024-05-01',
            endDate: '2024-05-02',
            api_key: 'test-key',
            type: 'all'
        });
    });
});
