import { describe, expect, it, vi } from 'vitest';
import { HttpFailureError } from '../lib/errors';
import type { DataSource, QueryParams } from '../types';
import { runEventQuery } from './pipeline';

function fakeSource(fetchEvents: (params: QueryParams) => Promise<unknown[]>): DataSource {
    return {
        id: 'fake',
        name: 'Fake',
        capabilities: { id: 'fake', name: 'Fake', requiresApiKey: true },
        fetchEvents
    };
}

const range = { startDate: '2024-05-01', endDate: '2024-05-31', apiKey: 'test-secret' };

describe('runEventQuery', () => {
    it('counts CMEs per day and charts them as a line', async () => {
        const fetchEvents = vi.fn(async () => [
            { activityID: 'c1', startTime: '2024-05-10T01:00Z' },
            { activityID: 'c2', startTime: '2024-05-10T13:00Z' },
            { activityID: 'c3', startTime: '2024-05-11T07:00Z' },
            { activityID: 'c4', startTime: '2024-05-12T00:00Z' },
            { activityID: 'c5', startTime: '2024-05-12T22:00Z' }
        ]);

        const result = await runEventQuery({ eventCode: 'CME', ...range }, fakeSource(fetchEvents));

        expect(result.status).toBe('success');
        if (result.status !== 'success') return;
        expect(result.series).toEqual([
            { date: '2024-05-10', value: 2 },
            { date: '2024-05-11', value: 1 },
            { date: '2024-05-12', value: 2 }
        ]);
        expect(result.chart.kind).toBe('line');
        expect(result.warnings).toEqual([]);
        expect(fetchEvents).toHaveBeenCalledWith(expect.objectContaining({
            eventCode: 'CME',
            startDate: '2024-05-01',
            endDate: '2024-05-31',
            apiKey: 'test-secret'
        }));
    });

    it('averages Kp readings for storms', async () => {
        const source = fakeSource(async () => [{
            gstID: 'g1',
            startTime: '2024-05-10T00:00Z',
            allKpIndex: [
                { observedTime: '2024-05-10T03:00Z', kpIndex: 3 },
                { observedTime: '2024-05-10T06:00Z', kpIndex: 5 }
            ]
        }]);

        const result = await runEventQuery({ eventCode: 'GST', ...range }, source);

        expect(result.status).toBe('success');
        if (result.status !== 'success') return;
        expect(result.series).toEqual([{ date: '2024-05-10', value: 4 }]);
        expect(result.chart.yLabel).toBe('Average Kp Index');
    });

    it('ends with an empty series and no warnings when nothing happened', async () => {
        const result = await runEventQuery({ eventCode: 'HSS', ...range }, fakeSource(async () => []));

        expect(result.status).toBe('success');
        if (result.status !== 'success') return;
        expect(result.series).toEqual([]);
        expect(result.warnings).toEqual([]);
        expect(result.chart.kind).toBe('bar');
    });

    it('keeps the upstream array untouched while charting only its records', async () => {
        const upstream = [{ flrID: 'f1', beginTime: '2024-05-10T01:00Z' }, null, 'stray', [1]];

        const result = await runEventQuery({ eventCode: 'FLR', ...range }, fakeSource(async () => upstream));

        expect(result.status).toBe('success');
        if (result.status !== 'success') return;
        expect(result.raw).toEqual([{ flrID: 'f1', beginTime: '2024-05-10T01:00Z' }, null, 'stray', [1]]);
        expect(result.records).toEqual([{ flrID: 'f1', beginTime: '2024-05-10T01:00Z' }]);
        expect(result.series).toEqual([{ date: '2024-05-10', value: 1 }]);
    });

    it('stops at the HTTP failure without normalising', async () => {
        const failure = new HttpFailureError(403, 'API_KEY_INVALID', 'FLR');
        const result = await runEventQuery({ eventCode: 'FLR', ...range }, fakeSource(async () => { throw failure; }));

        expect(result).toEqual({ status: 'failed', error: failure });
    });

    it('rejects invalid input before any request', async () => {
        const fetchEvents = vi.fn(async () => []);

        const result = await runEventQuery(
            { eventCode: 'CME', startDate: '2024-05-31', endDate: '2024-05-01', apiKey: '  ' },
            fakeSource(fetchEvents)
        );

        expect(result.status).toBe('invalid');
        if (result.status !== 'invalid') return;
        expect(result.issues.map(issue => issue.field)).toEqual(['apiKey', 'dateRange']);
        expect(fetchEvents).not.toHaveBeenCalled();
    });

    it('lets unexpected errors propagate', async () => {
        const source = fakeSource(async () => { throw new TypeError('boom'); });

        await expect(runEventQuery({ eventCode: 'SEP', ...range }, source)).rejects.toThrow('boom');
    });
});
