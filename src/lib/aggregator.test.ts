import { describe, expect, it } from 'vitest';
import type { TidyRow } from '../types';
import { aggregate } from './aggregator';
import { EVENT_CATALOG } from './eventCatalog';

describe('aggregate', () => {
    it('counts rows per date and sorts ascending', () => {
        const rows: TidyRow[] = [
            { date: '2024-05-12', value: 1 },
            { date: '2024-05-10', value: 1 },
            { date: '2024-05-12', value: 1 },
            { date: '2024-05-10', value: 1 },
            { date: '2024-05-11', value: 1 }
        ];

        expect(aggregate(rows, EVENT_CATALOG.CME)).toEqual([
            { date: '2024-05-10', value: 2 },
            { date: '2024-05-11', value: 1 },
            { date: '2024-05-12', value: 2 }
        ]);
    });

    it('averages Kp readings per date for storms', () => {
        const rows: TidyRow[] = [
            { date: '2024-05-10', value: 3 },
            { date: '2024-05-10', value: 5 },
            { date: '2024-05-11', value: 7 }
        ];

        expect(aggregate(rows, EVENT_CATALOG.GST)).toEqual([
            { date: '2024-05-10', value: 4 },
            { date: '2024-05-11', value: 7 }
        ]);
    });

    it('leaves gaps between dates unfilled', () => {
        const rows: TidyRow[] = [
            { date: '2024-05-01', value: 1 },
            { date: '2024-05-04', value: 1 }
        ];

        expect(aggregate(rows, EVENT_CATALOG.FLR).map(point => point.date)).toEqual(['2024-05-01', '2024-05-04']);
    });

    it('produces strictly increasing dates', () => {
        const dates = ['2024-06-02', '2023-12-31', '2024-06-02', '2024-01-15', '2023-12-31', '2024-06-01'];
        const series = aggregate(dates.map(date => ({ date, value: 1 })), EVENT_CATALOG.SEP);

        for (let i = 1; i < series.length; i++) {
            expect(series[i].date > series[i - 1].date).toBe(true);
        }
        expect(series).toHaveLength(4);
    });

    it('returns an empty series for no rows', () => {
        expect(aggregate([], EVENT_CATALOG.GST)).toEqual([]);
    });
});
