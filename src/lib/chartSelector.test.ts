import { describe, expect, it } from 'vitest';
import { EVENT_CODES } from '../types';
import { selectChart } from './chartSelector';
import { EVENT_CATALOG } from './eventCatalog';

describe('selectChart', () => {
    it('draws storms as a line of the average Kp index', () => {
        expect(selectChart(EVENT_CATALOG.GST)).toEqual({
            kind: 'line',
            xLabel: 'Date',
            yLabel: 'Average Kp Index',
            title: 'Average Kp Index of GST (Geomagnetic Storm) Over Time'
        });
    });

    it('draws notifications as bars', () => {
        expect(selectChart(EVENT_CATALOG.notifications)).toEqual({
            kind: 'bar',
            xLabel: 'Date',
            yLabel: 'Number of Notifications',
            title: 'Number of Notifications Over Time'
        });
    });

    it('copies the y label verbatim for every event type', () => {
        EVENT_CODES.forEach(code => {
            expect(selectChart(EVENT_CATALOG[code]).yLabel).toBe(EVENT_CATALOG[code].yLabel);
        });
    });
});
