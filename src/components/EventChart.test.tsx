import { cloneElement, type ReactElement } from 'react';
import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import { EventChart } from './EventChart';
import { selectChart } from '../lib/chartSelector';
import { EVENT_CATALOG } from '../lib/eventCatalog';
import type { AggregatedSeries } from '../types';

// ResponsiveContainer measures nothing under jsdom, so give the chart a fixed size
vi.mock('recharts', async () => {
    const OriginalModule = await vi.importActual<typeof import('recharts')>('recharts');
    return {
        ...OriginalModule,
        ResponsiveContainer: ({ children }: { children: ReactElement<{ width?: number; height?: number }> }) => (
            <div style={{ width: 800, height: 600 }}>
                {cloneElement(children, { width: 800, height: 600 })}
            </div>
        ),
    };
});

describe('EventChart', () => {
    const series: AggregatedSeries = [
        { date: '2024-05-10', value: 2 },
        { date: '2024-05-11', value: 1 }
    ];

    it('renders bars for count-style events', () => {
        const { container } = render(
            <EventChart series={series} chart={selectChart(EVENT_CATALOG.FLR)} subtitle="FLR (Solar Flare) from 2024-05-01 to 2024-05-31" />
        );

        expect(screen.getByText('Number of FLR (Solar Flare) Over Time')).toBeInTheDocument();
        expect(screen.getByText('FLR (Solar Flare) from 2024-05-01 to 2024-05-31')).toBeInTheDocument();
        expect(container.querySelector('[data-chart-kind]')).toHaveAttribute('data-chart-kind', 'bar');
        expect(container.querySelectorAll('.recharts-bar-rectangle')).toHaveLength(2);
        expect(container.querySelector('.recharts-line')).toBeNull();
    });

    it('renders a line for storms', () => {
        const { container } = render(
            <EventChart series={[{ date: '2024-05-10', value: 4 }]} chart={selectChart(EVENT_CATALOG.GST)} />
        );

        expect(screen.getByText('Average Kp Index of GST (Geomagnetic Storm) Over Time')).toBeInTheDocument();
        expect(container.querySelector('[data-chart-kind]')).toHaveAttribute('data-chart-kind', 'line');
        expect(container.querySelector('.recharts-line')).not.toBeNull();
    });

    it('shows a placeholder instead of a chart when the series is empty', () => {
        const { container } = render(<EventChart series={[]} chart={selectChart(EVENT_CATALOG.CME)} />);

        expect(screen.getByText('No data available for the selected parameters.')).toBeInTheDocument();
        expect(container.querySelector('.recharts-wrapper')).toBeNull();
    });
});
