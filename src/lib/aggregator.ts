import type { AggregatedSeries, EventDescriptor, TidyRow } from '../types';

/**
 * Groups tidy rows by calendar date and reduces each group to a count or a mean,
 * depending on the event type. Dates without rows are left out (no zero-fill).
 */
export function aggregate(rows: TidyRow[], descriptor: Pick<EventDescriptor, 'reduction'>): AggregatedSeries {
    const groups = new Map<string, { sum: number; count: number }>();

    rows.forEach(row => {
        const group = groups.get(row.date) ?? { sum: 0, count: 0 };
        group.sum += row.value;
        group.count += 1;
        groups.set(row.date, group);
    });

    return Array.from(groups.entries())
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([date, { sum, count }]) => ({
            date,
            value: descriptor.reduction === 'mean' ? sum / count : count
        }));
}
