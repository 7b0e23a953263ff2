import type { ChartSpec, EventDescriptor } from '../types';

export function selectChart(descriptor: EventDescriptor): ChartSpec {
    return {
        kind: descriptor.chartKind,
        xLabel: 'Date',
        yLabel: descriptor.yLabel,
        title: descriptor.chartTitle
    };
}
