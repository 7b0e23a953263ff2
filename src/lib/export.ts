import { saveAs } from 'file-saver';
import type { AggregatedSeries, ChartSpec, QueryParams } from '../types';

const escapeCsvField = (value: string) =>
    /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

// Keep filenames to [A-Za-z0-9_-]
const safeName = (value: string) => value.replace(/[^a-z0-9-]/gi, '_').replace(/_+/g, '_');

export function seriesFilename(params: Pick<QueryParams, 'eventCode' | 'startDate' | 'endDate'>, extension: string): string {
    return `${safeName(params.eventCode)}_${params.startDate}_${params.endDate}.${extension}`;
}

export function seriesToCSV(chart: ChartSpec, series: AggregatedSeries): string {
    const headers = [chart.xLabel, chart.yLabel].map(escapeCsvField).join(',');
    const rows = series.map(point => `${point.date},${Number.isInteger(point.value) ? point.value : point.value.toFixed(2)}`);
    return [headers, ...rows].join('\n');
}

export function downloadSeriesCSV(params: QueryParams, chart: ChartSpec, series: AggregatedSeries) {
    const content = seriesToCSV(chart, series);
    // Add BOM for Excel compatibility
    const blob = new Blob(['\uFEFF' + content], { type: 'text/csv;charset=utf-8' });
    saveAs(blob, seriesFilename(params, 'csv'));
}

export function downloadRawJSON(params: QueryParams, raw: unknown[]) {
    const blob = new Blob([JSON.stringify(raw, null, 2)], { type: 'application/json;charset=utf-8' });
    saveAs(blob, seriesFilename(params, 'json'));
}
