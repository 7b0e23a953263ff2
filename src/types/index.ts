export type { DataSource, DataSourceCapabilities } from './data-source';

export const EVENT_CODES = ['CME', 'GST', 'FLR', 'SEP', 'IPS', 'RBE', 'MPC', 'HSS', 'notifications'] as const;

export type EventCode = typeof EVENT_CODES[number];

export type ChartKind = 'line' | 'bar';

export type Reduction = 'count' | 'mean';

export type QueryParamValue = string | number;

/**
 * Nested list inside a record whose entries each become their own tidy row
 * (e.g. the per-window Kp readings of a geomagnetic storm).
 */
export interface SubReadingSpec {
    field: string;
    dateField: string;
    valueField: string;
}

export interface EventDescriptor {
    code: EventCode;
    displayName: string;
    description: string;
    dateField: string;
    yLabel: string;
    chartKind: ChartKind;
    chartTitle: string;
    reduction: Reduction;
    extraParams: Readonly<Record<string, QueryParamValue>>;
    subReadings?: SubReadingSpec;
}

export interface QueryParams {
    eventCode: EventCode;
    startDate: string; // yyyy-MM-dd
    endDate: string; // yyyy-MM-dd
    apiKey: string;
    extra: Record<string, QueryParamValue>;
}

export type RawRecord = Record<string, unknown>;

export type FlatRecord = Record<string, unknown>;

export interface TidyRow {
    date: string; // yyyy-MM-dd
    value: number;
}

export interface SeriesPoint {
    date: string;
    value: number;
}

export type AggregatedSeries = SeriesPoint[];

export interface ChartSpec {
    kind: ChartKind;
    xLabel: 'Date';
    yLabel: string;
    title: string;
}

export type PipelineWarning =
    | { kind: 'NoDateFieldFound'; message: string }
    | { kind: 'DateFieldFallback'; field: string; message: string }
    | { kind: 'MissingSubfield'; field: string; records: number; message: string };

export interface NormalizeResult {
    rows: TidyRow[];
    dateField: string | null;
    invalidCount: number;
    warnings: PipelineWarning[];
    flatRecords: FlatRecord[];
}
