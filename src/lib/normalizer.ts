import type { EventDescriptor, FlatRecord, NormalizeResult, PipelineWarning, RawRecord, SubReadingSpec, TidyRow } from '../types';
import { parseCalendarDate } from './dateUtils';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const isRecord = (value: unknown): value is RawRecord => isPlainObject(value);

/**
 * Flattens nested objects into dotted keys ("instruments.displayName" style).
 * Arrays are kept as values, so lists such as `allKpIndex` or `linkedEvents` stay intact.
 */
export function flattenRecord(record: RawRecord, prefix = ''): FlatRecord {
    const flat: FlatRecord = {};
    Object.entries(record).forEach(([key, value]) => {
        const path = prefix ? `${prefix}.${key}` : key;
        if (isPlainObject(value) && Object.keys(value).length > 0) {
            Object.assign(flat, flattenRecord(value, path));
        } else {
            flat[path] = value;
        }
    });
    return flat;
}

/**
 * Column names across all records, in order of first appearance.
 */
export function collectColumns(records: FlatRecord[]): string[] {
    const columns = new Set<string>();
    records.forEach(record => Object.keys(record).forEach(key => columns.add(key)));
    return Array.from(columns);
}

/**
 * Picks the column holding each record's date. Prefers the descriptor's field; otherwise
 * guesses the first column whose name mentions "date" or "time". The guess is best-effort
 * and can pick the wrong column (e.g. a submission time instead of an event time).
 */
export function resolveDateField(
    columns: string[],
    descriptor: EventDescriptor
): { field: string | null; warning?: PipelineWarning } {
    if (columns.includes(descriptor.dateField)) {
        return { field: descriptor.dateField };
    }

    const guess = columns.find(column => {
        const lower = column.toLowerCase();
        return lower.includes('date') || lower.includes('time');
    });

    if (guess) {
        return {
            field: guess,
            warning: {
                kind: 'DateFieldFallback',
                field: guess,
                message: `Using '${guess}' as the date field`
            }
        };
    }

    return {
        field: null,
        warning: {
            kind: 'NoDateFieldFound',
            message: 'No suitable date field found in the data'
        }
    };
}

function explodeSubReadings(records: RawRecord[], readingSpec: SubReadingSpec): { rows: TidyRow[]; invalidCount: number; missing: number } {
    const rows: TidyRow[] = [];
    let invalidCount = 0;
    let missing = 0;

    records.forEach(record => {
        const readings = record[readingSpec.field];
        if (!Array.isArray(readings)) {
            missing += 1;
            return;
        }

        readings.forEach(reading => {
            if (!isPlainObject(reading)) {
                invalidCount += 1;
                return;
            }
            const date = parseCalendarDate(reading[readingSpec.dateField]);
            const raw = reading[readingSpec.valueField];
            const value = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() ? Number(raw) : NaN;

            if (!date || !Number.isFinite(value)) {
                invalidCount += 1;
                return;
            }
            rows.push({ date, value });
        });
    });

    return { rows, invalidCount, missing };
}

/**
 * Converts the upstream JSON array into tidy (date, value) rows.
 * Never throws on bad data: unparseable dates are dropped and counted, and
 * structural problems are reported as warnings.
 */
export function normalize(records: RawRecord[], descriptor: EventDescriptor): NormalizeResult {
    if (records.length === 0) {
        return { rows: [], dateField: null, invalidCount: 0, warnings: [], flatRecords: [] };
    }

    const flatRecords = records.map(record => flattenRecord(record));
    const warnings: PipelineWarning[] = [];

    if (descriptor.subReadings) {
        const readingSpec = descriptor.subReadings;
        const { rows, invalidCount, missing } = explodeSubReadings(records, readingSpec);
        if (missing > 0) {
            warnings.push({
                kind: 'MissingSubfield',
                field: readingSpec.field,
                records: missing,
                message: `No '${readingSpec.field}' data available for ${missing} of ${records.length} records.`
            });
        }
        return { rows, dateField: `${readingSpec.field}.${readingSpec.dateField}`, invalidCount, warnings, flatRecords };
    }

    const { field, warning } = resolveDateField(collectColumns(flatRecords), descriptor);
    if (warning) warnings.push(warning);

    if (!field) {
        return { rows: [], dateField: null, invalidCount: records.length, warnings, flatRecords };
    }

    const rows: TidyRow[] = [];
    let invalidCount = 0;
    flatRecords.forEach(record => {
        const date = parseCalendarDate(record[field]);
        if (date) {
            rows.push({ date, value: 1 });
        } else {
            invalidCount += 1;
        }
    });

    return { rows, dateField: field, invalidCount, warnings, flatRecords };
}
