import type {
    AggregatedSeries,
    ChartSpec,
    DataSource,
    EventDescriptor,
    NormalizeResult,
    PipelineWarning,
    QueryParams,
    RawRecord
} from '../types';
import { aggregate } from '../lib/aggregator';
import { selectChart } from '../lib/chartSelector';
import { describe } from '../lib/eventCatalog';
import { HttpFailureError, type QueryInputError } from '../lib/errors';
import { isRecord, normalize } from '../lib/normalizer';
import { buildQuery, validateQueryInput, type QueryInput } from '../lib/queryBuilder';

export type EventQueryResult =
    | { status: 'invalid'; issues: QueryInputError[] }
    | { status: 'failed'; error: HttpFailureError }
    | {
        status: 'success';
        descriptor: EventDescriptor;
        params: QueryParams;
        raw: unknown[];
        records: RawRecord[];
        normalized: NormalizeResult;
        series: AggregatedSeries;
        chart: ChartSpec;
        warnings: PipelineWarning[];
    };

/**
 * build -> fetch -> normalize -> aggregate -> select, for one user action.
 * Input problems stop the run before any request; an HTTP failure stops it before
 * normalisation. Anything else unexpected propagates to the caller.
 */
export async function runEventQuery(input: QueryInput, dataSource: DataSource): Promise<EventQueryResult> {
    const issues = validateQueryInput(input);
    if (issues.length > 0) {
        return { status: 'invalid', issues };
    }

    const descriptor = describe(input.eventCode);
    const params = buildQuery(descriptor.code, input.startDate, input.endDate, input.apiKey);

    let raw: unknown[];
    try {
        raw = await dataSource.fetchEvents(params);
    } catch (error) {
        if (error instanceof HttpFailureError) {
            return { status: 'failed', error };
        }
        throw error;
    }

    // Non-object entries stay in `raw` for inspection but cannot be charted.
    const records = raw.filter(isRecord);
    const normalized = normalize(records, descriptor);
    const series = aggregate(normalized.rows, descriptor);

    return {
        status: 'success',
        descriptor,
        params,
        raw,
        records,
        normalized,
        series,
        chart: selectChart(descriptor),
        warnings: normalized.warnings
    };
}
