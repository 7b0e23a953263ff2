import type { EventCode, QueryParams, QueryParamValue } from '../types';
import { describe } from './eventCatalog';
import { toIsoDate } from './dateUtils';
import { InvalidDateRangeError, MissingCredentialError, type QueryInputError } from './errors';

export interface QueryInput {
    eventCode: EventCode;
    startDate: string | Date;
    endDate: string | Date;
    apiKey: string;
}

const describeDate = (value: string | Date) => (value instanceof Date ? value.toISOString() : value);

/**
 * Collects every problem with the form input so each can be shown next to its field.
 * An empty list means buildQuery will succeed.
 */
export function validateQueryInput({ startDate, endDate, apiKey }: Omit<QueryInput, 'eventCode'>): QueryInputError[] {
    const issues: QueryInputError[] = [];

    if (!apiKey.trim()) {
        issues.push(new MissingCredentialError());
    }

    const start = toIsoDate(startDate);
    const end = toIsoDate(endDate);
    if (!start || !end) {
        issues.push(new InvalidDateRangeError(describeDate(startDate), describeDate(endDate), 'Start and end must be valid dates.'));
    } else if (start > end) {
        issues.push(new InvalidDateRangeError(start, end));
    }

    return issues;
}

export function buildQuery(code: EventCode, startDate: string | Date, endDate: string | Date, apiKey: string): QueryParams {
    const descriptor = describe(code);

    const start = toIsoDate(startDate);
    const end = toIsoDate(endDate);
    if (!start || !end) {
        throw new InvalidDateRangeError(describeDate(startDate), describeDate(endDate), 'Start and end must be valid dates.');
    }
    if (start > end) {
        throw new InvalidDateRangeError(start, end);
    }
    if (!apiKey.trim()) {
        throw new MissingCredentialError();
    }

    return {
        eventCode: descriptor.code,
        startDate: start,
        endDate: end,
        apiKey: apiKey.trim(),
        extra: { ...descriptor.extraParams }
    };
}

/**
 * Wire-level query string for the DONKI endpoint.
 */
export function toRequestParams(params: QueryParams): Record<string, QueryParamValue> {
    return {
        startDate: params.startDate,
        endDate: params.endDate,
        api_key: params.apiKey,
        ...params.extra
    };
}
