import type { EventCode } from '../types';

export class MissingCredentialError extends Error {
    readonly field = 'apiKey';

    constructor(message = 'Please enter your NASA API Key to proceed.') {
        super(message);
        this.name = 'MissingCredentialError';
    }
}

export class InvalidDateRangeError extends Error {
    readonly field = 'dateRange';

    constructor(
        readonly startDate: string,
        readonly endDate: string,
        message = 'End date must fall after start date.'
    ) {
        super(message);
        this.name = 'InvalidDateRangeError';
    }
}

/**
 * Upstream answered with a non-success status, or never answered at all
 * (`status` is null for network errors and timeouts).
 */
export class HttpFailureError extends Error {
    constructor(
        readonly status: number | null,
        readonly body: string,
        readonly eventCode?: EventCode
    ) {
        super(status === null ? `Error fetching data: ${body}` : `Error fetching data: ${status} - ${body}`);
        this.name = 'HttpFailureError';
    }
}

export class UnknownEventKindError extends Error {
    constructor(readonly code: string) {
        super(`Unknown space weather event type: ${code}`);
        this.name = 'UnknownEventKindError';
    }
}

export type QueryInputError = MissingCredentialError | InvalidDateRangeError;
