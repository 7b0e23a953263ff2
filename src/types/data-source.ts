import type { QueryParams } from './index';

export interface DataSourceCapabilities {
    id: string;
    name: string;
    requiresApiKey: boolean;
    description?: string;
}

export interface DataSource {
    readonly id: string;
    readonly name: string;
    readonly capabilities: DataSourceCapabilities;

    /** The upstream JSON array exactly as received; entries are not guaranteed to be objects. */
    fetchEvents(params: QueryParams): Promise<unknown[]>;
}
