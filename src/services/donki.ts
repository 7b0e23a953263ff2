import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { DataSource, DataSourceCapabilities, QueryParams } from '../types';
import { CACHE_TTL_MS, DONKI_BASE_URL } from '../lib/config';
import { HttpFailureError } from '../lib/errors';
import { toRequestParams } from '../lib/queryBuilder';
import http, { bodyToText, formatAxiosError, isSuccessStatus } from './http';

const CACHE_PREFIX = 'donki_cache_';

interface CacheEntry<T> {
    value: T;
    timestamp: number;
}

export const DONKI_CAPABILITIES: DataSourceCapabilities = {
    id: 'donki',
    name: 'NASA DONKI',
    requiresApiKey: true,
    description: 'Space Weather Database Of Notifications, Knowledge, Information'
};

export interface DonkiServiceOptions {
    client?: AxiosInstance;
    baseUrl?: string;
    cacheTtlMs?: number;
    now?: () => number;
}

/**
 * Bodies arrive as text; only successful ones are decoded. An empty body decodes to null.
 */
const parseJsonBody = (data: unknown, context: string): unknown => {
    if (typeof data !== 'string') return data;
    if (!data.trim()) return null;
    try {
        return JSON.parse(data);
    } catch (error) {
        console.warn(`[SpaceWeather] ${context} returned a body that is not JSON`, error);
        return null;
    }
};

export class DonkiService implements DataSource {
    static readonly ID = DONKI_CAPABILITIES.id;
    static readonly NAME = DONKI_CAPABILITIES.name;

    readonly id = DonkiService.ID;
    readonly name = DonkiService.NAME;
    readonly capabilities: DataSourceCapabilities = DONKI_CAPABILITIES;

    private readonly client: AxiosInstance;
    private readonly baseUrl: string;
    private readonly cacheTtlMs: number;
    private readonly now: () => number;

    constructor({ client = http, baseUrl = DONKI_BASE_URL, cacheTtlMs = CACHE_TTL_MS, now = Date.now }: DonkiServiceOptions = {}) {
        this.client = client;
        this.baseUrl = baseUrl;
        this.cacheTtlMs = cacheTtlMs;
        this.now = now;
    }

    private getCache<T>(key: string): T | null {
        try {
            const item = localStorage.getItem(CACHE_PREFIX + key);
            if (!item) return null;

            const entry: CacheEntry<T> = JSON.parse(item);
            if (this.now() - entry.timestamp > this.cacheTtlMs) {
                localStorage.removeItem(CACHE_PREFIX + key);
                return null;
            }
            return entry.value;
        } catch {
            return null;
        }
    }

    private setCache<T>(key: string, value: T) {
        if (this.cacheTtlMs <= 0) return;
        try {
            const entry: CacheEntry<T> = {
                value,
                timestamp: this.now()
            };
            localStorage.setItem(CACHE_PREFIX + key, JSON.stringify(entry));
        } catch (e) {
            console.warn('[SpaceWeather] Cache write failed', e);
        }
    }

    private async request(url: string, params: QueryParams): Promise<AxiosResponse<unknown>> {
        try {
            // Status handling happens in fetchEvents, and the body stays text so
            // error bodies reach the user exactly as sent.
            return await this.client.get<unknown>(url, {
                params: toRequestParams(params),
                responseType: 'text',
                validateStatus: () => true
            });
        } catch (error) {
            if (!axios.isAxiosError(error)) throw error;
            console.error(`[SpaceWeather] ${params.eventCode} request failed`, error);
            throw new HttpFailureError(null, formatAxiosError(error, `DONKI ${params.eventCode}`), params.eventCode);
        }
    }

    /**
     * One GET per call, no retries. Identical (event, start, end, key) tuples are
     * answered from the local cache while the entry is younger than the TTL.
     */
    async fetchEvents(params: QueryParams): Promise<unknown[]> {
        const { eventCode, startDate, endDate, apiKey } = params;
        const cacheKey = `${eventCode}_${startDate}_${endDate}_${apiKey}`;
        const cached = this.getCache<unknown[]>(cacheKey);
        if (cached) {
            console.log(`[SpaceWeather] Serving ${eventCode} ${startDate}..${endDate} from cache`);
            return cached;
        }

        const url = `${this.baseUrl}/${encodeURIComponent(eventCode)}`;

        const response = await this.request(url, params);

        if (!isSuccessStatus(response.status)) {
            const body = bodyToText(response.data);
            console.error(`[SpaceWeather] ${eventCode} request returned ${response.status}`, body);
            throw new HttpFailureError(response.status, body, eventCode);
        }

        // DONKI answers an empty body instead of [] for some empty windows.
        const decoded = parseJsonBody(response.data, eventCode);
        const records = Array.isArray(decoded) ? decoded : [];
        if (!Array.isArray(decoded)) {
            console.warn(`[SpaceWeather] ${eventCode} returned a non-array body; treating as no data`);
        }

        this.setCache(cacheKey, records);
        return records;
    }
}
