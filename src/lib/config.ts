const DEFAULT_BASE_URL = 'https://api.nasa.gov/DONKI';
const DEFAULT_CACHE_TTL_MINUTES = 60;

const parseMinutes = (raw: string | undefined): number => {
    const minutes = Number(raw);
    return raw && Number.isFinite(minutes) && minutes >= 0 ? minutes : DEFAULT_CACHE_TTL_MINUTES;
};

export const DONKI_BASE_URL = (import.meta.env.VITE_DONKI_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, '');

// NASA's shared, rate-limited key. Users are expected to paste their own.
export const DEFAULT_API_KEY = import.meta.env.VITE_NASA_API_KEY || 'DEMO_KEY';

export const CACHE_TTL_MS = parseMinutes(import.meta.env.VITE_CACHE_TTL_MINUTES) * 60 * 1000;

export const DEFAULT_RANGE_DAYS = 30;
