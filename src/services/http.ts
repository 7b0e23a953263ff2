import axios from 'axios';

const DEFAULT_TIMEOUT_MS = 10000;

const http = axios.create({
    timeout: DEFAULT_TIMEOUT_MS
});

export const formatAxiosError = (error: unknown, context: string) => {
    if (!axios.isAxiosError(error)) {
        return `${context}: Unexpected error.`;
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return `${context}: Request timed out.`;
    }
    const status = error.response?.status;
    const statusText = error.response?.statusText ?? 'Unknown error';
    return `${context}: ${status ? `${status} ${statusText}` : 'Network/timeout error'}.`;
};

/**
 * Renders a response body as text so error bodies can be shown to the user verbatim.
 * Text bodies pass through untouched; only already-decoded bodies are serialized.
 */
export const bodyToText = (data: unknown): string => {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data;
    try {
        return JSON.stringify(data);
    } catch {
        return String(data);
    }
};

export const isSuccessStatus = (status: number) => status >= 200 && status < 300;

export default http;
