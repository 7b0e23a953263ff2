/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_DONKI_BASE_URL?: string;
    readonly VITE_NASA_API_KEY?: string;
    readonly VITE_CACHE_TTL_MINUTES?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
