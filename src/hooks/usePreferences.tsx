import { createContext, useContext, useEffect, useState, type ReactNode } from 'react';
import type { EventCode } from '../types';
import { DEFAULT_API_KEY } from '../lib/config';
import { isEventCode } from '../lib/eventCatalog';

const STORAGE_KEY = 'space_weather_prefs';

export interface Preferences {
    apiKey: string;
    eventCode: EventCode;
    darkMode: boolean;
}

const DEFAULT_PREFS: Preferences = {
    apiKey: DEFAULT_API_KEY,
    eventCode: 'CME',
    darkMode: true
};

const isStoredPreferences = (value: unknown): value is Partial<Record<keyof Preferences, unknown>> => {
    return typeof value === 'object' && value !== null;
};

const withDefaults = (stored: unknown): Preferences => {
    if (!isStoredPreferences(stored)) return DEFAULT_PREFS;

    return {
        apiKey: typeof stored.apiKey === 'string' ? stored.apiKey : DEFAULT_PREFS.apiKey,
        eventCode: isEventCode(stored.eventCode) ? stored.eventCode : DEFAULT_PREFS.eventCode,
        darkMode: typeof stored.darkMode === 'boolean' ? stored.darkMode : DEFAULT_PREFS.darkMode
    };
};

interface PreferencesContextValue {
    preferences: Preferences;
    setApiKey: (apiKey: string) => void;
    setEventCode: (eventCode: EventCode) => void;
    toggleDarkMode: () => void;
}

const PreferencesContext = createContext<PreferencesContextValue | null>(null);

export function PreferencesProvider({ children }: { children: ReactNode }) {
    const [prefs, setPrefs] = useState<Preferences>(() => {
        try {
            const stored = localStorage.getItem(STORAGE_KEY);
            return stored ? withDefaults(JSON.parse(stored)) : DEFAULT_PREFS;
        } catch {
            return DEFAULT_PREFS;
        }
    });

    useEffect(() => {
        localStorage.setItem(STORAGE_KEY, JSON.stringify(prefs));
        if (prefs.darkMode) {
            document.documentElement.classList.add('dark');
        } else {
            document.documentElement.classList.remove('dark');
        }
    }, [prefs]);

    const setApiKey = (apiKey: string) => setPrefs(p => ({ ...p, apiKey }));
    const setEventCode = (eventCode: EventCode) => setPrefs(p => ({ ...p, eventCode }));
    const toggleDarkMode = () => setPrefs(p => ({ ...p, darkMode: !p.darkMode }));

    return (
        <PreferencesContext.Provider value={{ preferences: prefs, setApiKey, setEventCode, toggleDarkMode }}>
            {children}
        </PreferencesContext.Provider>
    );
}

// Hooks are exported from this module alongside the provider for convenience in consumers.
// eslint-disable-next-line react-refresh/only-export-components
export function usePreferences() {
    const context = useContext(PreferencesContext);
    if (!context) {
        throw new Error('usePreferences must be used within a PreferencesProvider');
    }
    return context;
}
