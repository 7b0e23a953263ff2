import { useState } from 'react';
import { ChevronDown, ChevronRight, Download, Eye, EyeOff, Loader2 } from 'lucide-react';
import type { EventCode } from '../types';
import { describe, isEventCode, listEvents } from '../lib/eventCatalog';
import { cn } from '../lib/utils';

export interface QueryFormErrors {
    apiKey?: string;
    dateRange?: string;
}

interface EventQueryFormProps {
    apiKey: string;
    eventCode: EventCode;
    dateRange: { start: string; end: string };
    errors: QueryFormErrors;
    loading: boolean;
    onApiKeyChange: (apiKey: string) => void;
    onEventCodeChange: (eventCode: EventCode) => void;
    onDateRangeChange: (range: { start: string; end: string }) => void;
    onSubmit: () => void;
}

export function EventQueryForm({
    apiKey,
    eventCode,
    dateRange,
    errors,
    loading,
    onApiKeyChange,
    onEventCodeChange,
    onDateRangeChange,
    onSubmit
}: EventQueryFormProps) {
    const [showKey, setShowKey] = useState(false);
    const [showInfo, setShowInfo] = useState(false);
    const descriptor = describe(eventCode);
    // Shown as soon as the dates are wrong, not only after a submit attempt.
    const rangeInverted = Boolean(dateRange.start && dateRange.end && dateRange.start > dateRange.end);
    const dateError = errors.dateRange ?? (rangeInverted ? 'End date must fall after start date.' : undefined);

    const handleSubmit = (e: React.FormEvent) => {
        e.preventDefault();
        onSubmit();
    };

    return (
        <form onSubmit={handleSubmit} className="space-y-5" noValidate>
            <div className="space-y-1">
                <label htmlFor="api-key" className="block text-sm font-medium">NASA API Key</label>
                <div className="relative">
                    <input
                        id="api-key"
                        type={showKey ? 'text' : 'password'}
                        value={apiKey}
                        onChange={(e) => onApiKeyChange(e.target.value)}
                        placeholder="Enter your NASA API Key"
                        aria-invalid={Boolean(errors.apiKey)}
                        className={cn(
                            "w-full px-3 py-2 pr-10 rounded-md border border-input bg-background text-sm",
                            errors.apiKey && "border-red-500"
                        )}
                    />
                    <button
                        type="button"
                        onClick={() => setShowKey(v => !v)}
                        title={showKey ? 'Hide key' : 'Show key'}
                        className="absolute right-3 top-1/2 -translate-y-1/2 text-muted-foreground hover:text-foreground"
                    >
                        {showKey ? <EyeOff className="h-4 w-4" /> : <Eye className="h-4 w-4" />}
                    </button>
                </div>
                {errors.apiKey ? (
                    <p role="alert" className="text-xs text-red-500">{errors.apiKey}</p>
                ) : (
                    <p className="text-xs text-muted-foreground">
                        DEMO_KEY works for a few requests per hour.{' '}
                        <a href="https://api.nasa.gov/" target="_blank" rel="noreferrer" className="underline hover:text-primary">
                            Get a free key
                        </a>
                    </p>
                )}
            </div>

            <div className="space-y-1">
                <label htmlFor="event-type" className="block text-sm font-medium">Space Weather Event Type</label>
                <select
                    id="event-type"
                    value={eventCode}
                    onChange={(e) => {
                        if (isEventCode(e.target.value)) onEventCodeChange(e.target.value);
                    }}
                    className="w-full px-3 py-2 rounded-md border border-input bg-background text-sm"
                >
                    {listEvents().map(event => (
                        <option key={event.code} value={event.code}>{event.displayName}</option>
                    ))}
                </select>
            </div>

            <div className="space-y-1">
                <span className="block text-sm font-medium">Date Range</span>
                <div className="flex gap-2">
                    <input
                        type="date"
                        aria-label="Start Date"
                        value={dateRange.start}
                        onChange={e => onDateRangeChange({ ...dateRange, start: e.target.value })}
                        className={cn("flex-1 px-3 py-2 rounded-md border border-input bg-background text-sm", dateError && "border-red-500")}
                    />
                    <input
                        type="date"
                        aria-label="End Date"
                        value={dateRange.end}
                        onChange={e => onDateRangeChange({ ...dateRange, end: e.target.value })}
                        className={cn("flex-1 px-3 py-2 rounded-md border border-input bg-background text-sm", dateError && "border-red-500")}
                    />
                </div>
                {dateError && <p role="alert" className="text-xs text-red-500">Error: {dateError}</p>}
            </div>

            <button
                type="submit"
                disabled={loading}
                className="w-full py-3 bg-primary text-primary-foreground font-medium rounded-lg hover:bg-primary/90 disabled:opacity-50 transition-all flex justify-center items-center gap-2 shadow-lg shadow-primary/25"
            >
                {loading ? <Loader2 className="animate-spin h-4 w-4" /> : <Download className="h-4 w-4" />}
                <span className="whitespace-nowrap">Fetch Data</span>
            </button>

            <div className="border border-border rounded-lg">
                <button
                    type="button"
                    onClick={() => setShowInfo(v => !v)}
                    aria-expanded={showInfo}
                    className="w-full flex items-center gap-2 px-3 py-2 text-sm font-medium hover:bg-muted/50 transition-colors"
                >
                    {showInfo ? <ChevronDown className="h-4 w-4" /> : <ChevronRight className="h-4 w-4" />}
                    What is this event?
                </button>
                {showInfo && (
                    <p className="px-3 pb-3 text-sm text-muted-foreground">{descriptor.description}</p>
                )}
            </div>
        </form>
    );
}
