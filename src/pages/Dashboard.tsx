import { useMemo, useRef, useState } from 'react';
import { AlertTriangle, Download, FileJson, XCircle } from 'lucide-react';

import { EventQueryForm, type QueryFormErrors } from '../components/EventQueryForm';
import { EventChart } from '../components/EventChart';
import { RawDataPanel } from '../components/RawDataPanel';
import { StatusCenter, type StatusTask } from '../components/StatusCenter';
import { usePreferences } from '../hooks/usePreferences';
import { DEFAULT_RANGE_DAYS } from '../lib/config';
import { defaultDateRange } from '../lib/dateUtils';
import { describe } from '../lib/eventCatalog';
import type { QueryInputError } from '../lib/errors';
import { downloadRawJSON, downloadSeriesCSV } from '../lib/export';
import { cn } from '../lib/utils';
import { createDataSource } from '../services/dataSourceFactory';
import { runEventQuery, type EventQueryResult } from '../services/pipeline';
import type { DataSource, EventCode } from '../types';

type DisplayedResult = Exclude<EventQueryResult, { status: 'invalid' }>;

interface DashboardProps {
    dataSource?: DataSource;
}

const FETCH_TASK_PREFIX = 'fetch-events';

const toFormErrors = (issues: QueryInputError[]): QueryFormErrors => {
    const errors: QueryFormErrors = {};
    issues.forEach(issue => {
        errors[issue.field] = issue.message;
    });
    return errors;
};

export function Dashboard({ dataSource }: DashboardProps) {
    const { preferences, setApiKey, setEventCode } = usePreferences();
    const source = useMemo(() => dataSource ?? createDataSource(), [dataSource]);

    const [dateRange, setDateRange] = useState(() => defaultDateRange(new Date(), DEFAULT_RANGE_DAYS));
    const [loading, setLoading] = useState(false);
    const [formErrors, setFormErrors] = useState<QueryFormErrors>({});
    const [result, setResult] = useState<DisplayedResult | null>(null);
    const [statusTasks, setStatusTasks] = useState<StatusTask[]>([]);
    const fetchCount = useRef(0);

    // Parameters of the last completed fetch, to flag when the inputs have moved on
    const [lastFetchedParams, setLastFetchedParams] = useState<{
        eventCode: EventCode;
        dateRange: { start: string; end: string };
    } | null>(null);

    const dismissTask = (id: string) => setStatusTasks(prev => prev.filter(t => t.id !== id));

    // Each fetch owns its toast, so a late timer from an earlier fetch cannot clear a newer one.
    const finishTask = (taskId: string, message: string, status: 'success' | 'error', clearAfterMs: number) => {
        setStatusTasks(prev => prev.map(t => t.id === taskId ? { ...t, message, status } : t));
        setTimeout(() => dismissTask(taskId), clearAfterMs);
    };

    const handleFetchData = async () => {
        const eventCode = preferences.eventCode;
        const descriptor = describe(eventCode);
        fetchCount.current += 1;
        const taskId = `${FETCH_TASK_PREFIX}-${fetchCount.current}`;

        setLoading(true);
        setFormErrors({});
        setStatusTasks(prev => [
            ...prev.filter(t => !t.id.startsWith(FETCH_TASK_PREFIX)),
            { id: taskId, message: 'Fetching data...', status: 'pending' }
        ]);

        try {
            const outcome = await runEventQuery({
                eventCode,
                startDate: dateRange.start,
                endDate: dateRange.end,
                apiKey: preferences.apiKey
            }, source);

            if (outcome.status === 'invalid') {
                setFormErrors(toFormErrors(outcome.issues));
                dismissTask(taskId);
                return;
            }

            setResult(outcome);
            setLastFetchedParams({ eventCode, dateRange: { ...dateRange } });

            if (outcome.status === 'failed') {
                finishTask(taskId, `Failed to fetch ${descriptor.displayName} data`, 'error', 5000);
            } else if (outcome.series.length === 0) {
                finishTask(taskId, 'No events found for the selected parameters', 'success', 3000);
            } else {
                finishTask(taskId, 'Data fetched successfully!', 'success', 3000);
            }
        } catch (error) {
            console.error('[SpaceWeather] Pipeline failed', error);
            finishTask(taskId, 'Unexpected error while processing the data', 'error', 5000);
        } finally {
            setLoading(false);
        }
    };

    const fetchStatus = useMemo(() => {
        if (!lastFetchedParams || !result) return 'idle';
        if (result.status === 'failed') return 'failed';

        const changed = preferences.eventCode !== lastFetchedParams.eventCode ||
            dateRange.start !== lastFetchedParams.dateRange.start ||
            dateRange.end !== lastFetchedParams.dateRange.end;
        if (changed) return 'stale';

        return result.series.length === 0 ? 'empty' : 'fresh';
    }, [result, lastFetchedParams, preferences.eventCode, dateRange]);

    return (
        <div className="flex flex-col bg-background p-4 md:p-6 md:pb-8 gap-6 h-full w-full">
            <StatusCenter tasks={statusTasks} onDismiss={dismissTask} />

            <div className="flex flex-col lg:flex-row gap-6">
                {/* Left Column: Configuration */}
                <section className="lg:w-[340px] shrink-0 bg-card border border-border rounded-xl p-5 shadow-sm space-y-4 self-start">
                    <h2 className="font-semibold text-lg">Configuration</h2>
                    <EventQueryForm
                        apiKey={preferences.apiKey}
                        eventCode={preferences.eventCode}
                        dateRange={dateRange}
                        errors={formErrors}
                        loading={loading}
                        onApiKeyChange={(key) => {
                            setApiKey(key);
                            setFormErrors(prev => ({ ...prev, apiKey: undefined }));
                        }}
                        onEventCodeChange={setEventCode}
                        onDateRangeChange={(range) => {
                            setDateRange(range);
                            setFormErrors(prev => ({ ...prev, dateRange: undefined }));
                        }}
                        onSubmit={handleFetchData}
                    />

                    {fetchStatus !== 'idle' && (
                        <div className={cn(
                            "flex items-center gap-2 px-3 py-2 rounded-lg text-xs font-medium border",
                            fetchStatus === 'fresh' && "bg-emerald-50 text-emerald-700 border-emerald-100 dark:bg-emerald-900/20 dark:text-emerald-400 dark:border-emerald-800",
                            fetchStatus === 'stale' && "bg-amber-50 text-amber-700 border-amber-100 dark:bg-amber-900/20 dark:text-amber-400 dark:border-amber-800",
                            fetchStatus === 'empty' && "bg-muted text-muted-foreground border-border",
                            fetchStatus === 'failed' && "bg-red-50 text-red-700 border-red-100 dark:bg-red-900/20 dark:text-red-400 dark:border-red-800"
                        )}>
                            <div className={cn(
                                "w-2 h-2 rounded-full shrink-0",
                                fetchStatus === 'fresh' && "bg-emerald-500 animate-pulse",
                                fetchStatus === 'stale' && "bg-amber-500",
                                fetchStatus === 'empty' && "bg-gray-400",
                                fetchStatus === 'failed' && "bg-red-500"
                            )} />
                            {fetchStatus === 'fresh' && "Data Ready"}
                            {fetchStatus === 'stale' && "Update Needed: parameters changed"}
                            {fetchStatus === 'empty' && "No Results: try different dates"}
                            {fetchStatus === 'failed' && "Last request failed"}
                        </div>
                    )}
                </section>

                {/* Right Column: Results */}
                <section className="flex-1 min-w-0 flex flex-col gap-6">
                    {!result && (
                        <div className="h-64 flex items-center justify-center text-muted-foreground text-sm italic border border-dashed border-border rounded-xl bg-muted/20 p-6 text-center">
                            Choose an event type and date range, then press Fetch Data.
                        </div>
                    )}

                    {result?.status === 'failed' && (
                        <div role="alert" className="flex items-start gap-3 p-4 rounded-lg border border-red-200 bg-red-50 text-red-700 dark:bg-red-950/20 dark:text-red-400">
                            <XCircle className="h-5 w-5 shrink-0 mt-0.5" />
                            <p className="text-sm break-all">{result.error.message}</p>
                        </div>
                    )}

                    {result?.status === 'success' && (
                        <>
                            <div className="space-y-1">
                                <h2 className="text-xl font-semibold">Selected Event Information</h2>
                                <p className="text-sm text-muted-foreground">{result.descriptor.description}</p>
                            </div>

                            {result.warnings.length > 0 && (
                                <ul className="space-y-2">
                                    {result.warnings.map(warning => (
                                        <li
                                            key={warning.kind}
                                            className="flex items-center gap-2 px-3 py-2 rounded-lg text-sm border bg-amber-50 text-amber-700 border-amber-100 dark:bg-amber-900/20 dark:text-amber-400 dark:border-amber-800"
                                        >
                                            <AlertTriangle className="h-4 w-4 shrink-0" />
                                            {warning.message}
                                        </li>
                                    ))}
                                </ul>
                            )}

                            <EventChart
                                series={result.series}
                                chart={result.chart}
                                subtitle={`${result.descriptor.displayName} from ${result.params.startDate} to ${result.params.endDate}`}
                            />

                            <div className="flex items-center justify-between px-2 gap-3 flex-wrap">
                                <span className="text-xs text-muted-foreground">
                                    {result.raw.length} records loaded, {result.normalized.rows.length} rows charted
                                    {result.normalized.invalidCount > 0 && `, ${result.normalized.invalidCount} skipped without a valid date`}
                                </span>
                                {result.series.length > 0 && (
                                    <div className="flex gap-2">
                                        <button
                                            onClick={() => downloadSeriesCSV(result.params, result.chart, result.series)}
                                            className="px-4 py-2 border border-border bg-background hover:bg-accent text-accent-foreground text-sm font-medium rounded-lg transition-colors flex items-center gap-2"
                                        >
                                            <Download className="h-4 w-4" /> Download .csv
                                        </button>
                                        <button
                                            onClick={() => downloadRawJSON(result.params, result.raw)}
                                            className="px-4 py-2 border border-border bg-background hover:bg-accent text-accent-foreground text-sm font-medium rounded-lg transition-colors flex items-center gap-2"
                                        >
                                            <FileJson className="h-4 w-4" /> Download .json
                                        </button>
                                    </div>
                                )}
                            </div>

                            <RawDataPanel
                                raw={result.raw}
                                flatRecords={result.normalized.flatRecords}
                                rows={result.normalized.rows}
                                dateField={result.normalized.dateField}
                            />
                        </>
                    )}
                </section>
            </div>
        </div>
    );
}
