import { useState, type ReactNode } from 'react';
import { ChevronDown, ChevronRight } from 'lucide-react';
import type { FlatRecord, TidyRow } from '../types';
import { collectColumns } from '../lib/normalizer';

const MAX_TABLE_ROWS = 200;

interface CollapsibleProps {
    title: string;
    meta?: string;
    children: ReactNode;
}

function Collapsible({ title, meta, children }: CollapsibleProps) {
    const [open, setOpen] = useState(false);

    return (
        <div className="border border-border rounded-lg bg-card overflow-hidden">
            <button
                type="button"
                onClick={() => setOpen(o => !o)}
                aria-expanded={open}
                className="w-full flex items-center justify-between px-4 py-3 text-sm font-medium hover:bg-muted/50 transition-colors"
            >
                <span className="flex items-center gap-2">
                    {open ? <ChevronDown className="h-4 w-4" /> : <ChevronRight className="h-4 w-4" />}
                    {title}
                </span>
                {meta && <span className="text-xs text-muted-foreground">{meta}</span>}
            </button>
            {open && <div className="border-t border-border p-4 max-h-[400px] overflow-auto custom-scrollbar">{children}</div>}
        </div>
    );
}

const formatCell = (value: unknown): string => {
    if (value === null || value === undefined) return '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
};

interface RawDataPanelProps {
    raw: unknown[];
    flatRecords: FlatRecord[];
    rows: TidyRow[];
    dateField: string | null;
}

export function RawDataPanel({ raw, flatRecords, rows, dateField }: RawDataPanelProps) {
    const columns = collectColumns(flatRecords);
    const shownRecords = flatRecords.slice(0, MAX_TABLE_ROWS);

    return (
        <div className="flex flex-col gap-3">
            <Collapsible title="Show Raw JSON Data" meta={`${raw.length} records`}>
                <pre className="text-xs font-mono whitespace-pre-wrap break-all">{JSON.stringify(raw, null, 2)}</pre>
            </Collapsible>

            <Collapsible title="Show Raw Data" meta={`${columns.length} columns`}>
                {flatRecords.length === 0 ? (
                    <p className="text-xs text-muted-foreground italic">No records.</p>
                ) : (
                    <table className="text-xs w-full">
                        <thead>
                            <tr>
                                {columns.map(column => (
                                    <th key={column} className="text-left font-semibold px-2 py-1 border-b border-border whitespace-nowrap">{column}</th>
                                ))}
                            </tr>
                        </thead>
                        <tbody>
                            {shownRecords.map((record, index) => (
                                <tr key={index} className="odd:bg-muted/30">
                                    {columns.map(column => (
                                        <td key={column} className="px-2 py-1 align-top max-w-xs truncate" title={formatCell(record[column])}>
                                            {formatCell(record[column])}
                                        </td>
                                    ))}
                                </tr>
                            ))}
                        </tbody>
                    </table>
                )}
                {flatRecords.length > MAX_TABLE_ROWS && (
                    <p className="text-xs text-muted-foreground mt-2">Showing first {MAX_TABLE_ROWS} of {flatRecords.length} records.</p>
                )}
            </Collapsible>

            <Collapsible title="Show Tidy Table" meta={dateField ? `date from '${dateField}'` : 'no date field'}>
                {rows.length === 0 ? (
                    <p className="text-xs text-muted-foreground italic">No rows with a valid date.</p>
                ) : (
                    <table className="text-xs">
                        <thead>
                            <tr>
                                <th className="text-left font-semibold px-2 py-1 border-b border-border">date</th>
                                <th className="text-right font-semibold px-2 py-1 border-b border-border">value</th>
                            </tr>
                        </thead>
                        <tbody>
                            {rows.slice(0, MAX_TABLE_ROWS).map((row, index) => (
                                <tr key={`${row.date}-${index}`} className="odd:bg-muted/30">
                                    <td className="px-2 py-1 font-mono">{row.date}</td>
                                    <td className="px-2 py-1 font-mono text-right">{row.value}</td>
                                </tr>
                            ))}
                        </tbody>
                    </table>
                )}
            </Collapsible>
        </div>
    );
}
