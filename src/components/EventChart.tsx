import { ResponsiveContainer, BarChart, Bar, LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip } from 'recharts';
import { useMemo } from 'react';
import { formatDate } from '../lib/dateUtils';
import type { AggregatedSeries, ChartSpec } from '../types';

interface ChartProps {
    series: AggregatedSeries;
    chart: ChartSpec;
    subtitle?: string;
}

const SERIES_COLOR = 'hsl(var(--primary))';

const formatValue = (value: number) => (Number.isInteger(value) ? String(value) : value.toFixed(2));

export function EventChart({ series, chart, subtitle }: ChartProps) {
    // Stable y-axis with 10% headroom
    const maxY = useMemo(() => {
        const max = series.reduce((acc, point) => Math.max(acc, point.value), 0);
        return max > 0 ? max * 1.1 : 'auto';
    }, [series]);

    if (series.length === 0) {
        return (
            <div className="h-64 flex items-center justify-center text-muted-foreground border border-dashed border-border rounded-lg bg-muted/10">
                No data available for the selected parameters.
            </div>
        );
    }

    const xAxis = (
        <XAxis
            dataKey="date"
            tick={{ fontSize: 12 }}
            tickFormatter={(val) => formatDate(String(val))}
            minTickGap={30}
            label={{ value: chart.xLabel, position: 'insideBottom', offset: -4, fontSize: 12 }}
        />
    );
    const yAxis = (
        <YAxis
            tick={{ fontSize: 12 }}
            width={48}
            domain={[0, maxY]}
            allowDecimals={chart.kind === 'line'}
            label={{ value: chart.yLabel, angle: -90, position: 'insideLeft', fontSize: 12 }}
        />
    );
    const tooltip = (
        <Tooltip
            contentStyle={{ backgroundColor: 'hsl(var(--popover))', borderColor: 'hsl(var(--border))', borderRadius: 'var(--radius)' }}
            itemStyle={{ color: 'hsl(var(--foreground))' }}
            labelStyle={{ color: 'hsl(var(--muted-foreground))' }}
            labelFormatter={(label) => formatDate(String(label))}
            formatter={(value) => [formatValue(Number(value)), chart.yLabel]}
        />
    );

    return (
        <div className="bg-card border border-border rounded-lg p-4 shadow-sm">
            <h3 className="text-lg font-semibold">{chart.title}</h3>
            {subtitle && <p className="text-xs text-muted-foreground mb-2">{subtitle}</p>}
            <div className="h-[320px] w-full" data-chart-kind={chart.kind}>
                <ResponsiveContainer width="100%" height="100%">
                    {chart.kind === 'line' ? (
                        <LineChart data={series} margin={{ bottom: 12, left: 8 }}>
                            <CartesianGrid strokeDasharray="3 3" opacity={0.2} />
                            {xAxis}
                            {yAxis}
                            {tooltip}
                            <Line
                                type="monotone"
                                dataKey="value"
                                name={chart.yLabel}
                                stroke={SERIES_COLOR}
                                strokeWidth={2}
                                dot={{ r: 3 }}
                                isAnimationActive={false}
                            />
                        </LineChart>
                    ) : (
                        <BarChart data={series} margin={{ bottom: 12, left: 8 }}>
                            <CartesianGrid strokeDasharray="3 3" opacity={0.2} />
                            {xAxis}
                            {yAxis}
                            {tooltip}
                            <Bar
                                dataKey="value"
                                name={chart.yLabel}
                                fill={SERIES_COLOR}
                                radius={[2, 2, 0, 0]}
                                maxBarSize={50}
                                isAnimationActive={false}
                            />
                        </BarChart>
                    )}
                </ResponsiveContainer>
            </div>
        </div>
    );
}
