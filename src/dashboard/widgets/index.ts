/**
 * Dashboard widgets module.
 */

export type { Widget, Grid, GridPosition, WidgetConfig } from './types.js';
export { BaseWidget } from './types.js';

export { ReadingsTableWidget, buildReadingRows, READINGS_HEADERS } from './readings-table.js';
export type { ReadingsTableData } from './readings-table.js';

export { TrendChartWidget, buildTrendSeries, TREND_FIELDS } from './trend-chart.js';
export type { TrendChartData, TrendSeries } from './trend-chart.js';

export { UsageGaugeWidget, usageLevel, USAGE_THRESHOLDS } from './usage-gauge.js';
export type { UsageGaugeData, UsageGaugeConfig, UsageLevel } from './usage-gauge.js';

export { EventLogWidget } from './event-log.js';
export type { LogEvent, EventLogConfig } from './event-log.js';
