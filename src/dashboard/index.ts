/**
 * Dashboard module exports.
 *
 * Provides a terminal UI for watching a telemetry server.
 *
 * @example
 * ```typescript
 * import { TelemetryDashboard } from 'telemetry-link/dashboard';
 *
 * const dashboard = new TelemetryDashboard({ port: 8080, theme: 'light' });
 * await dashboard.start();
 * ```
 */

export { TelemetryDashboard } from './telemetry-dashboard.js';
export { ReadingHistory } from './history.js';
export type { HistoryEntry, FieldSummary, NumericField } from './history.js';
export {
  stepSamplingInterval,
  parseIntervalFromResponse,
  formatIntervalStatus,
} from './interval-control.js';
export type { IntervalStep } from './interval-control.js';
export type {
  DashboardConfig,
  DashboardOptions,
  DashboardTheme,
  ThemeName,
  EventLogEntry,
  EventSeverity,
} from './types.js';
export { DEFAULT_DASHBOARD_CONFIG, DARK_THEME, LIGHT_THEME, getTheme } from './types.js';
