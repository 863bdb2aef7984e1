/**
 * Dashboard type definitions.
 *
 * Defines configuration options, themes, and internal types
 * for the terminal telemetry dashboard.
 */

import {
  DEFAULT_CONNECTION_CONFIG,
  type TelemetryConnectionConfig,
} from '../client/telemetry-connection.js';

/**
 * Dashboard color theme configuration.
 */
export interface DashboardTheme {
  /** Primary accent color for borders and highlights */
  readonly primary: string;
  /** Secondary color for less prominent elements */
  readonly secondary: string;
  /** Color for healthy readings and successful commands */
  readonly success: string;
  /** Color for warning states */
  readonly warning: string;
  /** Color for errors and critical readings */
  readonly error: string;
  /** Default text color */
  readonly text: string;
  /** Muted text color for secondary information */
  readonly textMuted: string;
  /** Background color */
  readonly background: string;
}

/**
 * Available color themes.
 */
export type ThemeName = 'dark' | 'light';

/**
 * Dashboard configuration options.
 */
export interface DashboardConfig extends TelemetryConnectionConfig {
  /**
   * Color theme to use.
   * @default 'dark'
   */
  readonly theme: ThemeName;

  /**
   * Maximum number of events to keep in the event log.
   * @default 100
   */
  readonly maxEventLogSize: number;

  /**
   * Number of samples kept for the trend chart.
   * @default 60
   */
  readonly historySize: number;
}

/**
 * Partial configuration options for user customization.
 */
export type DashboardOptions = Partial<DashboardConfig>;

/**
 * Event log severity.
 */
export type EventSeverity = 'info' | 'success' | 'warning' | 'error';

/**
 * Internal event log entry.
 */
export interface EventLogEntry {
  /** Unix timestamp when the event occurred */
  readonly timestamp: number;
  /** Event message */
  readonly message: string;
  /** Severity level for coloring */
  readonly severity: EventSeverity;
}

/**
 * Default configuration values.
 */
export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
  ...DEFAULT_CONNECTION_CONFIG,
  theme: 'dark',
  maxEventLogSize: 100,
  historySize: 60,
};

/**
 * Dark theme color palette.
 */
export const DARK_THEME: DashboardTheme = {
  primary: 'cyan',
  secondary: 'blue',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  text: 'white',
  textMuted: 'gray',
  background: 'black',
} as const;

/**
 * Light theme color palette.
 */
export const LIGHT_THEME: DashboardTheme = {
  primary: 'blue',
  secondary: 'cyan',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  text: 'black',
  textMuted: 'gray',
  background: 'white',
} as const;

/**
 * Get theme configuration by name.
 */
export function getTheme(name: ThemeName): DashboardTheme {
  return name === 'dark' ? DARK_THEME : LIGHT_THEME;
}
