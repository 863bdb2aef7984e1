/**
 * Event Log Widget for connection and command events.
 *
 * Timestamped, color-coded lines; the newest entry is kept in view.
 */

import type blessed from 'blessed';
import contrib from 'blessed-contrib';
import type { EventLogEntry, EventSeverity } from '../types.js';
import { formatTime } from '../utils/formatters.js';
import { BaseWidget, type Grid, type GridPosition, type WidgetConfig } from './types.js';

/**
 * Event to be logged in the widget.
 */
export interface LogEvent {
  readonly message: string;
  readonly severity: EventSeverity;
  readonly timestamp?: number;
}

/**
 * Widget configuration including buffer size.
 */
export interface EventLogConfig extends WidgetConfig {
  /** Maximum number of log entries to keep */
  readonly maxEntries: number;
}

/**
 * Widget that displays a scrolling log of dashboard events.
 *
 * Entries logged before `create` are replayed once the element exists.
 *
 * @example
 * ```
 * 12:34:56 Connected to server
 * 12:34:58 Sampling rate set to 500ms
 * 12:35:01 Disconnected: connection closed
 * ```
 */
export class EventLogWidget extends BaseWidget<EventLogEntry> {
  private logElement: ReturnType<typeof contrib.log> | null = null;
  private readonly maxEntries: number;
  private readonly entries: EventLogEntry[] = [];

  constructor(config: EventLogConfig) {
    super(config);
    this.maxEntries = config.maxEntries;
  }

  /**
   * Adds a new event to the log.
   */
  log(event: LogEvent): void {
    this.update({
      timestamp: event.timestamp ?? Date.now(),
      message: event.message,
      severity: event.severity,
    });
  }

  /**
   * Appends one entry, dropping the oldest beyond `maxEntries`.
   */
  override update(entry: EventLogEntry): void {
    this.entries.push(entry);
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
    this.render(entry);
  }

  /**
   * Returns all current log entries.
   */
  getEntries(): readonly EventLogEntry[] {
    return this.entries;
  }

  /**
   * Formats one entry with blessed color tags.
   */
  formatEntry(entry: EventLogEntry): string {
    const muted = this.theme.textMuted;
    const color = this.getSeverityColor(entry.severity);
    return (
      `{${muted}-fg}${formatTime(entry.timestamp)}{/${muted}-fg} ` +
      `{${color}-fg}${entry.message}{/${color}-fg}`
    );
  }

  protected mount(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement {
    const logElement: ReturnType<typeof contrib.log> = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.log,
      {
        label: ' Event Log ',
        tags: true,
        fg: this.theme.text,
        selectedFg: this.theme.background,
        border: this.getBorderStyle(),
        bufferLength: this.maxEntries,
      },
    );
    this.logElement = logElement;

    for (const entry of this.entries) {
      logElement.log(this.formatEntry(entry));
    }

    return this.logElement as unknown as blessed.Widgets.BlessedElement;
  }

  protected render(entry: EventLogEntry): void {
    this.logElement?.log(this.formatEntry(entry));
  }

  private getSeverityColor(severity: EventSeverity): string {
    switch (severity) {
      case 'success':
        return this.theme.success;
      case 'warning':
        return this.theme.warning;
      case 'error':
        return this.theme.error;
      case 'info':
        return this.theme.text;
    }
  }
}
