/**
 * Terminal dashboard for a telemetry server.
 *
 * Connects over TCP, renders live readings and lets the operator request a
 * reading or change the sampling interval from the keyboard.
 *
 * @example
 * ```typescript
 * const dashboard = new TelemetryDashboard({
 *   host: '127.0.0.1',
 *   port: 8080,
 *   theme: 'dark',
 * });
 *
 * await dashboard.start();
 * ```
 */

import blessed from 'blessed';
import contrib from 'blessed-contrib';
import {
  TelemetryConnection,
  type ConnectionEvent,
} from '../client/telemetry-connection.js';
import type { OutboundEnvelope } from '../protocol/envelope.js';
import { SAMPLING_INTERVAL } from '../session/sampling-interval.js';
import { ReadingHistory } from './history.js';
import {
  formatIntervalStatus,
  parseIntervalFromResponse,
  stepSamplingInterval,
  type IntervalStep,
} from './interval-control.js';
import {
  DEFAULT_DASHBOARD_CONFIG,
  getTheme,
  type DashboardConfig,
  type DashboardTheme,
  type EventSeverity,
} from './types.js';
import { formatInterval, formatUptime } from './utils/formatters.js';
import {
  EventLogWidget,
  ReadingsTableWidget,
  TrendChartWidget,
  UsageGaugeWidget,
  type Grid,
  type GridPosition,
} from './widgets/index.js';

/**
 * Dashboard state enumeration.
 */
type DashboardState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/**
 * Grid layout of the dashboard.
 */
const LAYOUT = {
  readingsTable: { row: 0, col: 0, rowSpan: 5, colSpan: 6 },
  cpuGauge: { row: 0, col: 6, rowSpan: 2, colSpan: 6 },
  memoryGauge: { row: 2, col: 6, rowSpan: 3, colSpan: 6 },
  trendChart: { row: 5, col: 0, rowSpan: 5, colSpan: 7 },
  eventLog: { row: 5, col: 7, rowSpan: 5, colSpan: 5 },
  statusBar: { row: 10, col: 0, rowSpan: 2, colSpan: 12 },
} as const satisfies Record<string, GridPosition>;

// =============================================================================
// TelemetryDashboard Class
// =============================================================================

/**
 * blessed-contrib TUI fed by a {@link TelemetryConnection}.
 */
export class TelemetryDashboard {
  private readonly config: DashboardConfig;
  private readonly theme: DashboardTheme;
  private readonly connection: TelemetryConnection;
  private readonly history: ReadingHistory;

  private state: DashboardState = 'idle';
  private screen: blessed.Widgets.Screen | null = null;
  private grid: Grid | null = null;

  // Widgets
  private readonly readingsTable: ReadingsTableWidget;
  private readonly trendChart: TrendChartWidget;
  private readonly cpuGauge: UsageGaugeWidget;
  private readonly memoryGauge: UsageGaugeWidget;
  private readonly eventLog: EventLogWidget;
  private statusBar: blessed.Widgets.BoxElement | null = null;

  // State
  private startTime = 0;
  private samplesReceived = 0;
  private samplingIntervalMs: number = SAMPLING_INTERVAL.DEFAULT_MS;
  private samplingIntervalConfirmed = false;
  private connectionUnsubscribe: (() => void) | null = null;

  constructor(config: Partial<DashboardConfig> = {}) {
    this.config = { ...DEFAULT_DASHBOARD_CONFIG, ...config };
    this.theme = getTheme(this.config.theme);
    this.history = new ReadingHistory(this.config.historySize);

    this.connection = new TelemetryConnection({
      host: this.config.host,
      port: this.config.port,
      autoReconnect: this.config.autoReconnect,
      reconnectDelayMs: this.config.reconnectDelayMs,
      maxReconnectDelayMs: this.config.maxReconnectDelayMs,
      reconnectBackoffMultiplier: this.config.reconnectBackoffMultiplier,
      connectionTimeoutMs: this.config.connectionTimeoutMs,
    });

    const widgetConfig = { theme: this.theme };
    this.readingsTable = new ReadingsTableWidget(widgetConfig);
    this.trendChart = new TrendChartWidget(widgetConfig);
    this.cpuGauge = new UsageGaugeWidget({ ...widgetConfig, title: 'CPU' });
    this.memoryGauge = new UsageGaugeWidget({ ...widgetConfig, title: 'Memory' });
    this.eventLog = new EventLogWidget({
      ...widgetConfig,
      maxEntries: this.config.maxEventLogSize,
    });
  }

  /**
   * Starts the dashboard.
   *
   * @throws Error if already running
   */
  async start(): Promise<void> {
    if (this.state === 'running' || this.state === 'starting') {
      throw new Error('TelemetryDashboard is already running');
    }

    this.state = 'starting';
    this.startTime = Date.now();

    this.initializeScreen();
    this.createLayout();
    this.setupKeyboardHandlers();
    this.subscribeToConnection();

    this.logEvent('info', `Connecting to ${this.config.host}:${this.config.port}...`);
    this.updateStatusBar();
    this.render();

    try {
      await this.connection.connect();
    } catch (error) {
      this.logEvent(
        'error',
        `Connection failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    this.state = 'running';
  }

  /**
   * Stops the dashboard and restores the terminal.
   */
  stop(): void {
    if (this.state !== 'running' && this.state !== 'starting') {
      return;
    }

    this.state = 'stopping';

    if (this.connectionUnsubscribe) {
      this.connectionUnsubscribe();
      this.connectionUnsubscribe = null;
    }
    this.connection.disconnect();

    this.destroyWidgets();

    if (this.screen) {
      this.screen.destroy();
      this.screen = null;
    }

    this.grid = null;
    this.state = 'stopped';
  }

  /**
   * Returns whether the dashboard is currently running.
   */
  isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Returns the retained sample history.
   */
  getHistory(): ReadingHistory {
    return this.history;
  }

  /**
   * Returns the last sampling interval confirmed by the server.
   */
  getSamplingInterval(): number {
    return this.samplingIntervalMs;
  }

  /**
   * Returns whether the server has confirmed the interval in this session.
   * Until it does, the server default of 1000ms is assumed.
   */
  isSamplingIntervalConfirmed(): boolean {
    return this.samplingIntervalConfirmed;
  }

  /**
   * Applies one server envelope to the dashboard state and widgets.
   */
  handleServerMessage(message: OutboundEnvelope): void {
    switch (message.type) {
      case 'sensor_data':
        this.samplesReceived++;
        this.history.push(message.timestamp, message.data);
        this.readingsTable.update({ history: this.history });
        this.trendChart.update({ history: this.history });
        this.cpuGauge.update({ percent: message.data.cpu_usage });
        this.memoryGauge.update({ percent: message.data.memory_usage });
        break;

      case 'response': {
        if (!message.success) {
          this.logEvent('warning', `${message.cmd} failed: ${message.message}`);
          break;
        }

        const interval = parseIntervalFromResponse(message.message);
        if (interval !== null) {
          this.samplingIntervalMs = interval;
          this.samplingIntervalConfirmed = true;
        }
        this.logEvent('success', message.message);
        break;
      }
    }
  }

  // ===========================================================================
  // Screen Initialization
  // ===========================================================================

  private initializeScreen(): void {
    this.screen = blessed.screen({
      smartCSR: true,
      title: 'Telemetry Dashboard',
      fullUnicode: true,
      autoPadding: true,
      warnings: false,
    });
  }

  private createLayout(): void {
    if (!this.screen) return;

    this.grid = new contrib.grid({
      rows: 12,
      cols: 12,
      screen: this.screen,
    });

    this.readingsTable.create(this.grid, LAYOUT.readingsTable);
    this.cpuGauge.create(this.grid, LAYOUT.cpuGauge);
    this.memoryGauge.create(this.grid, LAYOUT.memoryGauge);
    this.trendChart.create(this.grid, LAYOUT.trendChart);
    this.eventLog.create(this.grid, LAYOUT.eventLog);
    this.createStatusBar();
  }

  private createStatusBar(): void {
    if (!this.grid) return;

    const pos = LAYOUT.statusBar;
    this.statusBar = this.grid.set(pos.row, pos.col, pos.rowSpan, pos.colSpan, blessed.box, {
      tags: true,
      border: { type: 'line' },
      style: {
        fg: this.theme.text,
        bg: this.theme.background,
        border: { fg: this.theme.primary },
      },
    });
  }

  private destroyWidgets(): void {
    this.readingsTable.destroy();
    this.trendChart.destroy();
    this.cpuGauge.destroy();
    this.memoryGauge.destroy();
    this.eventLog.destroy();

    if (this.statusBar) {
      this.statusBar.destroy();
      this.statusBar = null;
    }
  }

  // ===========================================================================
  // Keyboard Handlers
  // ===========================================================================

  private setupKeyboardHandlers(): void {
    if (!this.screen) return;

    this.screen.key(['escape', 'q', 'C-c'], () => {
      this.stop();
      process.exit(0);
    });

    this.screen.key(['r'], () => {
      if (this.connection.requestSensorData()) {
        this.logEvent('info', 'Reading requested');
      } else {
        this.logEvent('warning', 'Not connected - cannot request reading');
      }
      this.render();
    });

    this.screen.key(['+', '='], () => this.changeInterval('faster'));
    this.screen.key(['-', '_'], () => this.changeInterval('slower'));

    this.screen.key(['?', 'h'], () => {
      this.showHelp();
    });
  }

  private changeInterval(step: IntervalStep): void {
    const target = stepSamplingInterval(this.samplingIntervalMs, step);
    if (target === this.samplingIntervalMs) {
      this.logEvent('info', `Sampling interval already at ${formatInterval(target)}`);
    } else if (this.connection.setSamplingRate(target)) {
      this.logEvent('info', `Requested sampling interval ${formatInterval(target)}`);
    } else {
      this.logEvent('warning', 'Not connected - cannot change sampling interval');
    }
    this.render();
  }

  // ===========================================================================
  // Connection Handling
  // ===========================================================================

  private subscribeToConnection(): void {
    this.connectionUnsubscribe = this.connection.onEvent((event) => {
      this.handleConnectionEvent(event);
    });
  }

  /**
   * Applies one connection event to the dashboard state and widgets.
   */
  handleConnectionEvent(event: ConnectionEvent): void {
    switch (event.type) {
      case 'connected':
        // The server may run with another default; shown as assumed until confirmed.
        this.samplingIntervalMs = SAMPLING_INTERVAL.DEFAULT_MS;
        this.samplingIntervalConfirmed = false;
        this.logEvent('success', 'Connected to server');
        break;

      case 'disconnected':
        this.logEvent('warning', `Disconnected: ${event.reason}`);
        break;

      case 'reconnecting':
        this.logEvent(
          'info',
          `Reconnecting (attempt ${event.attempt}) in ${Math.round(event.delayMs)}ms...`,
        );
        break;

      case 'error':
        this.logEvent('error', `Error: ${event.error.message}`);
        break;

      case 'message':
        this.handleServerMessage(event.message);
        break;
    }

    this.updateStatusBar();
    this.render();
  }

  // ===========================================================================
  // Status & Help
  // ===========================================================================

  private updateStatusBar(): void {
    if (!this.statusBar) return;

    const uptime = formatUptime(Date.now() - this.startTime);
    const content =
      ` [q]uit [r]ead [+/-]interval [?]help` +
      `  |  ${this.getConnectionStatusIndicator()}` +
      `  |  Interval: ${formatIntervalStatus(this.samplingIntervalMs, this.samplingIntervalConfirmed)}` +
      `  |  Samples: ${this.samplesReceived}` +
      `  |  Up: ${uptime}`;

    this.statusBar.setContent(content);
  }

  private getConnectionStatusIndicator(): string {
    switch (this.connection.getState()) {
      case 'connected':
        return `{green-fg}Connected{/green-fg}`;
      case 'connecting':
        return `{yellow-fg}Connecting...{/yellow-fg}`;
      case 'reconnecting':
        return `{yellow-fg}Reconnecting...{/yellow-fg}`;
      case 'disconnected':
        return `{red-fg}Disconnected{/red-fg}`;
    }
  }

  private showHelp(): void {
    if (!this.screen) return;

    const key = (text: string): string =>
      `{${this.theme.primary}-fg}${text}{/${this.theme.primary}-fg}`;
    const muted = (text: string): string =>
      `{${this.theme.textMuted}-fg}${text}{/${this.theme.textMuted}-fg}`;

    const helpBox = blessed.box({
      parent: this.screen,
      top: 'center',
      left: 'center',
      width: 52,
      height: 13,
      label: ' Keyboard Shortcuts ',
      tags: true,
      border: { type: 'line' },
      style: {
        border: { fg: this.theme.primary },
        label: { fg: this.theme.primary },
      },
      content: `
  ${key('q, Escape, Ctrl+C')}  Quit
  ${key('r')}                  Request a reading now
  ${key('+')}                  Halve the sampling interval
  ${key('-')}                  Double the sampling interval
  ${key('?, h')}               Show this help

  ${muted(`Server: ${this.config.host}:${this.config.port}`)}
  ${muted('Press any key to close')}
`,
    });

    helpBox.focus();
    helpBox.once('keypress', () => {
      helpBox.destroy();
      this.render();
    });

    this.render();
  }

  private logEvent(severity: EventSeverity, message: string): void {
    this.eventLog.log({ message, severity });
  }

  private render(): void {
    this.screen?.render();
  }
}
