/**
 * Trend Chart Widget plotting temperature and humidity over the retained
 * history.
 */

import type blessed from 'blessed';
import contrib from 'blessed-contrib';
import type { NumericField, ReadingHistory } from '../history.js';
import { formatTime } from '../utils/formatters.js';
import { BaseWidget, type Grid, type GridPosition } from './types.js';

/**
 * Data structure for the trend chart widget.
 */
export interface TrendChartData {
  readonly history: ReadingHistory;
}

/**
 * One plotted line.
 */
export interface TrendSeries {
  readonly title: string;
  readonly x: string[];
  readonly y: number[];
  readonly style: { readonly line: string };
}

/**
 * Fields plotted by the chart, with their legend titles.
 */
export const TREND_FIELDS: readonly { readonly field: NumericField; readonly title: string }[] = [
  { field: 'temperature', title: 'Temp °C' },
  { field: 'humidity', title: 'Humidity %' },
];

/**
 * Builds chart series from `history`. X labels are sample times.
 */
export function buildTrendSeries(
  history: ReadingHistory,
  colors: readonly string[],
): TrendSeries[] {
  const x = history.timestamps().map(formatTime);

  return TREND_FIELDS.map(({ field, title }, index) => ({
    title,
    x,
    y: history.series(field),
    style: { line: colors[index % colors.length] ?? 'white' },
  }));
}

/**
 * Widget that renders a line chart of recent readings.
 */
export class TrendChartWidget extends BaseWidget<TrendChartData> {
  private lineElement: ReturnType<typeof contrib.line> | null = null;

  protected mount(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement {
    this.lineElement = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.line,
      {
        label: ' Trends ',
        showLegend: true,
        wholeNumbersOnly: false,
        style: {
          line: this.theme.primary,
          text: this.theme.text,
          baseline: this.theme.textMuted,
        },
        border: this.getBorderStyle(),
      },
    );

    return this.lineElement as unknown as blessed.Widgets.BlessedElement;
  }

  protected render(data: TrendChartData): void {
    if (!this.lineElement || data.history.size() === 0) return;

    const series = buildTrendSeries(data.history, [this.theme.warning, this.theme.primary]);
    this.lineElement.setData(
      series.map((s) => ({ title: s.title, x: s.x, y: s.y, style: { line: s.style.line } })),
    );
  }
}
