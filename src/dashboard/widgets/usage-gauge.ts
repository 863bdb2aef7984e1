/**
 * Usage Gauge Widget for CPU and memory percentages reported by the server.
 *
 * Color-coded thresholds (green/yellow/red) with the value in the label.
 */

import type blessed from 'blessed';
import contrib from 'blessed-contrib';
import { clampPercent } from '../utils/formatters.js';
import { BaseWidget, type Grid, type GridPosition, type WidgetConfig } from './types.js';

/**
 * Data structure for the usage gauge widget.
 */
export interface UsageGaugeData {
  /** Usage percentage, 0-100 */
  readonly percent: number;
}

/**
 * Widget configuration including the gauge title.
 */
export interface UsageGaugeConfig extends WidgetConfig {
  /** Title shown in the border, e.g. `CPU` */
  readonly title: string;
}

/**
 * Usage threshold levels for color coding.
 */
export const USAGE_THRESHOLDS = {
  /** Below this percentage: green */
  HEALTHY: 60,
  /** Below this percentage: yellow; at or above: red */
  WARNING: 80,
} as const;

/**
 * Severity bucket of a usage percentage.
 */
export type UsageLevel = 'healthy' | 'warning' | 'critical';

export function usageLevel(percent: number): UsageLevel {
  if (percent >= USAGE_THRESHOLDS.WARNING) return 'critical';
  if (percent >= USAGE_THRESHOLDS.HEALTHY) return 'warning';
  return 'healthy';
}

/**
 * Widget that displays a usage percentage as a gauge.
 *
 * @example
 * ```
 * ┌─ CPU 25% ──────────────────┐
 * │ █████░░░░░░░░░░░░░░░ 25%   │
 * └────────────────────────────┘
 * ```
 */
export class UsageGaugeWidget extends BaseWidget<UsageGaugeData> {
  private gaugeElement: ReturnType<typeof contrib.gauge> | null = null;
  private readonly title: string;

  constructor(config: UsageGaugeConfig) {
    super(config);
    this.title = config.title;
  }

  /**
   * Border label for `percent`.
   */
  buildLabel(percent: number): string {
    return ` ${this.title} ${clampPercent(percent)}% `;
  }

  protected mount(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement {
    this.gaugeElement = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.gauge,
      {
        label: ` ${this.title} `,
        stroke: this.theme.success,
        fill: this.theme.background,
        border: this.getBorderStyle(),
      },
    );

    return this.gaugeElement as unknown as blessed.Widgets.BlessedElement;
  }

  protected render(data: UsageGaugeData): void {
    if (!this.gaugeElement) return;

    const percent = clampPercent(data.percent);

    // blessed-contrib types don't expose setOptions
    (this.gaugeElement.options as { stroke?: string }).stroke = this.colorFor(percent);
    this.gaugeElement.setPercent(percent);
    this.gaugeElement.setLabel(this.buildLabel(percent));
  }

  private colorFor(percent: number): string {
    switch (usageLevel(percent)) {
      case 'critical':
        return this.theme.error;
      case 'warning':
        return this.theme.warning;
      case 'healthy':
        return this.theme.success;
    }
  }
}
