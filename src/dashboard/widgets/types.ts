/**
 * Widget contracts for the telemetry dashboard.
 */

import type blessed from 'blessed';
import type contrib from 'blessed-contrib';
import type { DashboardTheme } from '../types.js';

/**
 * blessed-contrib 12x12 layout grid.
 */
export type Grid = InstanceType<typeof contrib.grid>;

/**
 * Base interface for all dashboard widgets.
 *
 * A widget is constructed without a screen, so its data handling can be used
 * (and tested) before `create` attaches it to a grid. `update` before `create`
 * only records the data.
 */
export interface Widget<TData> {
  /**
   * Creates the blessed element for this widget and renders any data
   * received so far.
   */
  create(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement;

  update(data: TData): void;

  destroy(): void;

  getElement(): blessed.Widgets.BlessedElement | null;
}

/**
 * Grid cell a widget is placed in.
 * Uses blessed-contrib's 12x12 grid system.
 */
export interface GridPosition {
  /** Starting row (0-11) */
  readonly row: number;
  /** Starting column (0-11) */
  readonly col: number;
  /** Number of rows to span */
  readonly rowSpan: number;
  /** Number of columns to span */
  readonly colSpan: number;
}

/**
 * Configuration passed to all widgets during creation.
 */
export interface WidgetConfig {
  readonly theme: DashboardTheme;
}

/**
 * Shared lifecycle: keeps the last data so a widget can be re-rendered after
 * `create`, and tears its element down on `destroy`.
 */
export abstract class BaseWidget<TData> implements Widget<TData> {
  protected readonly theme: DashboardTheme;
  protected element: blessed.Widgets.BlessedElement | null = null;
  protected data: TData | null = null;

  constructor(config: WidgetConfig) {
    this.theme = config.theme;
  }

  create(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement {
    this.element = this.mount(grid, position);
    if (this.data !== null) {
      this.render(this.data);
    }
    return this.element;
  }

  update(data: TData): void {
    this.data = data;
    if (this.element) {
      this.render(data);
    }
  }

  destroy(): void {
    if (this.element) {
      this.element.destroy();
      this.element = null;
    }
  }

  getElement(): blessed.Widgets.BlessedElement | null {
    return this.element;
  }

  /**
   * Returns the most recent data passed to `update`.
   */
  getData(): TData | null {
    return this.data;
  }

  /**
   * Builds the blessed element on the grid.
   */
  protected abstract mount(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement;

  /**
   * Pushes `data` into the mounted element.
   */
  protected abstract render(data: TData): void;

  protected getBorderStyle(): Record<string, unknown> {
    return {
      type: 'line',
      fg: this.theme.primary,
    };
  }
}
