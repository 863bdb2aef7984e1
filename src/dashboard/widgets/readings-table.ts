/**
 * Readings Table Widget for the environmental sensors.
 *
 * Shows one row per sensor with the latest value and its min/max/mean over
 * the retained history.
 */

import type blessed from 'blessed';
import contrib from 'blessed-contrib';
import type { NumericField, ReadingHistory } from '../history.js';
import { formatReading } from '../utils/formatters.js';
import { BaseWidget, type Grid, type GridPosition } from './types.js';

/**
 * Data structure for the readings table widget.
 */
export interface ReadingsTableData {
  readonly history: ReadingHistory;
}

interface SensorRow {
  readonly label: string;
  readonly field: NumericField;
  readonly unit: string;
  readonly digits: number;
}

const SENSOR_ROWS: readonly SensorRow[] = [
  { label: 'Temperature', field: 'temperature', unit: '°C', digits: 1 },
  { label: 'Humidity', field: 'humidity', unit: '%', digits: 1 },
  { label: 'Pressure', field: 'pressure', unit: 'hPa', digits: 1 },
  { label: 'Light', field: 'light', unit: '%', digits: 0 },
];

/**
 * Column headers of the readings table.
 */
export const READINGS_HEADERS = ['Sensor', 'Current', 'Min', 'Max', 'Avg'] as const;

const COLUMN_WIDTHS = [12, 12, 12, 12, 12];

/**
 * Builds the table rows for `history`. Sensors without data show dashes.
 *
 * @example
 * ```
 * ['Temperature', '24.1 °C', '21.0 °C', '28.7 °C', '24.9 °C']
 * ['Motion',      'yes',     '-',       '-',       '-']
 * ```
 */
export function buildReadingRows(history: ReadingHistory): string[][] {
  const rows = SENSOR_ROWS.map((row) => {
    const summary = history.summarize(row.field);
    if (!summary) {
      return [row.label, '-', '-', '-', '-'];
    }
    return [
      row.label,
      formatReading(summary.current, row.unit, row.digits),
      formatReading(summary.min, row.unit, row.digits),
      formatReading(summary.max, row.unit, row.digits),
      formatReading(summary.mean, row.unit, row.digits),
    ];
  });

  const latest = history.latest();
  const motion = latest ? (latest.record.motion_detected ? 'yes' : 'no') : '-';
  rows.push(['Motion', motion, '-', '-', '-']);

  return rows;
}

/**
 * Widget that displays the latest sensor readings in a table.
 */
export class ReadingsTableWidget extends BaseWidget<ReadingsTableData> {
  private tableElement: ReturnType<typeof contrib.table> | null = null;

  protected mount(grid: Grid, position: GridPosition): blessed.Widgets.BlessedElement {
    this.tableElement = grid.set(
      position.row,
      position.col,
      position.rowSpan,
      position.colSpan,
      contrib.table,
      {
        keys: false,
        interactive: false,
        fg: this.theme.text,
        label: ' Sensor Readings ',
        border: this.getBorderStyle(),
        columnSpacing: 2,
        columnWidth: COLUMN_WIDTHS,
      },
    );

    return this.tableElement as unknown as blessed.Widgets.BlessedElement;
  }

  protected render(data: ReadingsTableData): void {
    if (!this.tableElement) return;

    this.tableElement.setData({
      headers: [...READINGS_HEADERS],
      data: buildReadingRows(data.history),
    });
  }
}
