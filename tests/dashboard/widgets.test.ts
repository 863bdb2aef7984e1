/**
 * Unit tests for dashboard widgets.
 *
 * These tests cover the data handling every widget does before it is attached
 * to a screen. Full TUI testing would require a mocked terminal environment.
 */

import { describe, it, expect } from 'vitest';
import {
  EventLogWidget,
  READINGS_HEADERS,
  ReadingsTableWidget,
  TrendChartWidget,
  UsageGaugeWidget,
  buildReadingRows,
  buildTrendSeries,
  usageLevel,
} from '../../src/dashboard/widgets/index.js';
import { ReadingHistory } from '../../src/dashboard/history.js';
import { DARK_THEME, LIGHT_THEME } from '../../src/dashboard/types.js';
import { formatTime } from '../../src/dashboard/utils/formatters.js';
import { SAMPLE_RECORD } from '../helpers/test-helpers.js';

function sampleHistory(): ReadingHistory {
  const history = new ReadingHistory();
  history.push(1_000, {
    ...SAMPLE_RECORD,
    temperature: 20,
    humidity: 50,
    pressure: 1010,
    light: 40,
    motion_detected: false,
  });
  history.push(2_000, {
    ...SAMPLE_RECORD,
    temperature: 30,
    humidity: 60,
    pressure: 1012,
    light: 42,
    motion_detected: true,
  });
  return history;
}

describe('ReadingsTableWidget', () => {
  it('returns null from getElement() before create', () => {
    const widget = new ReadingsTableWidget({ theme: DARK_THEME });
    expect(widget.getElement()).toBeNull();
  });

  it('keeps data received before create', () => {
    const widget = new ReadingsTableWidget({ theme: DARK_THEME });
    const history = sampleHistory();
    widget.update({ history });
    expect(widget.getData()).toEqual({ history });
  });

  it('destroy() is safe to call multiple times', () => {
    const widget = new ReadingsTableWidget({ theme: LIGHT_THEME });
    expect(() => {
      widget.destroy();
      widget.destroy();
    }).not.toThrow();
  });

  describe('buildReadingRows()', () => {
    it('shows dashes without data', () => {
      expect(buildReadingRows(new ReadingHistory())).toEqual([
        ['Temperature', '-', '-', '-', '-'],
        ['Humidity', '-', '-', '-', '-'],
        ['Pressure', '-', '-', '-', '-'],
        ['Light', '-', '-', '-', '-'],
        ['Motion', '-', '-', '-', '-'],
      ]);
    });

    it('summarizes each sensor over the history', () => {
      expect(buildReadingRows(sampleHistory())).toEqual([
        ['Temperature', '30.0 °C', '20.0 °C', '30.0 °C', '25.0 °C'],
        ['Humidity', '60.0 %', '50.0 %', '60.0 %', '55.0 %'],
        ['Pressure', '1012.0 hPa', '1010.0 hPa', '1012.0 hPa', '1011.0 hPa'],
        ['Light', '42 %', '40 %', '42 %', '41 %'],
        ['Motion', 'yes', '-', '-', '-'],
      ]);
    });

    it('has one cell per header', () => {
      for (const row of buildReadingRows(sampleHistory())) {
        expect(row).toHaveLength(READINGS_HEADERS.length);
      }
    });
  });
});

describe('TrendChartWidget', () => {
  it('returns null from getElement() before create', () => {
    expect(new TrendChartWidget({ theme: DARK_THEME }).getElement()).toBeNull();
  });

  describe('buildTrendSeries()', () => {
    it('plots temperature and humidity against sample times', () => {
      const series = buildTrendSeries(sampleHistory(), ['yellow', 'cyan']);
      const x = [formatTime(1_000), formatTime(2_000)];

      expect(series).toEqual([
        { title: 'Temp °C', x, y: [20, 30], style: { line: 'yellow' } },
        { title: 'Humidity %', x, y: [50, 60], style: { line: 'cyan' } },
      ]);
    });

    it('reuses colors when fewer are given', () => {
      const series = buildTrendSeries(sampleHistory(), ['red']);
      expect(series.map((s) => s.style.line)).toEqual(['red', 'red']);
    });

    it('falls back to white without colors', () => {
      const series = buildTrendSeries(sampleHistory(), []);
      expect(series.map((s) => s.style.line)).toEqual(['white', 'white']);
    });

    it('returns empty series for an empty history', () => {
      const series = buildTrendSeries(new ReadingHistory(), ['yellow', 'cyan']);
      expect(series.map((s) => s.y)).toEqual([[], []]);
    });
  });
});

describe('UsageGaugeWidget', () => {
  it('labels the gauge with the rounded percentage', () => {
    const widget = new UsageGaugeWidget({ theme: DARK_THEME, title: 'CPU' });
    expect(widget.buildLabel(42.6)).toBe(' CPU 43% ');
    expect(widget.buildLabel(150)).toBe(' CPU 100% ');
  });

  it('keeps data received before create', () => {
    const widget = new UsageGaugeWidget({ theme: DARK_THEME, title: 'Memory' });
    widget.update({ percent: 12 });
    expect(widget.getData()).toEqual({ percent: 12 });
  });

  describe('usageLevel()', () => {
    it('buckets percentages by threshold', () => {
      expect(usageLevel(0)).toBe('healthy');
      expect(usageLevel(59.9)).toBe('healthy');
      expect(usageLevel(60)).toBe('warning');
      expect(usageLevel(79)).toBe('warning');
      expect(usageLevel(80)).toBe('critical');
      expect(usageLevel(100)).toBe('critical');
    });
  });
});

describe('EventLogWidget', () => {
  it('records entries before create', () => {
    const widget = new EventLogWidget({ theme: DARK_THEME, maxEntries: 10 });
    widget.log({ message: 'Connected to server', severity: 'success', timestamp: 5 });

    expect(widget.getEntries()).toEqual([
      { timestamp: 5, message: 'Connected to server', severity: 'success' },
    ]);
  });

  it('stamps entries without a timestamp', () => {
    const widget = new EventLogWidget({ theme: DARK_THEME, maxEntries: 10 });
    const before = Date.now();
    widget.log({ message: 'hello', severity: 'info' });

    expect(widget.getEntries()[0]?.timestamp).toBeGreaterThanOrEqual(before);
  });

  it('drops the oldest entries beyond maxEntries', () => {
    const widget = new EventLogWidget({ theme: DARK_THEME, maxEntries: 3 });
    for (let i = 1; i <= 5; i++) {
      widget.log({ message: `event ${i}`, severity: 'info', timestamp: i });
    }

    expect(widget.getEntries().map((e) => e.message)).toEqual(['event 3', 'event 4', 'event 5']);
  });

  it('colors entries by severity', () => {
    const widget = new EventLogWidget({ theme: DARK_THEME, maxEntries: 10 });
    const time = formatTime(5);

    expect(widget.formatEntry({ timestamp: 5, message: 'ok', severity: 'success' })).toBe(
      `{gray-fg}${time}{/gray-fg} {green-fg}ok{/green-fg}`,
    );
    expect(widget.formatEntry({ timestamp: 5, message: 'hm', severity: 'warning' })).toBe(
      `{gray-fg}${time}{/gray-fg} {yellow-fg}hm{/yellow-fg}`,
    );
    expect(widget.formatEntry({ timestamp: 5, message: 'no', severity: 'error' })).toBe(
      `{gray-fg}${time}{/gray-fg} {red-fg}no{/red-fg}`,
    );
    expect(widget.formatEntry({ timestamp: 5, message: 'fyi', severity: 'info' })).toBe(
      `{gray-fg}${time}{/gray-fg} {white-fg}fyi{/white-fg}`,
    );
  });

  it('uses the light palette for text', () => {
    const widget = new EventLogWidget({ theme: LIGHT_THEME, maxEntries: 10 });
    expect(widget.formatEntry({ timestamp: 5, message: 'fyi', severity: 'info' })).toBe(
      `{gray-fg}${formatTime(5)}{/gray-fg} {black-fg}fyi{/black-fg}`,
    );
  });
});
