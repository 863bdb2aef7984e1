/**
 * Unit tests for dashboard formatting utilities.
 */

import { describe, it, expect } from 'vitest';
import {
  clampPercent,
  formatInterval,
  formatReading,
  formatTime,
  formatUptime,
} from '../../src/dashboard/utils/formatters.js';

describe('formatUptime', () => {
  it('formats zero correctly', () => {
    expect(formatUptime(0)).toBe('00:00:00');
  });

  it('formats minutes and seconds', () => {
    expect(formatUptime(61000)).toBe('00:01:01');
  });

  it('formats hours', () => {
    expect(formatUptime(3661000)).toBe('01:01:01');
  });

  it('drops partial seconds', () => {
    expect(formatUptime(1999)).toBe('00:00:01');
  });

  it('clamps negative durations to zero', () => {
    expect(formatUptime(-5000)).toBe('00:00:00');
  });
});

describe('formatTime', () => {
  it('formats as a 24-hour clock time', () => {
    expect(formatTime(Date.now())).toMatch(/^\d{2}:\d{2}:\d{2}$/);
  });
});

describe('formatReading', () => {
  it('rounds to one decimal by default', () => {
    expect(formatReading(23.456)).toBe('23.5');
  });

  it('appends the unit', () => {
    expect(formatReading(23.456, '°C')).toBe('23.5 °C');
  });

  it('supports custom precision', () => {
    expect(formatReading(1013.2, 'hPa', 0)).toBe('1013 hPa');
    expect(formatReading(7, '', 2)).toBe('7.00');
  });

  it('renders non-finite values as a dash', () => {
    expect(formatReading(Number.NaN, '%')).toBe('-');
    expect(formatReading(Number.POSITIVE_INFINITY)).toBe('-');
  });
});

describe('formatInterval', () => {
  it('uses milliseconds below one second', () => {
    expect(formatInterval(100)).toBe('100ms');
    expect(formatInterval(999)).toBe('999ms');
  });

  it('uses whole seconds when exact', () => {
    expect(formatInterval(1000)).toBe('1s');
    expect(formatInterval(10000)).toBe('10s');
  });

  it('uses one decimal otherwise', () => {
    expect(formatInterval(1500)).toBe('1.5s');
    expect(formatInterval(2400)).toBe('2.4s');
  });
});

describe('clampPercent', () => {
  it('rounds to an integer', () => {
    expect(clampPercent(42.4)).toBe(42);
    expect(clampPercent(42.6)).toBe(43);
  });

  it('clamps to 0-100', () => {
    expect(clampPercent(-3)).toBe(0);
    expect(clampPercent(180)).toBe(100);
  });

  it('maps non-finite values to 0', () => {
    expect(clampPercent(Number.NaN)).toBe(0);
  });
});
