/**
 * Bounded history of received telemetry samples.
 *
 * @module dashboard/history
 */

import {
  NUMERIC_TELEMETRY_FIELDS,
  type TelemetryRecord,
} from '../protocol/envelope.js';

/**
 * Numeric field of a telemetry record.
 */
export type NumericField = (typeof NUMERIC_TELEMETRY_FIELDS)[number];

/**
 * One stored sample.
 */
export interface HistoryEntry {
  readonly timestamp: number;
  readonly record: TelemetryRecord;
}

/**
 * Aggregate of one field over the retained samples.
 */
export interface FieldSummary {
  readonly current: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
}

/**
 * Keeps the most recent `capacity` samples, oldest first.
 *
 * @example
 * ```typescript
 * const history = new ReadingHistory(60);
 * history.push(envelope.timestamp, envelope.data);
 * const temps = history.series('temperature');
 * ```
 */
export class ReadingHistory {
  private readonly entries: HistoryEntry[] = [];

  constructor(private readonly capacity: number = 60) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Appends a sample, evicting the oldest one when full.
   */
  push(timestamp: number, record: TelemetryRecord): void {
    this.entries.push({ timestamp, record });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  size(): number {
    return this.entries.length;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Returns the newest sample, or null when empty.
   */
  latest(): HistoryEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  /**
   * Values of one field, oldest first.
   */
  series(field: NumericField): number[] {
    return this.entries.map((entry) => entry.record[field]);
  }

  /**
   * Sample timestamps, oldest first.
   */
  timestamps(): number[] {
    return this.entries.map((entry) => entry.timestamp);
  }

  /**
   * Current, min, max and mean of one field, or null when empty.
   */
  summarize(field: NumericField): FieldSummary | null {
    const values = this.series(field);
    const current = values[values.length - 1];
    if (current === undefined) return null;

    let min = current;
    let max = current;
    let sum = 0;
    for (const value of values) {
      if (value < min) min = value;
      if (value > max) max = value;
      sum += value;
    }

    return { current, min, max, mean: sum / values.length };
  }

  clear(): void {
    this.entries.length = 0;
  }
}
