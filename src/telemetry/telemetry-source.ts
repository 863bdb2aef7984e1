/**
 * Telemetry sources.
 *
 * A source produces one {@link TelemetryRecord} per call. The server only ever
 * depends on the {@link TelemetrySource} interface; real sensor hardware plugs
 * in there. {@link SyntheticTelemetrySource} stands in when no hardware is
 * attached.
 *
 * @module telemetry/telemetry-source
 */

import type { TelemetryRecord } from '../protocol/envelope.js';
import { CpuUsageProbe, MemoryUsageProbe, type UsageProbe } from './system-probes.js';
import type { Logger } from '../utils/logger.js';

/**
 * Produces telemetry records on demand. Must not throw.
 */
export interface TelemetrySource {
  sample(): TelemetryRecord;
}

/**
 * Inclusive lower / exclusive upper bound of a generated reading.
 */
export interface ReadingRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Value ranges produced by {@link SyntheticTelemetrySource}.
 */
export const SYNTHETIC_RANGES = {
  temperature: { min: 20, max: 30 },
  humidity: { min: 40, max: 80 },
  pressure: { min: 1000, max: 1020 },
  light: { min: 0, max: 100 },
} as const satisfies Record<string, ReadingRange>;

/**
 * Configuration for {@link SyntheticTelemetrySource}.
 */
export interface SyntheticSourceOptions {
  /** Uniform random generator in [0, 1). @default Math.random */
  readonly random?: () => number;
  /** CPU usage probe. @default CpuUsageProbe */
  readonly cpuProbe?: UsageProbe;
  /** Memory usage probe. @default MemoryUsageProbe */
  readonly memoryProbe?: UsageProbe;
  /** Passed to the default probes for their unavailable warnings. */
  readonly logger?: Logger;
}

/**
 * Generates plausible environmental readings and reports real CPU and memory
 * usage from the host.
 *
 * @example
 * ```typescript
 * const source = new SyntheticTelemetrySource();
 * const record = source.sample();
 * // { temperature: 24.3, humidity: 61.8, ..., cpu_usage: 12.5, memory_usage: 43.1 }
 * ```
 */
export class SyntheticTelemetrySource implements TelemetrySource {
  private readonly random: () => number;
  private readonly cpuProbe: UsageProbe;
  private readonly memoryProbe: UsageProbe;

  constructor(options: SyntheticSourceOptions = {}) {
    const probeOptions = options.logger ? { logger: options.logger } : {};
    this.random = options.random ?? Math.random;
    this.cpuProbe = options.cpuProbe ?? new CpuUsageProbe(probeOptions);
    this.memoryProbe = options.memoryProbe ?? new MemoryUsageProbe(probeOptions);
  }

  sample(): TelemetryRecord {
    return Object.freeze({
      temperature: this.uniform(SYNTHETIC_RANGES.temperature),
      humidity: this.uniform(SYNTHETIC_RANGES.humidity),
      pressure: this.uniform(SYNTHETIC_RANGES.pressure),
      light: this.uniform(SYNTHETIC_RANGES.light),
      motion_detected: this.random() < 0.5,
      cpu_usage: this.cpuProbe.read(),
      memory_usage: this.memoryProbe.read(),
    });
  }

  private uniform(range: ReadingRange): number {
    return range.min + this.random() * (range.max - range.min);
  }
}
