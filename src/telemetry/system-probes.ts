/**
 * CPU and memory usage probes backed by procfs.
 *
 * Both probes are synchronous, read one small file each and never throw: an
 * unreadable or unparsable source, or a zero denominator, yields `0`.
 *
 * @module telemetry/system-probes
 */

import { readFileSync } from 'node:fs';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * A percentage probe in the range [0, 100].
 */
export interface UsageProbe {
  read(): number;
}

/**
 * Reads a text file; throws if it cannot be read.
 */
export type FileReader = (path: string) => string;

/**
 * Options shared by the procfs probes.
 */
export interface ProcProbeOptions {
  /** File to read. Defaults to the standard procfs location. */
  readonly path?: string;
  /** File reader, replaceable for tests. */
  readonly readFile?: FileReader;
  /** Receives a single warning the first time the probe is unavailable. */
  readonly logger?: Logger;
}

const readUtf8: FileReader = (path) => readFileSync(path, 'utf8');

function toPercent(ratio: number): number {
  if (!Number.isFinite(ratio)) return 0;
  return Math.max(0, Math.min(100, ratio * 100));
}

/**
 * Shared failure handling: warn once, then stay quiet.
 */
abstract class ProcProbe implements UsageProbe {
  protected readonly path: string;
  private readonly readFile: FileReader;
  private readonly logger: Logger;
  private warned = false;

  constructor(defaultPath: string, options: ProcProbeOptions) {
    this.path = options.path ?? defaultPath;
    this.readFile = options.readFile ?? readUtf8;
    this.logger = options.logger ?? silentLogger;
  }

  read(): number {
    let content: string;
    try {
      content = this.readFile(this.path);
    } catch (error) {
      this.unavailable(error instanceof Error ? error.message : String(error));
      return 0;
    }

    const percent = this.compute(content);
    if (percent === null) {
      this.unavailable('unrecognised content');
      return 0;
    }
    return percent;
  }

  /**
   * Returns the usage percentage, or null when the content cannot be used.
   */
  protected abstract compute(content: string): number | null;

  private unavailable(reason: string): void {
    if (this.warned) return;
    this.warned = true;
    this.logger.warn(`${this.path} unavailable (${reason}), reporting 0`);
  }
}

// =============================================================================
// CPU
// =============================================================================

interface CpuCounters {
  readonly idle: number;
  readonly total: number;
}

/**
 * Parses the aggregate `cpu` line of `/proc/stat`.
 *
 * Idle time is `idle + iowait`; total is the sum of every column.
 */
export function parseCpuCounters(content: string): CpuCounters | null {
  const line = content.split('\n').find((l) => /^cpu\s/.test(l));
  if (!line) return null;

  const values = line.trim().split(/\s+/).slice(1).map(Number);
  if (values.length < 4 || values.some((v) => !Number.isFinite(v))) return null;

  const total = values.reduce((sum, v) => sum + v, 0);
  const idle = (values[3] ?? 0) + (values[4] ?? 0);
  return { idle, total };
}

/**
 * CPU usage from `/proc/stat`.
 *
 * Usage is measured between consecutive reads; the first read reports the
 * average since boot.
 */
export class CpuUsageProbe extends ProcProbe {
  private previous: CpuCounters | null = null;

  constructor(options: ProcProbeOptions = {}) {
    super('/proc/stat', options);
  }

  protected compute(content: string): number | null {
    const current = parseCpuCounters(content);
    if (!current) return null;

    const previous = this.previous;
    this.previous = current;

    let total = current.total;
    let idle = current.idle;
    if (previous && current.total > previous.total) {
      total = current.total - previous.total;
      idle = current.idle - previous.idle;
    }

    if (total <= 0) return 0;
    return toPercent(1 - idle / total);
  }
}

// =============================================================================
// Memory
// =============================================================================

/**
 * Reads a `Key:   123 kB` value from `/proc/meminfo` content.
 */
export function readMeminfoValue(content: string, key: string): number | null {
  const line = content.split('\n').find((l) => l.startsWith(`${key}:`));
  if (!line) return null;
  const match = /(\d+)/.exec(line);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

/**
 * Memory usage from `/proc/meminfo`: `1 - available / total`.
 * Falls back to `MemFree` on kernels without `MemAvailable`.
 */
export class MemoryUsageProbe extends ProcProbe {
  constructor(options: ProcProbeOptions = {}) {
    super('/proc/meminfo', options);
  }

  protected compute(content: string): number | null {
    const total = readMeminfoValue(content, 'MemTotal');
    const available =
      readMeminfoValue(content, 'MemAvailable') ?? readMeminfoValue(content, 'MemFree');

    if (total === null || available === null) return null;
    if (total <= 0) return 0;
    return toPercent(1 - available / total);
  }
}
