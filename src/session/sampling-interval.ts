/**
 * Sampling interval shared by a session's sender loop and command dispatcher.
 *
 * The value is only reachable through {@link SamplingInterval.set}, which clamps,
 * so no reader can ever observe an out-of-range interval.
 *
 * @module session/sampling-interval
 */

/**
 * Interval bounds and default, in milliseconds.
 */
export const SAMPLING_INTERVAL = {
  MIN_MS: 100,
  MAX_MS: 10_000,
  DEFAULT_MS: 1_000,
} as const;

/**
 * Clamps an interval to [{@link SAMPLING_INTERVAL.MIN_MS}, {@link SAMPLING_INTERVAL.MAX_MS}].
 * Fractional values are truncated toward zero first.
 *
 * @example
 * clampSamplingInterval(50)     // 100
 * clampSamplingInterval(250.9)  // 250
 * clampSamplingInterval(60000)  // 10000
 */
export function clampSamplingInterval(ms: number): number {
  if (Number.isNaN(ms)) return SAMPLING_INTERVAL.DEFAULT_MS;
  const whole = Math.trunc(ms);
  return Math.max(SAMPLING_INTERVAL.MIN_MS, Math.min(whole, SAMPLING_INTERVAL.MAX_MS));
}

/**
 * Listener notified after the interval changes.
 */
export type IntervalChangeHandler = (current: number, previous: number) => void;

/**
 * Guarded, always-clamped sampling interval.
 */
export class SamplingInterval {
  private value: number;
  private readonly handlers = new Set<IntervalChangeHandler>();

  constructor(initialMs: number = SAMPLING_INTERVAL.DEFAULT_MS) {
    this.value = clampSamplingInterval(initialMs);
  }

  /**
   * Current interval in milliseconds.
   */
  get(): number {
    return this.value;
  }

  /**
   * Clamps and stores `ms`.
   *
   * @returns The value actually stored
   */
  set(ms: number): number {
    const previous = this.value;
    this.value = clampSamplingInterval(ms);

    if (this.value !== previous) {
      for (const handler of this.handlers) {
        handler(this.value, previous);
      }
    }

    return this.value;
  }

  /**
   * Registers a change listener.
   *
   * @returns Unsubscribe function
   */
  onChange(handler: IntervalChangeHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }
}
