/**
 * Formatting utilities for dashboard display.
 */

/**
 * Formats milliseconds as HH:MM:SS uptime string.
 *
 * @example
 * formatUptime(3661000)  // "01:01:01"
 * formatUptime(61000)    // "00:01:01"
 */
export function formatUptime(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return [
    String(hours).padStart(2, '0'),
    String(minutes).padStart(2, '0'),
    String(seconds).padStart(2, '0'),
  ].join(':');
}

/**
 * Formats a timestamp as HH:MM:SS time string.
 *
 * @example
 * formatTime(Date.now())  // "14:32:45"
 */
export function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  return date.toLocaleTimeString('en-US', { hour12: false });
}

/**
 * Formats a reading with a fixed number of decimals and an optional unit.
 *
 * @example
 * formatReading(23.456, '°C')      // "23.5 °C"
 * formatReading(1013.2, 'hPa', 0)  // "1013 hPa"
 * formatReading(Number.NaN)        // "-"
 */
export function formatReading(value: number, unit = '', digits = 1): string {
  if (!Number.isFinite(value)) return '-';
  const text = value.toFixed(digits);
  return unit ? `${text} ${unit}` : text;
}

/**
 * Formats a sampling interval.
 *
 * @example
 * formatInterval(250)   // "250ms"
 * formatInterval(1000)  // "1s"
 * formatInterval(1500)  // "1.5s"
 */
export function formatInterval(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

/**
 * Rounds a percentage into the 0-100 integer range used by gauges.
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, Math.round(value)));
}
